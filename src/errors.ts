export type ReaderErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'EPUB_FILE_NOT_FOUND'
  | 'EPUB_CONTAINER_MISSING'
  | 'EPUB_OPF_MISSING'
  | 'EPUB_ENTRY_MISSING'
  | 'CHAPTER_NOT_FOUND'
  | 'CURSOR_OUT_OF_RANGE'
  | 'DUPLICATE_PAGE'
  | 'PAGE_OUT_OF_ORDER'
  | 'PAGE_NOT_FOUND'
  | 'SESSION_READ_FAILED'
  | 'SESSION_CORRUPT'
  | 'SESSION_WRITE_FAILED';

export interface ReaderErrorMetadata {
  source?: string;
  cause?: unknown;
}

export class ReaderError extends Error {
  readonly code: ReaderErrorCode;
  readonly source?: string;
  override readonly cause?: unknown;

  constructor(code: ReaderErrorCode, message: string, metadata: ReaderErrorMetadata = {}) {
    super(message);
    this.name = 'ReaderError';
    this.code = code;
    this.source = metadata.source;
    this.cause = metadata.cause;
  }
}

export function isReaderError(input: unknown, code?: ReaderErrorCode): input is ReaderError {
  return input instanceof ReaderError && (code === undefined || input.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
