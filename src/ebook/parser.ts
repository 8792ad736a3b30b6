import { ReaderError } from '../errors.ts';
import type { EbookDocument } from './types.ts';
import { EpubParser } from './parser/epub.ts';

export interface Parser {
  open(path: string): Promise<EbookDocument>;
}

export function buildParser(path: string): Parser {
  if (path.toLowerCase().endsWith('.epub')) {
    return new EpubParser();
  }

  throw new ReaderError('UNSUPPORTED_FORMAT', `No parser for ebook at ${path}`, { source: path });
}
