import { basename, dirname, join } from 'node:path';
import { readJson, writeJson } from 'fs-extra/esm';
import { errorMessage, ReaderError } from '../errors.ts';
import type { SessionFile, SessionState } from './types.ts';

export function sessionFileName(bookPath: string): string {
  return join(dirname(bookPath), `.${basename(bookPath)}.folio.json`);
}

/**
 * Reads the session stored beside the book. A missing file means there is no
 * prior session; any other failure is fatal, a corrupt session is never
 * silently discarded.
 */
export async function loadSession(bookPath: string): Promise<SessionState | undefined> {
  const sessionFile = sessionFileName(bookPath);

  let raw: unknown;
  try {
    raw = await readJson(sessionFile);
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    if (error instanceof SyntaxError) {
      throw new ReaderError('SESSION_CORRUPT', `Session file is not valid JSON: ${sessionFile}`, { source: sessionFile, cause: error });
    }
    throw new ReaderError('SESSION_READ_FAILED', `Failed to read session file ${sessionFile}: ${errorMessage(error)}`, {
      source: sessionFile,
      cause: error,
    });
  }

  return parseSession(raw, sessionFile);
}

export async function saveSession(bookPath: string, state: SessionState): Promise<string> {
  const sessionFile = sessionFileName(bookPath);

  try {
    await writeJson(sessionFile, serializeSession(state));
  } catch (error) {
    throw new ReaderError('SESSION_WRITE_FAILED', `Failed to write session file ${sessionFile}: ${errorMessage(error)}`, {
      source: sessionFile,
      cause: error,
    });
  }

  return sessionFile;
}

export function serializeSession(state: SessionState): SessionFile {
  const offsets: Record<string, number> = {};
  for (const [chapter, offset] of [...state.offsets].sort(([a], [b]) => a - b)) {
    if (offset > 0) {
      offsets[String(chapter)] = offset;
    }
  }

  return { page: state.page, offsets, width: state.width };
}

export function parseSession(raw: unknown, source = 'session'): SessionState {
  const corrupt = (reason: string) => new ReaderError('SESSION_CORRUPT', `Invalid session in ${source}: ${reason}`, { source });

  if (!isRecord(raw)) {
    throw corrupt('expected an object');
  }

  const { page, width } = raw;
  if (typeof page !== 'number' || !Number.isInteger(page) || page < -1) {
    throw corrupt('"page" must be an integer of at least -1');
  }
  if (typeof width !== 'number' || !Number.isInteger(width) || width <= 0) {
    throw corrupt('"width" must be a positive integer');
  }

  const offsets = new Map<number, number>();
  const rawOffsets = raw.offsets;
  if (rawOffsets !== undefined && rawOffsets !== null) {
    if (!isRecord(rawOffsets)) {
      throw corrupt('"offsets" must be an object');
    }

    for (const [key, offset] of Object.entries(rawOffsets)) {
      if (!/^\d+$/.test(key)) {
        throw corrupt(`offset key "${key}" is not a chapter index`);
      }
      if (typeof offset !== 'number' || !Number.isInteger(offset) || offset < 0) {
        throw corrupt(`offset of chapter ${key} must be a non-negative integer`);
      }
      if (offset > 0) {
        offsets.set(Number(key), offset);
      }
    }
  }

  return { page, offsets, width };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
