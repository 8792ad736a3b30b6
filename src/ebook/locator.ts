import { ReaderError } from '../errors.ts';
import type { SpineCursor } from './types.ts';

/**
 * Parks the cursor on the spine entry whose url equals `url`.
 *
 * The cursor is never rewound between lookups: a successful call leaves it on
 * the entry it found, so the next lookup of the same or a nearby chapter costs
 * few steps. The search checks the current entry, walks back to the first
 * entry and then forward to the last one. When the url is not in the spine the
 * cursor is moved back to where it started and a CHAPTER_NOT_FOUND error is
 * thrown.
 */
export function locate(cursor: SpineCursor, url: string): void {
  const origin = cursor.currentURL();

  if (seekBackward(cursor, url) || seekForward(cursor, url)) {
    return;
  }

  // The forward scan stopped on the last entry, so the origin lies behind it
  seekBackward(cursor, origin);

  throw new ReaderError('CHAPTER_NOT_FOUND', `Chapter not found in spine: ${url}`, { source: url });
}

function seekBackward(cursor: SpineCursor, url: string): boolean {
  for (;;) {
    if (cursor.currentURL() === url) {
      return true;
    }
    if (cursor.isFirst()) {
      return false;
    }
    cursor.previous();
  }
}

function seekForward(cursor: SpineCursor, url: string): boolean {
  for (;;) {
    if (cursor.currentURL() === url) {
      return true;
    }
    if (cursor.isLast()) {
      return false;
    }
    cursor.next();
  }
}
