/** The parts of a toolkit key event that name the key. */
export interface KeyPress {
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
}

/**
 * Printable characters stand for themselves (`j`, `G`, `+`); everything else
 * uses the toolkit's full name (`down`, `pagedown`, `C-c`).
 */
export function keySymbol(ch: string | undefined, key: KeyPress | undefined): string {
  if (ch && ch.length === 1 && !key?.ctrl && !key?.meta && ch >= ' ') {
    return ch;
  }
  return key?.full ?? ch ?? '';
}
