import { ReaderError } from '../errors.ts';
import type { SpineCursor } from './types.ts';

export class ArraySpineCursor implements SpineCursor {
  private position = 0;

  constructor(private readonly urls: readonly string[]) {
    if (urls.length === 0) {
      throw new ReaderError('EPUB_ENTRY_MISSING', 'Invalid EPUB: the spine is empty');
    }
  }

  currentURL(): string {
    const url = this.urls[this.position];
    if (url === undefined) {
      throw new ReaderError('CURSOR_OUT_OF_RANGE', `Spine position ${this.position} is out of range`);
    }
    return url;
  }

  next(): void {
    if (this.isLast()) {
      throw new ReaderError('CURSOR_OUT_OF_RANGE', 'Cannot move past the last spine entry');
    }
    this.position++;
  }

  previous(): void {
    if (this.isFirst()) {
      throw new ReaderError('CURSOR_OUT_OF_RANGE', 'Cannot move before the first spine entry');
    }
    this.position--;
  }

  isFirst(): boolean {
    return this.position === 0;
  }

  isLast(): boolean {
    return this.position === this.urls.length - 1;
  }
}
