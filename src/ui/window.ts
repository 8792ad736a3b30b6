/**
 * Greedy word wrap. Paragraph breaks are kept as empty lines and words longer
 * than the width are split.
 */
export function wrapText(text: string, width: number): string[] {
  const columns = Math.max(1, width);
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    const words = paragraph.split(/\s+/u).filter((word) => word !== '');
    if (words.length === 0) {
      lines.push('');
      continue;
    }

    let line = '';
    for (const word of words) {
      let rest = word;
      while (rest.length > columns) {
        if (line) {
          lines.push(line);
          line = '';
        }
        lines.push(rest.slice(0, columns));
        rest = rest.slice(columns);
      }
      if (rest === '') {
        continue;
      }

      if (!line) {
        line = rest;
      } else if (line.length + 1 + rest.length <= columns) {
        line += ` ${rest}`;
      } else {
        lines.push(line);
        line = rest;
      }
    }
    if (line) {
      lines.push(line);
    }
  }

  return lines;
}

/**
 * Wrapped text plus the index of the first visible line.
 */
export class TextWindow {
  private text = '';
  private lines: string[] = [];
  private offset = 0;

  constructor(private width: number) {}

  get lineCount(): number {
    return this.lines.length;
  }

  get scrollOffset(): number {
    return this.offset;
  }

  setText(text: string): void {
    this.text = text;
    this.rewrap();
  }

  setWidth(width: number): void {
    this.width = width;
    this.rewrap();
  }

  scrollTo(offset: number): void {
    this.offset = this.clamp(offset);
  }

  visibleLines(height: number): string[] {
    return this.lines.slice(this.offset, this.offset + Math.max(0, height));
  }

  private rewrap(): void {
    this.lines = wrapText(this.text, this.width);
    this.offset = this.clamp(this.offset);
  }

  private clamp(offset: number): number {
    return Math.max(0, Math.min(offset, this.lines.length - 1));
  }
}
