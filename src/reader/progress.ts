import type { Label, Screen, TextView } from '../ui/types.ts';

export function chapterCaption(name: string, index: number, chapterCount: number): string {
  const percent = chapterCount > 0 ? (100 * index) / chapterCount : 0;
  return `${JSON.stringify(name)} (${percent.toFixed(2)}%)`;
}

export function formatProgress(caption: string, offset: number, height: number, total: number): string {
  const last = Math.min(offset + height, total);
  const first = Math.min(offset + 1, last);
  return `${caption} - lines ${first}-${last}/${total}`;
}

/**
 * Keeps a chapter's progress label in line with its scroll offset.
 *
 * Refreshes are driven by repaints rather than by scroll events, and a refresh
 * that changes the label asks for one more repaint. The last offset seen is
 * memoized so that repaint does not start another round.
 */
export class ChapterProgress {
  private lastOffset?: number;

  constructor(
    private readonly text: TextView,
    private readonly label: Label,
    readonly caption: string,
  ) {
    this.label.setText(caption);
  }

  attach(screen: Pick<Screen, 'queueUpdate'>): void {
    this.text.onBeforeRepaint(() => screen.queueUpdate(() => this.refresh()));
  }

  refresh(): boolean {
    const offset = this.text.getScrollOffset();
    if (offset === this.lastOffset) {
      return false;
    }

    this.lastOffset = offset;
    this.label.setText(formatProgress(this.caption, offset, this.text.getVisibleHeight(), this.text.getTotalLineCount()));
    return true;
  }

  /** Forgets the memoized offset, e.g. after the text was re-wrapped. */
  invalidate(): void {
    this.lastOffset = undefined;
  }
}
