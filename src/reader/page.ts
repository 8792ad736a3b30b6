import type { TocEntry } from '../ebook/types.ts';
import type { ChapterSurface, Screen, TocSurface } from '../ui/types.ts';
import { ChapterProgress, chapterCaption } from './progress.ts';

export const TOC_INDEX = -1;
export const TOC_URL = 'TOC';

interface PageBase {
  index(): number;
  url(): string;
  setWidth(width: number): void;
}

export interface ChapterPageOptions {
  url: string;
  index: number;
  name: string;
  content: string;
  chapterCount: number;
  width: number;
  initialOffset?: number;
}

export class ChapterPage implements PageBase {
  readonly kind = 'chapter';

  constructor(
    private readonly chapterUrl: string,
    private readonly ordinal: number,
    private readonly surface: ChapterSurface,
    readonly progress: ChapterProgress,
  ) {}

  static create(screen: Screen, options: ChapterPageOptions): ChapterPage {
    const surface = screen.createChapterSurface(options.url, options.width);
    surface.text.setText(options.content);

    // Offsets must be in place before the page is first shown
    if (options.initialOffset && options.initialOffset > 0) {
      surface.text.scrollTo(options.initialOffset);
    }

    const progress = new ChapterProgress(
      surface.text,
      surface.progress,
      chapterCaption(options.name, options.index, options.chapterCount),
    );
    progress.attach(screen);

    return new ChapterPage(options.url, options.index, surface, progress);
  }

  index(): number {
    return this.ordinal;
  }

  url(): string {
    return this.chapterUrl;
  }

  setWidth(width: number): void {
    this.surface.frame.setColumnWidth(width);
    this.progress.invalidate();
  }

  getOffset(): number {
    return this.surface.text.getScrollOffset();
  }

  setOffset(offset: number): void {
    this.surface.text.scrollTo(offset);
  }

  visibleHeight(): number {
    return this.surface.text.getVisibleHeight();
  }

  lineCount(): number {
    return this.surface.text.getTotalLineCount();
  }
}

export class TocPage implements PageBase {
  readonly kind = 'toc';

  constructor(private readonly surface: TocSurface) {}

  static create(screen: Screen, entries: TocEntry[], width: number, onSelect: (index: number) => void): TocPage {
    const surface = screen.createTocSurface(TOC_URL, width);
    entries.forEach((entry, index) => {
      surface.list.addItem(tocLabel(entry), () => onSelect(index));
    });
    return new TocPage(surface);
  }

  index(): number {
    return TOC_INDEX;
  }

  url(): string {
    return TOC_URL;
  }

  setWidth(width: number): void {
    this.surface.frame.setColumnWidth(width);
  }

  setSelected(index: number): void {
    this.surface.list.setCurrentIndex(index);
  }

  getSelected(): number {
    return this.surface.list.getCurrentIndex();
  }

  itemCount(): number {
    return this.surface.list.getItemCount();
  }
}

export type Page = ChapterPage | TocPage;

export function tocLabel(entry: TocEntry): string {
  return `${'  '.repeat(entry.depth)}${entry.name}`;
}
