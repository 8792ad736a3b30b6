import { ReaderError } from '../errors.ts';
import { events } from '../events/mod.ts';
import type { SessionState } from '../session/types.ts';
import type { Screen } from '../ui/types.ts';
import { TOC_INDEX } from './page.ts';
import type { ChapterPage, Page, TocPage } from './page.ts';

export const DEFAULT_WIDTH = 80;
export const MIN_WIDTH = 10;
export const SCROLL_STRIDE = 80;

export interface BookOptions {
  title: string;
  width?: number;
}

export interface Mark {
  chapter: number;
  line: number;
}

export class Book {
  readonly title: string;
  readonly chapters: ChapterPage[] = [];
  private tocPage?: TocPage;
  private readonly pages = new Map<string, Page>();

  private currentIndex = TOC_INDEX;
  private menuContext = TOC_INDEX;
  private markChapter = -1;
  private markLine = -1;
  private displayWidth: number;

  constructor(private readonly screen: Screen, options: BookOptions) {
    this.title = options.title;
    this.displayWidth = options.width !== undefined && options.width >= MIN_WIDTH ? options.width : DEFAULT_WIDTH;
  }

  get current(): number {
    return this.currentIndex;
  }

  get width(): number {
    return this.displayWidth;
  }

  get toc(): TocPage {
    if (!this.tocPage) {
      throw new ReaderError('PAGE_NOT_FOUND', 'The table of contents has not been added yet');
    }
    return this.tocPage;
  }

  getMark(): Mark | undefined {
    if (this.markChapter === -1 || this.markLine === -1) {
      return undefined;
    }
    return { chapter: this.markChapter, line: this.markLine };
  }

  setToc(toc: TocPage): void {
    this.register(toc);
    this.tocPage = toc;
  }

  addChapter(chapter: ChapterPage): void {
    if (chapter.index() !== this.chapters.length) {
      throw new ReaderError('PAGE_OUT_OF_ORDER', `Chapter ${chapter.index()} added out of order, expected ${this.chapters.length}`, {
        source: chapter.url(),
      });
    }
    this.register(chapter);
    this.chapters.push(chapter);
  }

  page(url: string): Page {
    const page = this.pages.get(url);
    if (!page) {
      throw new ReaderError('PAGE_NOT_FOUND', `Page ${JSON.stringify(url)} not found`, { source: url });
    }
    return page;
  }

  indexToUrl(index: number): string {
    if (index === TOC_INDEX) {
      return this.toc.url();
    }

    const chapter = this.chapters[index];
    if (!chapter) {
      throw new ReaderError('PAGE_NOT_FOUND', `No chapter at index ${index}`);
    }
    return chapter.url();
  }

  goToPage(index: number): void {
    const url = this.indexToUrl(index);
    const from = this.currentIndex;

    this.currentIndex = index;
    if (index !== TOC_INDEX) {
      this.toc.setSelected(index);
    }
    this.screen.switchToPage(url);

    events.emit({ type: 'page:change', from, to: index });
  }

  goToDefaultPage(): void {
    this.goToPage(this.defaultPage());
  }

  nextChapter(): void {
    if (this.currentIndex + 1 >= this.chapters.length) {
      return;
    }
    this.goToPage(this.currentIndex + 1);
  }

  previousChapter(): void {
    if (this.currentIndex - 1 < TOC_INDEX) {
      return;
    }
    this.goToPage(this.currentIndex - 1);
  }

  toggleMenu(): void {
    if (this.currentIndex === TOC_INDEX) {
      this.goToPage(this.menuContext);
      return;
    }
    this.menuContext = this.currentIndex;
    this.goToPage(TOC_INDEX);
  }

  menuDown(): void {
    if (this.currentIndex !== TOC_INDEX) {
      return;
    }
    const selected = this.toc.getSelected();
    if (selected >= this.toc.itemCount() - 1) {
      return;
    }
    this.toc.setSelected(selected + 1);
  }

  menuUp(): void {
    if (this.currentIndex !== TOC_INDEX) {
      return;
    }
    const selected = this.toc.getSelected();
    if (selected <= 0) {
      return;
    }
    this.toc.setSelected(selected - 1);
  }

  /** Moves the contents selection, or scrolls the chapter by one line. */
  lineDown(): void {
    if (this.currentIndex === TOC_INDEX) {
      this.menuDown();
      return;
    }
    this.scrollBy(1);
  }

  lineUp(): void {
    if (this.currentIndex === TOC_INDEX) {
      this.menuUp();
      return;
    }
    this.scrollBy(-1);
  }

  pageDown(): void {
    const chapter = this.currentChapter();
    if (chapter) {
      this.scrollBy(Math.max(1, chapter.visibleHeight()));
    }
  }

  pageUp(): void {
    const chapter = this.currentChapter();
    if (chapter) {
      this.scrollBy(-Math.max(1, chapter.visibleHeight()));
    }
  }

  goToStart(): void {
    if (this.currentIndex === TOC_INDEX) {
      this.selectEntry(0);
      return;
    }
    this.scrollTo(0);
  }

  /** The chapter ends on a full screen of text when it is long enough. */
  goToEnd(): void {
    if (this.currentIndex === TOC_INDEX) {
      this.selectEntry(this.toc.itemCount() - 1);
      return;
    }
    const chapter = this.currentChapter();
    if (chapter) {
      this.scrollTo(Math.max(0, chapter.lineCount() - chapter.visibleHeight()));
    }
  }

  /** Opens the chapter selected in the contents. */
  openSelected(): void {
    if (this.currentIndex !== TOC_INDEX || this.chapters.length === 0) {
      return;
    }
    this.goToPage(this.toc.getSelected());
  }

  mark(): void {
    const chapter = this.currentChapter();
    if (!chapter) {
      return;
    }

    this.markChapter = this.currentIndex;
    this.markLine = chapter.getOffset();

    events.emit({ type: 'mark:set', chapter: this.markChapter, line: this.markLine });
  }

  jumpToMark(): void {
    const mark = this.getMark();
    const chapter = mark ? this.chapters[mark.chapter] : undefined;
    if (!mark || !chapter) {
      return;
    }

    // Skip the scroll when already there, it would only trigger a repaint
    if (chapter.getOffset() !== mark.line) {
      chapter.setOffset(mark.line);
    }
    if (this.currentIndex !== mark.chapter) {
      this.goToPage(mark.chapter);
    }
  }

  jumpScroll(): void {
    const chapter = this.currentChapter();
    if (!chapter) {
      return;
    }
    chapter.setOffset(chapter.getOffset() + SCROLL_STRIDE);
  }

  setWidth(width: number): void {
    if (width < MIN_WIDTH) {
      return;
    }

    this.displayWidth = width;
    for (const page of this.pages.values()) {
      page.setWidth(width);
    }

    events.emit({ type: 'width:change', width });
  }

  snapshot(): SessionState {
    const page = this.currentIndex === TOC_INDEX ? this.menuContext : this.currentIndex;

    const offsets = new Map<number, number>();
    for (const chapter of this.chapters) {
      const offset = chapter.getOffset();
      if (offset > 0) {
        offsets.set(chapter.index(), offset);
      }
    }

    return { page, offsets, width: this.displayWidth };
  }

  /**
   * Applies a stored session once every page exists. Chapter offsets are not
   * applied here: they are set while each chapter is constructed.
   */
  restore(state: SessionState): void {
    // A page outside the book means it changed since the session was written
    const page = this.isPageIndex(state.page) ? state.page : this.defaultPage();

    this.currentIndex = page;
    this.menuContext = page;
    this.setWidth(state.width);

    this.goToPage(page);
  }

  private scrollBy(delta: number): void {
    const chapter = this.currentChapter();
    if (chapter) {
      this.scrollTo(chapter.getOffset() + delta);
    }
  }

  private scrollTo(offset: number): void {
    const chapter = this.currentChapter();
    if (!chapter || chapter.getOffset() === Math.max(0, offset)) {
      return;
    }
    chapter.setOffset(Math.max(0, offset));
  }

  private selectEntry(index: number): void {
    if (index < 0 || index >= this.toc.itemCount()) {
      return;
    }
    this.toc.setSelected(index);
  }

  private currentChapter(): ChapterPage | undefined {
    return this.currentIndex === TOC_INDEX ? undefined : this.chapters[this.currentIndex];
  }

  private defaultPage(): number {
    return this.chapters.length > 0 ? 0 : TOC_INDEX;
  }

  private isPageIndex(index: number): boolean {
    return index === TOC_INDEX || (index >= 0 && index < this.chapters.length);
  }

  private register(page: Page): void {
    const url = page.url();
    if (this.pages.has(url)) {
      throw new ReaderError('DUPLICATE_PAGE', `Page ${JSON.stringify(url)} was already added`, { source: url });
    }
    this.pages.set(url, page);
  }
}
