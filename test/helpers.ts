import { configure, TextReader, Uint8ArrayWriter, ZipWriter } from '@zip.js/zip.js';
import { ReaderError } from '../src/errors.ts';
import type { EbookDocument, SpineCursor, TocEntry } from '../src/ebook/types.ts';
import { Book } from '../src/reader/book.ts';
import { ChapterPage, TocPage } from '../src/reader/page.ts';
import type { Frame, KeyHandler, Label, ListView, Screen, ScreenUpdate, TextView } from '../src/ui/types.ts';

configure({ useWebWorkers: false });

export class FakeFrame implements Frame {
  readonly widths: number[] = [];

  constructor(public width: number) {}

  setColumnWidth(width: number): void {
    this.width = width;
    this.widths.push(width);
  }
}

export class FakeLabel implements Label {
  text = '';
  writes = 0;

  setText(text: string): void {
    this.text = text;
    this.writes++;
  }
}

/** Unwrapped text: one line per newline. Offsets clamp like a real view. */
export class FakeTextView implements TextView {
  private lines: string[] = [];
  private offset = 0;
  private readonly hooks: Array<() => void> = [];
  scrolls: number[] = [];

  constructor(public height = 20) {}

  setText(text: string): void {
    this.lines = text.split('\n');
    this.offset = this.clamp(this.offset);
  }

  getScrollOffset(): number {
    return this.offset;
  }

  scrollTo(offset: number): void {
    this.scrolls.push(offset);
    this.offset = this.clamp(offset);
  }

  getVisibleHeight(): number {
    return this.height;
  }

  getTotalLineCount(): number {
    return this.lines.length;
  }

  onBeforeRepaint(hook: () => void): void {
    this.hooks.push(hook);
  }

  repaint(): void {
    for (const hook of this.hooks) {
      hook();
    }
  }

  private clamp(offset: number): number {
    return Math.max(0, Math.min(offset, this.lines.length - 1));
  }
}

export class FakeListView implements ListView {
  readonly labels: string[] = [];
  private readonly handlers: Array<() => void> = [];
  private current = 0;

  addItem(label: string, onSelect: () => void): void {
    this.labels.push(label);
    this.handlers.push(onSelect);
  }

  setCurrentIndex(index: number): void {
    this.current = index;
  }

  getCurrentIndex(): number {
    return this.current;
  }

  getItemCount(): number {
    return this.labels.length;
  }

  select(index: number): void {
    this.handlers[index]?.();
  }
}

export interface FakeChapterSurface {
  frame: FakeFrame;
  text: FakeTextView;
  progress: FakeLabel;
}

export interface FakeTocSurface {
  frame: FakeFrame;
  list: FakeListView;
}

/** Runs queued updates immediately and records what the reader asked for. */
export class FakeScreen implements Screen {
  title = '';
  readonly chapters = new Map<string, FakeChapterSurface>();
  toc?: FakeTocSurface;
  readonly switches: string[] = [];
  updates = 0;
  renders = 0;
  stopped = false;
  onKey?: KeyHandler;
  private release?: () => void;

  setTitle(title: string): void {
    this.title = title;
  }

  createChapterSurface(url: string, width: number): FakeChapterSurface {
    const surface = { frame: new FakeFrame(width), text: new FakeTextView(), progress: new FakeLabel() };
    this.chapters.set(url, surface);
    return surface;
  }

  createTocSurface(_url: string, width: number): FakeTocSurface {
    const surface = { frame: new FakeFrame(width), list: new FakeListView() };
    this.toc = surface;
    return surface;
  }

  switchToPage(url: string): void {
    this.switches.push(url);
  }

  queueUpdate(update: ScreenUpdate): void {
    this.updates++;
    if (update()) {
      this.renders++;
    }
  }

  run(onKey: KeyHandler): Promise<void> {
    this.onKey = onKey;
    return new Promise((resolve) => {
      this.release = resolve;
    });
  }

  stop(): void {
    this.stopped = true;
    this.release?.();
  }

  get visible(): string | undefined {
    return this.switches[this.switches.length - 1];
  }

  chapter(url: string): FakeChapterSurface {
    const surface = this.chapters.get(url);
    if (!surface) {
      throw new Error(`No chapter surface for ${url}`);
    }
    return surface;
  }

  tocList(): FakeListView {
    if (!this.toc) {
      throw new Error('No table of contents surface');
    }
    return this.toc.list;
  }
}

export class FakeDocument implements EbookDocument {
  closed = false;
  readonly requests: string[] = [];

  constructor(
    readonly title: string,
    private readonly toc: TocEntry[],
    private readonly contents: ReadonlyMap<string, string>,
  ) {}

  tableOfContents(): TocEntry[] {
    return this.toc.map((entry) => ({ ...entry }));
  }

  async chapterContent(url: string): Promise<string> {
    this.requests.push(url);
    const content = this.contents.get(url);
    if (content === undefined) {
      throw new ReaderError('CHAPTER_NOT_FOUND', `Chapter not found in spine: ${url}`, { source: url });
    }
    return content;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Counts the steps a cursor takes. */
export class CountingCursor implements SpineCursor {
  steps = 0;

  constructor(private readonly inner: SpineCursor) {}

  currentURL(): string {
    return this.inner.currentURL();
  }

  next(): void {
    this.steps++;
    this.inner.next();
  }

  previous(): void {
    this.steps++;
    this.inner.previous();
  }

  isFirst(): boolean {
    return this.inner.isFirst();
  }

  isLast(): boolean {
    return this.inner.isLast();
  }
}

export function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, index) => `line ${index + 1}`).join('\n');
}

export function chapterEntries(count: number): TocEntry[] {
  return Array.from({ length: count }, (_, index) => ({ name: `Chapter ${index + 1}`, url: `ch${index + 1}.xhtml`, depth: 0 }));
}

export interface TestBookOptions {
  width?: number;
  lineCount?: number;
  offsets?: ReadonlyMap<number, number>;
}

/** A book with `chapterCount` chapters of `lineCount` lines each, nothing shown yet. */
export function buildBook(chapterCount: number, options: TestBookOptions = {}): { screen: FakeScreen; book: Book; entries: TocEntry[] } {
  const screen = new FakeScreen();
  const book = new Book(screen, { title: 'Test Book', width: options.width });
  const entries = chapterEntries(chapterCount);

  book.setToc(TocPage.create(screen, entries, book.width, (index) => book.goToPage(index)));
  entries.forEach((entry, index) => {
    book.addChapter(ChapterPage.create(screen, {
      url: entry.url,
      index,
      name: entry.name,
      content: numberedLines(options.lineCount ?? 200),
      chapterCount,
      width: book.width,
      initialOffset: options.offsets?.get(index),
    }));
  });

  return { screen, book, entries };
}

export async function buildZip(files: Record<string, string>): Promise<Uint8Array> {
  const writer = new ZipWriter(new Uint8ArrayWriter());
  for (const [name, content] of Object.entries(files)) {
    await writer.add(name, new TextReader(content));
  }
  return await writer.close();
}

export const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;

export interface OpfOptions {
  title?: string;
  nav?: boolean;
  ncx?: boolean;
}

export function contentOpf(options: OpfOptions = {}): string {
  const title = options.title === undefined ? '' : `<dc:title>${options.title}</dc:title>`;
  const nav = options.nav ? '<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>' : '';
  const ncx = options.ncx ? '<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>' : '';

  return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="id">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">${title}<dc:creator>Test Author</dc:creator></metadata>
  <manifest>
    ${nav}
    ${ncx}
    <item id="ch1" href="text/ch1.xhtml" media-type="application/xhtml+xml"/>
    <item id="ch2" href="text/ch2.xhtml" media-type="application/xhtml+xml"/>
  </manifest>
  <spine${options.ncx ? ' toc="ncx"' : ''}>
    <itemref idref="ch1"/>
    <itemref idref="ch2"/>
  </spine>
</package>`;
}

export const NAV_XHTML = `<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head><title>Contents</title></head>
<body>
  <nav epub:type="toc">
    <ol>
      <li><a href="text/ch1.xhtml">Chapter One</a></li>
      <li><a href="text/ch2.xhtml#start">Chapter Two</a>
        <ol>
          <li><a href="text/ch2.xhtml#part">Part A</a></li>
        </ol>
      </li>
    </ol>
  </nav>
</body>
</html>`;

export const TOC_NCX = `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <navMap>
    <navPoint id="n1" playOrder="1">
      <navLabel><text>Opening</text></navLabel>
      <content src="text/ch1.xhtml"/>
      <navPoint id="n2" playOrder="2">
        <navLabel><text>Inner</text></navLabel>
        <content src="text/ch2.xhtml"/>
      </navPoint>
    </navPoint>
  </navMap>
</ncx>`;

export const CHAPTER_ONE = `<html><head><title>One</title><style>p { margin: 0; }</style></head>
<body><h1>Chapter One</h1><p>First   paragraph
 text.</p><p>Line one<br/>Line two</p></body></html>`;

export const CHAPTER_TWO = '<html><body><p>Second chapter.</p></body></html>';

export interface EpubOptions extends OpfOptions {
  /** Replaces the default NCX; implies `ncx`. */
  tocNcx?: string;
}

export function epubFiles(options: EpubOptions = {}): Record<string, string> {
  const ncx = options.ncx === true || options.tocNcx !== undefined;
  const files: Record<string, string> = {
    mimetype: 'application/epub+zip',
    'META-INF/container.xml': CONTAINER_XML,
    'OEBPS/content.opf': contentOpf({ ...options, ncx }),
    'OEBPS/text/ch1.xhtml': CHAPTER_ONE,
    'OEBPS/text/ch2.xhtml': CHAPTER_TWO,
  };
  if (options.nav) {
    files['OEBPS/nav.xhtml'] = NAV_XHTML;
  }
  if (ncx) {
    files['OEBPS/toc.ncx'] = options.tocNcx ?? TOC_NCX;
  }
  return files;
}
