import blessed from 'blessed';
import type { Widgets } from 'blessed';
import type {
  ChapterSurface,
  Frame,
  KeyHandler,
  Label,
  Screen,
  ScreenUpdate,
  TextView,
  TocSurface,
} from './types.ts';
import { keySymbol } from './keys.ts';
import { TerminalListView } from './list.ts';
import { UpdateQueue } from './queue.ts';
import { TextWindow } from './window.ts';

const BACKGROUND = '#002833';
const TITLE_HEIGHT = 2;

export interface TerminalScreenOptions {
  onError?: (error: unknown) => void;
}

class WindowedTextView implements TextView {
  private readonly window: TextWindow;
  private readonly hooks: Array<() => void> = [];

  constructor(private readonly box: Widgets.BoxElement, width: number) {
    this.window = new TextWindow(width);
    this.box.on('prerender', () => {
      this.paint();
      for (const hook of this.hooks) {
        hook();
      }
    });
  }

  setText(text: string): void {
    this.window.setText(text);
  }

  getScrollOffset(): number {
    return this.window.scrollOffset;
  }

  scrollTo(offset: number): void {
    this.window.scrollTo(offset);
  }

  getVisibleHeight(): number {
    const height = this.box.height;
    return typeof height === 'number' ? height : 0;
  }

  getTotalLineCount(): number {
    return this.window.lineCount;
  }

  onBeforeRepaint(hook: () => void): void {
    this.hooks.push(hook);
  }

  setWrapWidth(width: number): void {
    this.window.setWidth(width);
  }

  private paint(): void {
    this.box.setContent(this.window.visibleLines(this.getVisibleHeight()).join('\n'));
  }
}

class ColumnFrame implements Frame {
  constructor(
    private readonly column: Widgets.BoxElement,
    private readonly text?: WindowedTextView,
  ) {}

  setColumnWidth(width: number): void {
    this.column.width = width;
    this.text?.setWrapWidth(width);
  }
}

class BoxLabel implements Label {
  constructor(private readonly box: Widgets.BoxElement) {}

  setText(text: string): void {
    this.box.setContent(text);
  }
}

interface TerminalPage {
  container: Widgets.BoxElement;
  focus: Widgets.BoxElement;
}

export class TerminalScreen implements Screen {
  private readonly screen: Widgets.Screen;
  private readonly titleBox: Widgets.BoxElement;
  private readonly body: Widgets.BoxElement;
  private readonly pages = new Map<string, TerminalPage>();
  private readonly updates: UpdateQueue;
  private release?: () => void;

  constructor(options: TerminalScreenOptions = {}) {
    const onError = options.onError ?? ((error: unknown) => {
      this.stop();
      console.error('Error in screen update:', error);
    });
    this.updates = new UpdateQueue(() => this.screen.render(), onError);

    this.screen = blessed.screen({ smartCSR: true, fullUnicode: true });
    this.titleBox = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: TITLE_HEIGHT,
      align: 'center',
      style: { bg: BACKGROUND },
    });
    this.body = blessed.box({
      parent: this.screen,
      top: TITLE_HEIGHT,
      left: 0,
      width: '100%',
      height: `100%-${TITLE_HEIGHT}`,
      style: { bg: BACKGROUND },
    });
  }

  setTitle(title: string): void {
    this.titleBox.setContent(title);
    this.screen.title = title;
  }

  createChapterSurface(url: string, width: number): ChapterSurface {
    const column = this.createColumn(width);
    const textBox = blessed.box({
      parent: column,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%-2',
      style: { bg: BACKGROUND },
    });
    const progressBox = blessed.box({
      parent: column,
      bottom: 0,
      left: 0,
      width: '100%',
      height: 1,
      align: 'center',
      style: { bg: BACKGROUND },
    });
    this.pages.set(url, { container: column, focus: textBox });

    const text = new WindowedTextView(textBox, width);
    return { frame: new ColumnFrame(column, text), text, progress: new BoxLabel(progressBox) };
  }

  createTocSurface(url: string, width: number): TocSurface {
    const column = this.createColumn(width);
    const list = blessed.list({
      parent: column,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%',
      // Keys reach the list through the reader's bindings only
      keys: false,
      mouse: true,
      style: { bg: BACKGROUND, selected: { inverse: true } },
    });
    this.pages.set(url, { container: column, focus: list });

    return { frame: new ColumnFrame(column), list: new TerminalListView(list, (update) => this.queueUpdate(update)) };
  }

  switchToPage(url: string): void {
    for (const [pageUrl, page] of this.pages) {
      if (pageUrl === url) {
        page.container.show();
        page.focus.focus();
      } else {
        page.container.hide();
      }
    }
  }

  queueUpdate(update: ScreenUpdate): void {
    this.updates.push(update);
  }

  run(onKey: KeyHandler): Promise<void> {
    return new Promise((resolve) => {
      this.release = resolve;
      this.screen.on('keypress', (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) => {
        const symbol = keySymbol(ch, key);
        this.queueUpdate(() => onKey(symbol));
      });
      this.screen.render();
    });
  }

  stop(): void {
    if (this.updates.isClosed) {
      return;
    }
    this.updates.close();
    this.screen.destroy();
    this.release?.();
  }

  private createColumn(width: number): Widgets.BoxElement {
    return blessed.box({
      parent: this.body,
      top: 0,
      left: 'center',
      width,
      height: '100%',
      hidden: true,
      style: { bg: BACKGROUND },
    });
  }
}
