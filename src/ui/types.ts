export interface Frame {
  setColumnWidth(width: number): void;
}

export interface Label {
  setText(text: string): void;
}

export interface TextView {
  setText(text: string): void;
  getScrollOffset(): number;
  scrollTo(offset: number): void;
  getVisibleHeight(): number;
  getTotalLineCount(): number;
  onBeforeRepaint(hook: () => void): void;
}

export interface ListView {
  addItem(label: string, onSelect: () => void): void;
  setCurrentIndex(index: number): void;
  getCurrentIndex(): number;
  getItemCount(): number;
}

export interface ChapterSurface {
  frame: Frame;
  text: TextView;
  progress: Label;
}

export interface TocSurface {
  frame: Frame;
  list: ListView;
}

/**
 * Returns true when the update changed something that needs a redraw.
 */
export type ScreenUpdate = () => boolean;

/**
 * Receives one key symbol and returns true when it consumed it.
 */
export type KeyHandler = (key: string) => boolean;

export interface Screen {
  setTitle(title: string): void;
  createChapterSurface(url: string, width: number): ChapterSurface;
  createTocSurface(url: string, width: number): TocSurface;
  switchToPage(url: string): void;
  /**
   * Runs the update on the screen's serialized update queue. Key handling runs
   * on the same queue, so updates never interleave with navigation.
   */
  queueUpdate(update: ScreenUpdate): void;
  /**
   * Resolves once stop() has been called and the terminal is released.
   */
  run(onKey: KeyHandler): Promise<void>;
  stop(): void;
}
