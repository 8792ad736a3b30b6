export { TerminalScreen } from './terminal.ts';
export type { TerminalScreenOptions } from './terminal.ts';
export { keySymbol } from './keys.ts';
export type { KeyPress } from './keys.ts';
export { TerminalListView } from './list.ts';
export type { SelectableList } from './list.ts';
export { UpdateQueue } from './queue.ts';
export { TextWindow, wrapText } from './window.ts';
export type {
  ChapterSurface,
  Frame,
  KeyHandler,
  Label,
  ListView,
  Screen,
  ScreenUpdate,
  TextView,
  TocSurface,
} from './types.ts';
