export { createActions, createKeyHandler, KEY_BINDINGS, WIDTH_STEP } from './actions.ts';
export type { ActionName } from './actions.ts';
export { Book, DEFAULT_WIDTH, MIN_WIDTH, SCROLL_STRIDE } from './book.ts';
export type { BookOptions, Mark } from './book.ts';
export { loadBook } from './loader.ts';
export type { LoadBookOptions } from './loader.ts';
export { ChapterPage, TOC_INDEX, TOC_URL, TocPage } from './page.ts';
export type { Page } from './page.ts';
export { ChapterProgress, chapterCaption, formatProgress } from './progress.ts';
