import type { KeyHandler } from '../ui/types.ts';
import { DEFAULT_WIDTH } from './book.ts';
import type { Book } from './book.ts';

export type ActionName =
  | 'quit'
  | 'nextChapter'
  | 'previousChapter'
  | 'toggleMenu'
  | 'lineDown'
  | 'lineUp'
  | 'pageDown'
  | 'pageUp'
  | 'goToStart'
  | 'goToEnd'
  | 'openSelected'
  | 'mark'
  | 'jumpToMark'
  | 'jumpScroll'
  | 'widen'
  | 'narrow'
  | 'resetWidth';

export const WIDTH_STEP = 5;

export const KEY_BINDINGS: ReadonlyMap<string, ActionName> = new Map<string, ActionName>([
  ['q', 'quit'],
  ['C-c', 'quit'],
  ['l', 'nextChapter'],
  ['h', 'previousChapter'],
  ['/', 'toggleMenu'],
  ['j', 'lineDown'],
  ['down', 'lineDown'],
  ['k', 'lineUp'],
  ['up', 'lineUp'],
  ['pagedown', 'pageDown'],
  ['C-f', 'pageDown'],
  ['pageup', 'pageUp'],
  ['C-b', 'pageUp'],
  ['home', 'goToStart'],
  ['g', 'goToStart'],
  ['end', 'goToEnd'],
  ['G', 'goToEnd'],
  ['enter', 'openSelected'],
  ['return', 'openSelected'],
  ['m', 'mark'],
  ["'", 'jumpToMark'],
  [' ', 'jumpScroll'],
  ['+', 'widen'],
  ['-', 'narrow'],
  ['=', 'resetWidth'],
]);

export function createActions(book: Book, quit: () => void): Record<ActionName, () => void> {
  return {
    quit,
    nextChapter: () => book.nextChapter(),
    previousChapter: () => book.previousChapter(),
    toggleMenu: () => book.toggleMenu(),
    lineDown: () => book.lineDown(),
    lineUp: () => book.lineUp(),
    pageDown: () => book.pageDown(),
    pageUp: () => book.pageUp(),
    goToStart: () => book.goToStart(),
    goToEnd: () => book.goToEnd(),
    openSelected: () => book.openSelected(),
    mark: () => book.mark(),
    jumpToMark: () => book.jumpToMark(),
    jumpScroll: () => book.jumpScroll(),
    widen: () => book.setWidth(book.width + WIDTH_STEP),
    narrow: () => book.setWidth(book.width - WIDTH_STEP),
    resetWidth: () => book.setWidth(DEFAULT_WIDTH),
  };
}

/**
 * Every key the reader understands is bound here, including the arrows and
 * Enter on the contents, so all input goes through the screen's update queue.
 * Keys without a binding are reported as not consumed.
 */
export function createKeyHandler(book: Book, quit: () => void): KeyHandler {
  const actions = createActions(book, quit);

  return (key: string) => {
    const name = KEY_BINDINGS.get(key);
    if (!name) {
      return false;
    }
    actions[name]();
    return true;
  };
}
