import { events } from '../events/mod.ts';
import { buildParser } from './parser.ts';
import type { EbookDocument } from './types.ts';

export async function open(inputFile: string): Promise<EbookDocument> {
  const parser = buildParser(inputFile);

  events.emit({ type: 'book:open:start', inputFile });

  const document = await parser.open(inputFile);

  events.emit({ type: 'book:open:complete', title: document.title, totalChapters: document.tableOfContents().length });

  return document;
}

export { ArraySpineCursor } from './cursor.ts';
export { locate } from './locator.ts';
export { htmlToText } from './text.ts';
export { EpubDocument, EpubParser, openEpub } from './parser/epub.ts';
export type { EbookDocument, SpineCursor, TocEntry } from './types.ts';
