import type { EbookDocument } from '../ebook/types.ts';
import { events } from '../events/mod.ts';
import type { SessionState } from '../session/types.ts';
import type { Screen } from '../ui/types.ts';
import { Book, DEFAULT_WIDTH } from './book.ts';
import { ChapterPage, TOC_URL, TocPage } from './page.ts';

export interface LoadBookOptions {
  session?: SessionState;
}

/**
 * Builds the table of contents and one chapter page per entry, in contents
 * order, then either restores the session or opens the first chapter. Any
 * chapter that cannot be resolved aborts the whole load.
 */
export async function loadBook(document: EbookDocument, screen: Screen, options: LoadBookOptions = {}): Promise<Book> {
  const { session } = options;
  const book = new Book(screen, { title: document.title, width: session?.width ?? DEFAULT_WIDTH });
  screen.setTitle(book.title);

  const toc = document.tableOfContents();
  book.setToc(TocPage.create(screen, toc, book.width, (index) => book.goToPage(index)));

  const pageUrls = new Set<string>([TOC_URL]);
  for (const [index, entry] of toc.entries()) {
    const content = await document.chapterContent(entry.url);
    const initialOffset = session?.offsets.get(index) ?? 0;
    const url = uniquePageUrl(entry.url, index, pageUrls);

    book.addChapter(ChapterPage.create(screen, {
      url,
      index,
      name: entry.name,
      content,
      chapterCount: toc.length,
      width: book.width,
      initialOffset,
    }));

    events.emit({ type: 'chapter:load', index, url, initialOffset });
  }

  if (session) {
    book.restore(session);
  } else {
    book.goToDefaultPage();
  }

  return book;
}

/**
 * Several contents entries may point at the same document. The first keeps
 * its url as the page key, later ones get the entry index appended.
 */
function uniquePageUrl(url: string, index: number, used: Set<string>): string {
  let pageUrl = url;
  for (let suffix = index; used.has(pageUrl); suffix++) {
    pageUrl = `${url}@${suffix}`;
  }
  used.add(pageUrl);
  return pageUrl;
}
