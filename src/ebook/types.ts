export interface TocEntry {
  name: string;
  url: string;
  depth: number;
}

/**
 * Position-only iterator over the spine. There is no seek: callers move one
 * entry at a time and check the ends themselves.
 */
export interface SpineCursor {
  currentURL(): string;
  next(): void;
  previous(): void;
  isFirst(): boolean;
  isLast(): boolean;
}

export interface EbookDocument {
  readonly title: string;
  tableOfContents(): TocEntry[];
  chapterContent(url: string): Promise<string>;
  close(): Promise<void>;
}

export interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
  properties?: string;
}

export interface OpfPackage {
  title?: string;
  spine: string[];
  navHref?: string;
  ncxHref?: string;
}
