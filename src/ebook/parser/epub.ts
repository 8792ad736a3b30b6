import { readFile } from 'node:fs/promises';
import { basename, posix } from 'node:path';
import { configure, TextWriter, Uint8ArrayReader, ZipReader } from '@zip.js/zip.js';
import type { Entry } from '@zip.js/zip.js';
import { XMLParser } from 'fast-xml-parser';
import { pathExists } from 'fs-extra/esm';
import { HTMLElement, parse } from 'node-html-parser';
import { ReaderError } from '../../errors.ts';
import type { ReaderErrorCode } from '../../errors.ts';
import { ArraySpineCursor } from '../cursor.ts';
import { locate } from '../locator.ts';
import type { Parser } from '../parser.ts';
import { collapseWhitespace, elementChildren, htmlToText, tagName } from '../text.ts';
import type { EbookDocument, ManifestItem, OpfPackage, SpineCursor, TocEntry } from '../types.ts';

configure({ useWebWorkers: false });

const CONTAINER_PATH = 'META-INF/container.xml';
const NCX_MEDIA_TYPE = 'application/x-dtbncx+xml';

const ncxParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name: string) => name === 'navPoint',
});

export class EpubParser implements Parser {
  async open(path: string): Promise<EbookDocument> {
    if (!(await pathExists(path))) {
      throw new ReaderError('EPUB_FILE_NOT_FOUND', `EPUB file does not exist: ${path}`, { source: path });
    }

    const file = await readFile(path);
    return openEpub(new Uint8Array(file), basename(path));
  }
}

export async function openEpub(data: Uint8Array, fallbackTitle: string): Promise<EpubDocument> {
  const zipReader = new ZipReader(new Uint8ArrayReader(data));

  try {
    const entries = await zipReader.getEntries();

    const opfPath = await findOpfFile(entries);
    const opf = parseOpf(await extractFile(entries, opfPath, 'EPUB_OPF_MISSING'), opfPath);
    const toc = await extractToc(entries, opf);

    return new EpubDocument(zipReader, entries, opf.title || fallbackTitle, toc, new ArraySpineCursor(opf.spine));
  } catch (error) {
    await zipReader.close();
    throw error;
  }
}

export class EpubDocument implements EbookDocument {
  constructor(
    private readonly zipReader: ZipReader<Uint8Array>,
    private readonly entries: Entry[],
    readonly title: string,
    private readonly toc: TocEntry[],
    private readonly cursor: SpineCursor,
  ) {}

  tableOfContents(): TocEntry[] {
    return this.toc.map((entry) => ({ ...entry }));
  }

  async chapterContent(url: string): Promise<string> {
    locate(this.cursor, stripFragment(url));
    return htmlToText(await extractFile(this.entries, this.cursor.currentURL()));
  }

  async close(): Promise<void> {
    await this.zipReader.close();
  }
}

export function stripFragment(url: string): string {
  const hashIndex = url.indexOf('#');
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

async function findOpfFile(entries: Entry[]): Promise<string> {
  const containerContent = await extractFile(entries, CONTAINER_PATH, 'EPUB_CONTAINER_MISSING');

  const opfMatch = containerContent.match(/<rootfile[^>]+full-path="([^"]+)"/);
  if (!opfMatch?.[1]) {
    throw new ReaderError('EPUB_OPF_MISSING', 'Invalid EPUB: Cannot find OPF file path', { source: CONTAINER_PATH });
  }

  return opfMatch[1];
}

async function extractFile(entries: Entry[], filePath: string, code: ReaderErrorCode = 'EPUB_ENTRY_MISSING'): Promise<string> {
  const entry = entries.find((e) => e.filename === filePath);
  if (!entry || !('getData' in entry) || !entry.getData) {
    throw new ReaderError(code, `File not found in EPUB: ${filePath}`, { source: filePath });
  }

  return await entry.getData(new TextWriter());
}

function parseOpf(opfContent: string, opfPath: string): OpfPackage {
  const baseDir = posix.dirname(opfPath);

  const manifest = Array.from(opfContent.matchAll(/<item\b[^>]*>/g)).flatMap(([tag]): ManifestItem[] => {
    const attributes = parseAttributes(tag);
    const id = attributes.get('id');
    const href = attributes.get('href');
    const mediaType = attributes.get('media-type');
    if (!id || !href || !mediaType) {
      return [];
    }
    return [{ id, href: resolveHref(baseDir, href), mediaType, properties: attributes.get('properties') }];
  });
  const manifestById = new Map(manifest.map((item) => [item.id, item]));

  const spine = Array.from(opfContent.matchAll(/<itemref\b[^>]*>/g))
    .map(([tag]) => {
      const idref = parseAttributes(tag).get('idref');
      return idref ? manifestById.get(idref)?.href : undefined;
    })
    .filter((href): href is string => href !== undefined);

  const spineTag = opfContent.match(/<spine\b[^>]*>/)?.[0];
  const ncxId = spineTag ? parseAttributes(spineTag).get('toc') : undefined;
  const ncx = (ncxId ? manifestById.get(ncxId) : undefined) ?? manifest.find((item) => item.mediaType === NCX_MEDIA_TYPE);
  const nav = manifest.find((item) => item.properties?.split(/\s+/).includes('nav'));

  return {
    title: matchText(opfContent, 'dc:title'),
    spine,
    navHref: nav?.href,
    ncxHref: ncx?.href,
  };
}

function matchText(content: string, tag: string): string | undefined {
  const raw = content.match(new RegExp(`<${tag}[^>]*>([^<]+)<`))?.[1];
  if (!raw) {
    return undefined;
  }
  return collapseWhitespace(parse(raw).text) || undefined;
}

function parseAttributes(tag: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of tag.matchAll(/([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
    const [, name, doubleQuoted, singleQuoted] = match;
    if (name) {
      attributes.set(name, doubleQuoted ?? singleQuoted ?? '');
    }
  }
  return attributes;
}

function resolveHref(baseDir: string, href: string): string {
  const hashIndex = href.indexOf('#');
  const path = hashIndex === -1 ? href : href.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? '' : href.slice(hashIndex);

  return posix.normalize(posix.join(baseDir, decodePath(path))) + fragment;
}

function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    // Not percent-encoded after all
    return path;
  }
}

async function extractToc(entries: Entry[], opf: OpfPackage): Promise<TocEntry[]> {
  if (opf.navHref) {
    const toc = parseNavDocument(await extractFile(entries, opf.navHref), posix.dirname(opf.navHref));
    if (toc.length > 0) {
      return toc;
    }
  }

  if (opf.ncxHref) {
    const toc = parseNcxDocument(await extractFile(entries, opf.ncxHref), posix.dirname(opf.ncxHref));
    if (toc.length > 0) {
      return toc;
    }
  }

  // No usable navigation document: one entry per spine item
  return opf.spine.map((url, index) => ({ name: `Section ${index + 1}`, url, depth: 0 }));
}

function parseNavDocument(xhtml: string, baseDir: string): TocEntry[] {
  const tocNav = parse(xhtml)
    .querySelectorAll('nav')
    .find((nav) => (nav.getAttribute('epub:type') ?? nav.getAttribute('role') ?? '').includes('toc'));
  const list = (tocNav ? elementChildren(tocNav) : []).find((child) => tagName(child) === 'ol');

  return list ? parseNavList(list, baseDir, 0) : [];
}

function parseNavList(list: HTMLElement, baseDir: string, depth: number): TocEntry[] {
  return elementChildren(list)
    .filter((item) => tagName(item) === 'li')
    .flatMap((item) => {
      const anchor = elementChildren(item).find((child) => tagName(child) === 'a');
      const href = anchor?.getAttribute('href');
      const nested = elementChildren(item).find((child) => tagName(child) === 'ol');

      const entries: TocEntry[] = anchor && href
        ? [{ name: collapseWhitespace(anchor.text) || href, url: resolveHref(baseDir, href), depth }]
        : [];

      return nested ? [...entries, ...parseNavList(nested, baseDir, depth + 1)] : entries;
    });
}

function parseNcxDocument(xml: string, baseDir: string): TocEntry[] {
  const doc: unknown = ncxParser.parse(xml);
  return parseNavPoints(child(child(child(doc, 'ncx'), 'navMap'), 'navPoint'), baseDir, 0);
}

function parseNavPoints(points: unknown, baseDir: string, depth: number): TocEntry[] {
  if (!Array.isArray(points)) {
    return [];
  }

  return points.flatMap((point: unknown) => {
    const src = child(child(point, 'content'), '@_src');
    const name = collapseWhitespace(textOf(child(child(point, 'navLabel'), 'text')));

    const entries: TocEntry[] = typeof src === 'string' && src !== ''
      ? [{ name: name || src, url: resolveHref(baseDir, src), depth }]
      : [];

    return [...entries, ...parseNavPoints(child(point, 'navPoint'), baseDir, depth + 1)];
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
  return isRecord(node) ? node[key] : undefined;
}

function textOf(node: unknown): string {
  if (typeof node === 'string') {
    return node;
  }
  const text = child(node, '#text');
  return typeof text === 'string' ? text : '';
}
