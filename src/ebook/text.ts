import { HTMLElement, parse } from 'node-html-parser';

const BLOCK_TAGS = new Set(['p', 'dt', 'dd', 'li', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'blockquote', 'figcaption', 'td', 'th']);
const SKIPPED_TAGS = new Set(['head', 'script', 'style', 'title']);
const INLINE_TAGS = new Set([
  'a', 'abbr', 'b', 'bdi', 'bdo', 'big', 'br', 'cite', 'code', 'del', 'dfn', 'em', 'font', 'i', 'img', 'ins', 'kbd',
  'label', 'mark', 'q', 'rp', 'rt', 'ruby', 's', 'samp', 'small', 'span', 'strike', 'strong', 'sub', 'sup', 'time',
  'tt', 'u', 'var', 'wbr',
]);

/**
 * Converts chapter markup to plain text, one paragraph per block element,
 * paragraphs separated by a blank line. Text and inline markup sitting
 * directly in a container form one paragraph. Explicit line breaks inside a
 * block survive.
 */
export function htmlToText(html: string): string {
  const root = parse(html);
  const body = root.querySelector('body') ?? root;

  return parseElement(body)
    .filter((paragraph) => paragraph !== '')
    .join('\n\n');
}

export function tagName(element: HTMLElement): string {
  return (element.rawTagName ?? '').toLowerCase();
}

export function elementChildren(element: HTMLElement): HTMLElement[] {
  return element.childNodes.filter((node): node is HTMLElement => node instanceof HTMLElement);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/gu, ' ').trim();
}

function parseElement(element: HTMLElement): string[] {
  const tag = tagName(element);

  if (SKIPPED_TAGS.has(tag)) {
    return [];
  }

  if (tag === 'pre') {
    return [element.text.replace(/^\n+|\s+$/gu, '')];
  }

  if (BLOCK_TAGS.has(tag)) {
    return [blockText(element.innerHTML)];
  }

  const paragraphs: string[] = [];
  let inlineRun = '';
  for (const child of element.childNodes) {
    if (child instanceof HTMLElement && !INLINE_TAGS.has(tagName(child))) {
      paragraphs.push(blockText(inlineRun), ...parseElement(child));
      inlineRun = '';
    } else {
      inlineRun += child.toString();
    }
  }
  paragraphs.push(blockText(inlineRun));

  return paragraphs;
}

function blockText(html: string): string {
  // Source newlines are plain whitespace, only <br> breaks a line
  return html
    .split(/<br\b[^>]*>/iu)
    .map((segment) => collapseWhitespace(parse(segment).text))
    .filter((line) => line !== '')
    .join('\n');
}
