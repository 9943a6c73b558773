/**
 * HTML Extractor
 * Typed traversal over parsed corpus pages: chrome removal, main-region
 * selection, link rewriting and fragment targets
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isComment, isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { CanonicalLocator, SearchFields } from '../types/docs.js';
import { DocsError, ParseError } from '../errors/index.js';
import { withFragment, type UrlResolver } from './resolver.js';

/**
 * Layout chrome shared by every generated page of the archive
 */
export const CHROME_SELECTORS = [
  'div.header',
  'div.nav',
  'div.sidebar',
  'div.breadcrumbs',
  'div.ft',
  'div.footer',
  'div.qt-footer',
  'script',
  'style',
  'noscript',
];

/**
 * Candidate content regions, most specific first
 */
export const MAIN_REGION_SELECTORS = ['div.content.mainContent', 'div.mainContent', 'div.content', 'body'];

export const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6';

const HEADING_TAG = /^h([1-6])$/;

/**
 * Reject input that cannot be an HTML document at all
 */
export function assertParsable(html: string): void {
  if (html.trim() === '') {
    throw new ParseError('Document is empty');
  }
  if (html.includes('\0')) {
    throw new ParseError('Document contains binary data');
  }
  if (!/<[a-zA-Z!?/]/.test(html)) {
    throw new ParseError('Document contains no markup');
  }
}

/**
 * Parse a page and drop its layout chrome
 */
export function parseDocument(html: string): CheerioAPI {
  assertParsable(html);
  let $: CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    throw new ParseError('Failed to parse HTML document', undefined, error as Error);
  }
  $(CHROME_SELECTORS.join(', ')).remove();
  return $;
}

/**
 * First matching content region; the body when none matches
 */
export function selectMainContent($: CheerioAPI): Element {
  for (const selector of MAIN_REGION_SELECTORS) {
    const region = $(selector).first().get(0);
    if (region && isTag(region)) {
      return region;
    }
  }
  throw new ParseError('Document has no body');
}

/**
 * Text of the first h1, else the `<title>`, else empty
 */
export function extractTitle($: CheerioAPI): string {
  const heading = collapseWhitespace($('h1').first().text());
  if (heading) {
    return heading;
  }
  return collapseWhitespace($('title').first().text());
}

/**
 * Rewrite internal hrefs (and image sources) in place to canonical form.
 * Targets the resolver rejects are external and stay as they are.
 */
export function rewriteLinks(
  $: CheerioAPI,
  region: Element,
  pageUrl: string,
  resolver: UrlResolver
): void {
  $(region)
    .find('a[href]')
    .each((_, el) => {
      const href = $(el).attr('href');
      const target = href ? tryResolve(resolver, href, pageUrl) : undefined;
      if (target) {
        $(el).attr('href', withFragment(target.url, target.fragment));
      }
    });

  $(region)
    .find('img[src]')
    .each((_, el) => {
      const src = $(el).attr('src');
      const target = src ? tryResolve(resolver, src, pageUrl) : undefined;
      if (target) {
        $(el).attr('src', target.url);
      }
    });
}

function tryResolve(resolver: UrlResolver, href: string, pageUrl: string): CanonicalLocator | undefined {
  try {
    return resolver.resolve(href, pageUrl);
  } catch (error) {
    if (error instanceof DocsError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Elements under `node` (itself included) in document order
 */
export function* walkElements(node: AnyNode): Generator<Element> {
  if (isTag(node)) {
    yield node;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      yield* walkElements(child);
    }
  }
}

/**
 * Fragment ids an element answers to: its id, and its name for anchors
 */
export function anchorIds(el: Element): string[] {
  const ids: string[] = [];
  const id = el.attribs['id'];
  if (id) {
    ids.push(id);
  }
  const name = el.name === 'a' ? el.attribs['name'] : undefined;
  if (name && name !== id) {
    ids.push(name);
  }
  return ids;
}

/**
 * First element in document order carrying the fragment id
 */
export function findFragmentTarget(root: Element, fragment: string): Element | undefined {
  for (const el of walkElements(root)) {
    if (anchorIds(el).includes(fragment)) {
      return el;
    }
  }
  return undefined;
}

export function isHeading(el: Element): boolean {
  return HEADING_TAG.test(el.name);
}

export function headingLevel(el: Element): number {
  const match = HEADING_TAG.exec(el.name);
  return match?.[1] ? Number(match[1]) : 0;
}

/**
 * Heading whose section a fragment target selects.
 *
 * Handles the heading itself, an anchor nested in a heading, and the
 * empty `<a name>` the archive emits just before a heading.
 */
export function headingForTarget(el: Element): Element | undefined {
  if (isHeading(el)) {
    return el;
  }
  if (el.name !== 'a') {
    return undefined;
  }

  for (let parent = el.parent; parent; parent = parent.parent) {
    if (isTag(parent) && isHeading(parent)) {
      return parent;
    }
  }

  if (!isBlank(el)) {
    return undefined;
  }

  for (let sibling = el.next; sibling; sibling = sibling.next) {
    if (isComment(sibling) || (isText(sibling) && sibling.data.trim() === '')) {
      continue;
    }
    if (!isTag(sibling)) {
      return undefined;
    }
    if (isHeading(sibling)) {
      return sibling;
    }
    if (sibling.name !== 'a' || !isBlank(sibling)) {
      return undefined;
    }
  }
  return undefined;
}

/**
 * No text and no images underneath
 */
export function isBlank(el: Element): boolean {
  for (const node of walkElements(el)) {
    if (node.name === 'img') {
      return false;
    }
  }
  return collectText(el).length === 0;
}

/**
 * Whitespace-collapsed text nodes under `node`, in document order
 */
export function collectText(node: AnyNode, parts: string[] = []): string[] {
  if (isText(node)) {
    const text = collapseWhitespace(node.data);
    if (text) {
      parts.push(text);
    }
  } else if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
  return parts;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Title, heading text and body text of a page for the search index
 */
export function extractSearchFields(html: string): SearchFields {
  const $ = parseDocument(html);
  const region = selectMainContent($);
  const title = extractTitle($);

  const headingElements = $(region).find(HEADING_SELECTOR);
  const headings = headingElements
    .toArray()
    .map((el) => collectText(el).join(' '))
    .filter((text) => text !== '')
    .join(' ');

  headingElements.remove();
  const body = collectText(region).join(' ');

  return { title, headings, body };
}
