/**
 * HTML to Markdown Converter
 * Converts a page's content region to Markdown with an outline and its
 * outbound links
 */

import { createHash } from 'crypto';
import TurndownService from 'turndown';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type {
  ConvertedDocument,
  HeadingAnchor,
  LinkOccurrence,
  OutboundLink,
} from '../types/docs.js';
import type { UrlResolver } from './resolver.js';
import {
  HEADING_SELECTOR,
  anchorIds,
  collapseWhitespace,
  extractTitle,
  findFragmentTarget,
  headingForTarget,
  headingLevel,
  isBlank,
  parseDocument,
  rewriteLinks,
  selectMainContent,
  walkElements,
} from './extractor.js';

export interface ConvertOptions {
  /** Canonical URL of the page, used to resolve its relative links */
  url: string;
  fragment?: string;
}

const HEADING_ATTR = 'data-heading-index';
const MARKER_OPEN = '\uE000';
const MARKER_CLOSE = '\uE001';
const MARKER_PATTERN = /\uE000(\d+)\uE001/g;

interface PageContext {
  $: CheerioAPI;
  title: string;
  fingerprint: string;
}

type HeadingDraft = Omit<HeadingAnchor, 'offset'>;

export class DocumentConverter {
  private readonly resolver: UrlResolver;
  private readonly turndown: TurndownService;

  constructor(resolver: UrlResolver) {
    this.resolver = resolver;
    this.turndown = createTurndownService();
  }

  /**
   * Convert raw page HTML.
   *
   * A fragment naming a heading yields that heading's section; one naming
   * any other element yields that element's subtree; an unknown fragment
   * yields the whole page.
   */
  convert(html: string, options: ConvertOptions): ConvertedDocument {
    const $ = parseDocument(html);
    const region = selectMainContent($);
    const context: PageContext = {
      $,
      title: extractTitle($),
      fingerprint: createHash('sha256').update(html).digest('hex'),
    };

    rewriteLinks($, region, options.url, this.resolver);
    const whole = this.render(context, region, false);

    const fragment = options.fragment;
    if (!fragment) {
      return whole;
    }

    const section = narrowDocument(whole, fragment);
    if (section) {
      return section;
    }

    const target = findFragmentTarget(region, fragment);
    if (!target || isBlank(target)) {
      return whole;
    }
    return this.render(context, target, true, fragment);
  }

  private render(
    context: PageContext,
    root: Element,
    outer: boolean,
    fragment?: string
  ): ConvertedDocument {
    const { $ } = context;

    const headingElements = $(root).find(HEADING_SELECTOR).toArray();
    const headingIndex = new Map<Element, number>();
    const drafts: HeadingDraft[] = headingElements.map((el, index) => {
      headingIndex.set(el, index);
      $(el).attr(HEADING_ATTR, String(index));
      return { level: headingLevel(el), text: collapseWhitespace($(el).text()), anchors: [] };
    });

    const seenAnchors = new Set<string>();
    const links: OutboundLink[] = [];
    const linkIndex = new Map<string, number>();
    const occurrences: LinkOccurrence[] = [];
    let currentHeading = -1;

    for (const el of walkElements(root)) {
      for (const id of anchorIds(el)) {
        if (seenAnchors.has(id)) {
          continue;
        }
        seenAnchors.add(id);
        const heading = headingForTarget(el);
        const target = heading ? headingIndex.get(heading) : undefined;
        if (target !== undefined) {
          drafts[target]?.anchors.push(id);
        }
      }

      currentHeading = headingIndex.get(el) ?? currentHeading;

      const href = el.name === 'a' ? el.attribs['href'] : undefined;
      if (href) {
        const text = collapseWhitespace($(el).text());
        const key = `${text}\0${href}`;
        let link = linkIndex.get(key);
        if (link === undefined) {
          link = links.length;
          linkIndex.set(key, link);
          links.push({ text, url: href });
        }
        occurrences.push({ link, heading: currentHeading });
      }
    }

    const source = outer ? $.html(root) : ($(root).html() ?? '');
    const { body, offsets } = stripHeadingMarkers(this.turndown.turndown(source), drafts.length);

    // Headings turndown dropped as blank start where the next one does
    const resolved = new Array<number>(drafts.length).fill(body.length);
    let nextOffset = body.length;
    for (let index = drafts.length - 1; index >= 0; index--) {
      nextOffset = offsets[index] ?? nextOffset;
      resolved[index] = nextOffset;
    }
    const headings: HeadingAnchor[] = drafts.map((draft, index) => ({
      ...draft,
      offset: resolved[index] ?? body.length,
    }));

    return freezeDocument({
      title: context.title,
      body,
      links,
      fingerprint: context.fingerprint,
      outline: { headings, occurrences },
      ...(fragment ? { fragment } : {}),
    });
  }
}

/**
 * Section of a converted page selected by a heading anchor: the heading
 * up to the next heading of the same or a higher level.
 *
 * Returns undefined when no heading answers to the fragment.
 */
export function narrowDocument(doc: ConvertedDocument, fragment: string): ConvertedDocument | undefined {
  const headings = doc.outline.headings;
  const start = headings.findIndex((heading) => heading.anchors.includes(fragment));
  const first = headings[start];
  if (!first) {
    return undefined;
  }

  const stopIndex = headings.findIndex((heading, index) => index > start && heading.level <= first.level);
  const end = stopIndex < 0 ? headings.length : stopIndex;
  const stopOffset = headings[stopIndex]?.offset ?? doc.body.length;
  const body = doc.body.slice(first.offset, stopOffset).trimEnd();

  const sectionHeadings = headings.slice(start, end).map((heading) => ({
    ...heading,
    offset: Math.min(heading.offset - first.offset, body.length),
  }));

  const links: OutboundLink[] = [];
  const remapped = new Map<number, number>();
  const occurrences: LinkOccurrence[] = [];
  for (const occurrence of doc.outline.occurrences) {
    if (occurrence.heading < start || occurrence.heading >= end) {
      continue;
    }
    let link = remapped.get(occurrence.link);
    if (link === undefined) {
      const source = doc.links[occurrence.link];
      if (!source) {
        continue;
      }
      link = links.length;
      remapped.set(occurrence.link, link);
      links.push(source);
    }
    occurrences.push({ link, heading: occurrence.heading - start });
  }

  return freezeDocument({
    title: doc.title,
    body,
    links,
    fingerprint: doc.fingerprint,
    outline: { headings: sectionHeadings, occurrences },
    fragment,
  });
}

/**
 * Remove heading markers, recording where each heading line starts.
 * The line start keeps any list or blockquote prefix with its heading.
 */
function stripHeadingMarkers(
  markdown: string,
  count: number
): { body: string; offsets: Array<number | undefined> } {
  const offsets = new Array<number | undefined>(count).fill(undefined);
  let removed = 0;
  const body = markdown.replace(MARKER_PATTERN, (marker: string, index: string, position: number) => {
    offsets[Number(index)] = markdown.lastIndexOf('\n', position - 1) + 1 - removed;
    removed += marker.length;
    return '';
  });
  return { body, offsets };
}

/**
 * Freeze a document and everything it holds
 */
export function freezeDocument(doc: ConvertedDocument): ConvertedDocument {
  doc.links.forEach((link) => Object.freeze(link));
  doc.outline.headings.forEach((heading) => {
    Object.freeze(heading.anchors);
    Object.freeze(heading);
  });
  doc.outline.occurrences.forEach((occurrence) => Object.freeze(occurrence));
  Object.freeze(doc.links);
  Object.freeze(doc.outline.headings);
  Object.freeze(doc.outline.occurrences);
  Object.freeze(doc.outline);
  return Object.freeze(doc);
}

/**
 * Turndown configured for the archive: ATX headings with offset markers,
 * fenced code for every `pre`, and pipe tables
 */
export function createTurndownService(): TurndownService {
  const service = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
    emDelimiter: '*',
  });

  service.remove(['script', 'style', 'noscript']);

  service.addRule('markedHeading', {
    filter: ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'],
    replacement: (content, node) => {
      const level = Number(node.nodeName.charAt(1));
      const index = node.getAttribute(HEADING_ATTR);
      const marker = index === null ? '' : `${MARKER_OPEN}${index}${MARKER_CLOSE}`;
      return `\n\n${marker}${'#'.repeat(level)} ${collapseWhitespace(content)}\n\n`;
    },
  });

  service.addRule('preformatted', {
    filter: 'pre',
    replacement: (_content, node) => {
      const code = (node.textContent ?? '').replace(/\n+$/, '');
      const longestRun = Math.max(0, ...(code.match(/`+/g) ?? []).map((run) => run.length));
      const fence = '`'.repeat(Math.max(3, longestRun + 1));
      return `\n\n${fence}${codeLanguage(node)}\n${code}\n${fence}\n\n`;
    },
  });

  service.addRule('tableCell', {
    filter: ['th', 'td'],
    replacement: (content) => ` ${collapseWhitespace(content).replace(/\|/g, '\\|')} |`,
  });

  service.addRule('tableRow', {
    filter: 'tr',
    replacement: (content, node) => {
      const row = `\n|${content}\n`;
      if (!isFirstRow(node)) {
        return row;
      }
      const cells = Array.from(node.childNodes).filter(
        (child) => child.nodeName === 'TH' || child.nodeName === 'TD'
      ).length;
      return `${row}|${' --- |'.repeat(cells)}\n`;
    },
  });

  service.addRule('tableSection', {
    filter: ['thead', 'tbody', 'tfoot'],
    replacement: (content) => content,
  });

  service.addRule('table', {
    filter: 'table',
    replacement: (content) => `\n\n${content.trim()}\n\n`,
  });

  return service;
}

function codeLanguage(node: HTMLElement): string {
  const classes = [node.getAttribute('class'), node.querySelector('code')?.getAttribute('class')];
  for (const value of classes) {
    for (const token of (value ?? '').split(/\s+/)) {
      const match = /^(?:language-|lang-)?([\w+#-]+)$/.exec(token);
      if (match?.[1]) {
        return match[1];
      }
    }
  }
  return '';
}

function isFirstRow(row: HTMLElement): boolean {
  for (let parent = row.parentElement; parent; parent = parent.parentElement) {
    if (parent.nodeName === 'TABLE') {
      return parent.querySelector('tr') === row;
    }
  }
  return false;
}
