/**
 * URL Resolver
 * Maps accepted URL forms onto canonical corpus locators
 */

import * as path from 'path';
import type { CanonicalLocator } from '../types/docs.js';
import { InvalidUrlError, NotAllowedError } from '../errors/index.js';

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

export class UrlResolver {
  private readonly base: URL;
  private readonly prefix: string;

  /**
   * @param baseUrl - absolute URL of the corpus root, e.g. `https://doc.qt.io/archives/qt-4.8/`
   */
  constructor(baseUrl: string) {
    const base = new URL(baseUrl);
    if (!ALLOWED_PROTOCOLS.has(base.protocol)) {
      throw new InvalidUrlError(`Corpus base URL must use http or https: ${baseUrl}`);
    }
    this.prefix = base.pathname.endsWith('/') ? base.pathname : `${base.pathname}/`;
    this.base = new URL(`${base.protocol}//${base.host}${this.prefix}`);
  }

  /**
   * Canonical URL of the corpus root
   */
  get baseUrl(): string {
    return this.base.href;
  }

  /**
   * Resolve an absolute URL, a corpus-relative filename or a link found
   * on another page into a locator inside the corpus.
   *
   * @param relativeTo - canonical URL of the referencing page; the corpus
   *   root when omitted
   */
  resolve(input: string, relativeTo?: string): CanonicalLocator {
    const trimmed = input.trim();
    if (trimmed === '') {
      throw new InvalidUrlError('URL is empty');
    }
    if (trimmed.includes('\0')) {
      throw new InvalidUrlError('URL contains a NUL byte', { input });
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed, relativeTo ?? this.base.href);
    } catch (error) {
      throw new InvalidUrlError(`Unparseable URL: ${input}`, { input }, error as Error);
    }

    if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
      throw new NotAllowedError(`URL scheme not allowed: ${parsed.protocol}`, { input });
    }
    if (parsed.host !== this.base.host) {
      throw new NotAllowedError(`URL host not allowed: ${parsed.host}`, { input });
    }

    // WHATWG parsing has already collapsed dot segments in pathname
    const pathname = parsed.pathname;
    if (`${pathname}/` === this.prefix || pathname === this.prefix) {
      throw new InvalidUrlError('URL has an empty document path', { input });
    }
    if (!pathname.startsWith(this.prefix)) {
      throw new NotAllowedError('URL is outside the documentation root', { input });
    }

    let relative: string;
    try {
      relative = decodeURIComponent(pathname.slice(this.prefix.length));
    } catch (error) {
      throw new InvalidUrlError(`Malformed percent-encoding in URL: ${input}`, { input }, error as Error);
    }
    if (relative.includes('\0')) {
      throw new InvalidUrlError('URL contains a NUL byte', { input });
    }

    // Decoding can reintroduce separators (%2F) and dot segments
    const normalized = path.posix.normalize(relative);
    if (
      normalized === '..' ||
      normalized.startsWith('../') ||
      path.posix.isAbsolute(normalized)
    ) {
      throw new NotAllowedError('URL escapes the documentation root', { input });
    }
    if (normalized === '.' || normalized === '' || normalized.endsWith('/')) {
      throw new InvalidUrlError('URL has an empty document path', { input });
    }

    const fragment = decodeFragment(parsed.hash);
    const locator: CanonicalLocator = {
      url: this.canonical(normalized),
      path: normalized,
      ...(fragment ? { fragment } : {}),
    };
    return Object.freeze(locator);
  }

  /**
   * Canonical URL for a normalized corpus-relative path
   */
  canonical(relativePath: string): string {
    const encoded = relativePath.split('/').map(encodeURIComponent).join('/');
    return `${this.base.protocol}//${this.base.host}${this.prefix}${encoded}`;
  }

  /**
   * Host filesystem path of a locator under the corpus root
   */
  toFilePath(locator: CanonicalLocator, corpusRoot: string): string {
    const root = path.resolve(corpusRoot);
    const filePath = path.resolve(root, ...locator.path.split('/'));
    const relative = path.relative(root, filePath);
    if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new NotAllowedError('Path escapes the corpus root', { path: locator.path });
    }
    return filePath;
  }
}

/**
 * Attach a fragment id to a canonical URL
 */
export function withFragment(url: string, fragment?: string): string {
  return fragment ? `${url}#${encodeURIComponent(fragment)}` : url;
}

/**
 * Strip a leading `#` and surrounding whitespace; empty becomes undefined
 */
export function normalizeFragment(fragment: string | null | undefined): string | undefined {
  if (fragment === null || fragment === undefined) {
    return undefined;
  }
  const stripped = fragment.trim().replace(/^#/, '');
  return stripped === '' ? undefined : stripped;
}

function decodeFragment(hash: string): string | undefined {
  const raw = hash.replace(/^#/, '');
  if (raw === '') {
    return undefined;
  }
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}
