/**
 * Documentation Cache
 * Two tiers keyed by canonical URL: a bounded LRU in memory over the
 * sharded Markdown store on disk
 */

import type { Logger } from '../logger/index.js';
import type {
  CacheStats,
  CanonicalLocator,
  ConvertedDocument,
  WarmOptions,
  WarmSummary,
} from '../types/docs.js';
import { NotFoundError, ParseError } from '../errors/index.js';
import { DocumentConverter, freezeDocument, narrowDocument } from './converter.js';
import { loadSourceHtml } from './loader.js';
import { LruCache } from './lru.js';
import type { UrlResolver } from './resolver.js';
import { scanCorpus } from './scanner.js';
import type { MarkdownStore } from './store.js';

export interface DocumentCacheOptions {
  corpusRoot: string;
  resolver: UrlResolver;
  store: MarkdownStore;
  capacity: number;
  logger: Logger;
  converter?: DocumentConverter;
}

export class DocumentCache {
  private readonly corpusRoot: string;
  private readonly resolver: UrlResolver;
  private readonly store: MarkdownStore;
  private readonly converter: DocumentConverter;
  private readonly logger: Logger;
  private memory: LruCache<string, ConvertedDocument>;
  private hits = 0;
  private diskHits = 0;
  private misses = 0;
  private conversions = 0;

  constructor(options: DocumentCacheOptions) {
    this.corpusRoot = options.corpusRoot;
    this.resolver = options.resolver;
    this.store = options.store;
    this.converter = options.converter ?? new DocumentConverter(options.resolver);
    this.logger = options.logger;
    this.memory = new LruCache(options.capacity);
  }

  /**
   * Get a converted page, or a section view of it when a fragment is given
   */
  async get(locator: CanonicalLocator, fragment?: string): Promise<ConvertedDocument> {
    if (fragment) {
      return this.getFragment(locator, fragment);
    }

    const cached = this.memory.get(locator.url);
    if (cached) {
      this.hits++;
      return cached;
    }

    const stored = await this.store.read(locator.url);
    if (stored.status === 'hit') {
      this.diskHits++;
      const document = freezeDocument(stored.document);
      this.memory.set(locator.url, document);
      return document;
    }
    if (stored.status === 'invalid') {
      this.logger.warn('Ignoring invalid cache record', { url: locator.url, reason: stored.reason });
    }

    this.misses++;
    const document = await this.convertFromSource(locator);
    await this.persist(locator.url, document);
    this.memory.set(locator.url, document);
    return document;
  }

  /**
   * Section views never touch the disk tier and are never stored
   */
  private async getFragment(locator: CanonicalLocator, fragment: string): Promise<ConvertedDocument> {
    const whole = this.memory.get(locator.url);
    if (whole) {
      this.hits++;
      const view = narrowDocument(whole, fragment);
      if (view) {
        return view;
      }
    } else {
      this.misses++;
    }
    return this.convertFromSource(locator, fragment);
  }

  /**
   * Drop a page from both tiers
   */
  async invalidate(locator: CanonicalLocator): Promise<void> {
    this.memory.delete(locator.url);
    const removed = await this.store.remove(locator.url);
    this.logger.debug('Cache entry invalidated', { url: locator.url, removedFromDisk: removed });
  }

  /**
   * Convert and persist every corpus page, overwriting existing records.
   * Pages that are missing or unparsable are counted and skipped.
   */
  async warmAll(options: WarmOptions = {}): Promise<WarmSummary> {
    const startTime = Date.now();
    const { pages } = await scanCorpus(this.corpusRoot);
    const limit = options.limit && options.limit > 0 ? options.limit : pages.length;
    const selected = pages.slice(0, limit);

    this.logger.info('Warming document cache', { pages: selected.length, total: pages.length });

    let warmed = 0;
    let failed = 0;
    for (const page of selected) {
      const locator = this.resolver.resolve(this.resolver.canonical(page));
      let document: ConvertedDocument;
      try {
        document = await this.convertFromSource(locator);
      } catch (error) {
        if (error instanceof ParseError || error instanceof NotFoundError) {
          failed++;
          this.logger.warn('Skipping page during warm', { path: page, code: error.code, message: error.message });
          continue;
        }
        throw error;
      }
      await this.persist(locator.url, document);
      warmed++;
    }

    const summary: WarmSummary = { warmed, failed, durationMs: Date.now() - startTime };
    this.logger.info('Document cache warmed', { ...summary });
    return summary;
  }

  /**
   * Get cache statistics
   */
  stats(): CacheStats {
    return {
      memoryEntries: this.memory.size,
      capacity: this.memory.capacity,
      hits: this.hits,
      diskHits: this.diskHits,
      misses: this.misses,
      conversions: this.conversions,
    };
  }

  private async convertFromSource(locator: CanonicalLocator, fragment?: string): Promise<ConvertedDocument> {
    const filePath = this.resolver.toFilePath(locator, this.corpusRoot);
    const html = await loadSourceHtml(filePath);
    this.conversions++;
    return this.converter.convert(html, { url: locator.url, fragment });
  }

  private async persist(url: string, document: ConvertedDocument): Promise<void> {
    try {
      await this.store.write(url, document);
    } catch (error) {
      this.logger.error('Failed to write cache record', error, { url });
      throw error;
    }
  }
}
