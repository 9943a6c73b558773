/**
 * Documentation API
 * Operations served to the MCP tools and the CLI
 */

import type { Config } from '../config/schema.js';
import type { Logger } from '../logger/index.js';
import type {
  BuildOptions,
  BuildSummary,
  CacheStats,
  DiskStats,
  IndexMetadata,
  ReadDocumentRequest,
  ReadDocumentResponse,
  SearchDocumentsResponse,
  WarmOptions,
  WarmSummary,
} from '../types/docs.js';
import { DocumentCache } from './cache.js';
import { DocumentConverter } from './converter.js';
import { readIndexMetadata, SearchIndexBuilder } from './indexer.js';
import { paginate } from './paginate.js';
import { normalizeFragment, UrlResolver, withFragment } from './resolver.js';
import { SearchEngine } from './search.js';
import { MarkdownStore } from './store.js';

export interface DocsServiceDependencies {
  converter?: DocumentConverter;
}

/**
 * Owns the resolver, the document cache, the index builder and the
 * query engine for one corpus
 */
export class DocsService {
  readonly resolver: UrlResolver;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly store: MarkdownStore;
  private readonly cache: DocumentCache;
  private readonly builder: SearchIndexBuilder;
  private readonly engine: SearchEngine;

  constructor(config: Config, logger: Logger, dependencies: DocsServiceDependencies = {}) {
    this.config = config;
    this.logger = logger;
    this.resolver = new UrlResolver(config.corpus.baseUrl);
    this.store = new MarkdownStore(config.cache.dir);
    this.cache = new DocumentCache({
      corpusRoot: config.corpus.root,
      resolver: this.resolver,
      store: this.store,
      capacity: config.cache.memoryEntries,
      logger: logger.child({ component: 'cache' }),
      converter: dependencies.converter ?? new DocumentConverter(this.resolver),
    });
    this.builder = new SearchIndexBuilder({
      resolver: this.resolver,
      logger: logger.child({ component: 'indexer' }),
    });
    this.engine = new SearchEngine({
      indexPath: config.index.path,
      defaultLimit: config.search.defaultLimit,
      maxLimit: config.search.maxLimit,
      logger: logger.child({ component: 'search' }),
    });
  }

  /**
   * Read a page, or one section of it, as paginated Markdown.
   *
   * The fragment comes from `request.fragment`, else from the URL. It
   * narrows the body only when `sectionOnly` is set, which is the default
   * for an explicit fragment argument.
   */
  async readDocument(request: ReadDocumentRequest): Promise<ReadDocumentResponse> {
    const locator = this.resolver.resolve(request.url);
    const explicitFragment = normalizeFragment(request.fragment);
    const fragment = explicitFragment ?? locator.fragment;
    const sectionOnly = request.sectionOnly ?? explicitFragment !== undefined;

    const document = await this.cache.get(locator, sectionOnly ? fragment : undefined);
    const { text, ...pagination } = paginate(
      document.body,
      request.startIndex ?? 0,
      request.maxLength ?? this.config.reader.defaultLength,
      this.config.reader.maxLength
    );

    this.logger.debug('Document read', {
      url: locator.url,
      fragment,
      sectionOnly,
      returnedLength: pagination.returnedLength,
    });

    return {
      title: document.title,
      url: locator.url,
      canonicalUrl: withFragment(locator.url, fragment),
      body: text,
      links: document.links,
      pagination,
    };
  }

  /**
   * Ranked full-text search
   */
  searchDocuments(query: string, limit?: number): SearchDocumentsResponse {
    const results = this.engine.search(query, limit);
    return { query, count: results.length, results };
  }

  /**
   * Build (or, unless forced, keep) the search index for the configured corpus
   */
  buildIndex(options: BuildOptions = {}): Promise<BuildSummary> {
    return this.builder.build(this.config.corpus.root, this.config.index.path, options);
  }

  /**
   * Convert and persist corpus pages ahead of first reads
   */
  warmCache(options: WarmOptions = {}): Promise<WarmSummary> {
    return this.cache.warmAll(options);
  }

  /**
   * Drop one page from both cache tiers
   */
  async invalidate(url: string): Promise<void> {
    await this.cache.invalidate(this.resolver.resolve(url));
  }

  indexMetadata(): IndexMetadata | undefined {
    return readIndexMetadata(this.config.index.path);
  }

  async cacheStats(): Promise<CacheStats & { disk: DiskStats }> {
    return { ...this.cache.stats(), disk: await this.store.stats() };
  }
}
