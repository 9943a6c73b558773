/**
 * Search Query Engine
 * Ranked full-text queries against the published FTS5 index
 */

import { existsSync } from 'fs';
import { Database } from 'node-sqlite3-wasm';
import { z } from 'zod';
import type { Logger } from '../logger/index.js';
import type { SearchResult } from '../types/docs.js';
import { InvalidQueryError, SearchUnavailableError } from '../errors/index.js';

/** Field weights for title, headings and body */
const FIELD_WEIGHTS = '10.0, 5.0, 1.0';
const SNIPPET_TOKENS = 12;

const SEARCH_SQL = `
  SELECT
    title,
    url,
    -bm25(docs, ${FIELD_WEIGHTS}) AS score,
    snippet(docs, 2, '<b>', '</b>', '…', ${SNIPPET_TOKENS}) AS bodySnippet,
    snippet(docs, -1, '<b>', '</b>', '…', ${SNIPPET_TOKENS}) AS bestSnippet
  FROM docs
  WHERE docs MATCH ?
  ORDER BY score DESC, url ASC
  LIMIT ?
`;

const SearchRowSchema = z.object({
  title: z.string(),
  url: z.string(),
  score: z.number(),
  bodySnippet: z.string(),
  bestSnippet: z.string(),
});

type SearchRow = z.infer<typeof SearchRowSchema>;

export interface SearchEngineOptions {
  indexPath: string;
  defaultLimit: number;
  maxLimit: number;
  logger: Logger;
}

export class SearchEngine {
  private readonly indexPath: string;
  private readonly defaultLimit: number;
  private readonly maxLimit: number;
  private readonly logger: Logger;

  constructor(options: SearchEngineOptions) {
    this.indexPath = options.indexPath;
    this.maxLimit = options.maxLimit;
    this.defaultLimit = Math.min(options.defaultLimit, options.maxLimit);
    this.logger = options.logger;
  }

  /**
   * Run a MATCH query. An empty query, or a limit of zero or less,
   * returns no results without touching the index.
   */
  search(query: string, limit?: number): SearchResult[] {
    const expression = query.trim();
    if (expression === '') {
      return [];
    }
    const effectiveLimit = this.clampLimit(limit);
    if (effectiveLimit === 0) {
      return [];
    }

    const db = this.open();
    try {
      let statement: ReturnType<Database['prepare']>;
      try {
        statement = db.prepare(SEARCH_SQL);
      } catch (error) {
        // No docs table: the file is not a built index
        throw new SearchUnavailableError('Search index not initialized', { indexPath: this.indexPath }, error as Error);
      }

      let rows: unknown[];
      try {
        rows = statement.all([expression, effectiveLimit]);
      } catch (error) {
        throw new InvalidQueryError(`Invalid search query: ${(error as Error).message}`, { query }, error as Error);
      } finally {
        statement.finalize();
      }

      const results = z.array(SearchRowSchema).parse(rows);
      this.logger.debug('Search completed', { query: expression, limit: effectiveLimit, results: results.length });
      return results.map((row) => ({
        title: row.title,
        url: row.url,
        score: row.score,
        context: pickContext(row),
      }));
    } finally {
      db.close();
    }
  }

  /**
   * Limit actually applied: the default when unusable, never above the maximum
   */
  clampLimit(limit?: number): number {
    if (limit === undefined || !Number.isFinite(limit)) {
      return this.defaultLimit;
    }
    if (limit <= 0) {
      return 0;
    }
    return Math.min(Math.floor(limit), this.maxLimit);
  }

  // Opened per query so a freshly published index is picked up
  private open(): Database {
    if (!existsSync(this.indexPath)) {
      throw new SearchUnavailableError(`Search index not found at ${this.indexPath}`, { indexPath: this.indexPath });
    }
    try {
      return new Database(this.indexPath, { readOnly: true, fileMustExist: true });
    } catch (error) {
      throw new SearchUnavailableError(
        `Search index could not be opened: ${(error as Error).message}`,
        { indexPath: this.indexPath },
        error as Error
      );
    }
  }
}

function pickContext(row: SearchRow): string {
  for (const snippet of [row.bodySnippet, row.bestSnippet]) {
    if (snippet.includes('<b>')) {
      return snippet;
    }
  }
  return row.bodySnippet || row.title;
}
