/**
 * Search Index Builder
 * Builds the SQLite FTS5 index over the corpus and publishes it atomically
 */

import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import { Database } from 'node-sqlite3-wasm';
import { z } from 'zod';
import type { Logger } from '../logger/index.js';
import type {
  BuildOptions,
  BuildSummary,
  IndexMetadata,
  SearchDocumentRecord,
} from '../types/docs.js';
import { DocsError, IndexBuildError, NotFoundError, ParseError } from '../errors/index.js';
import { extractSearchFields } from './extractor.js';
import { loadSourceHtml } from './loader.js';
import type { UrlResolver } from './resolver.js';
import { fingerprintCorpus, scanCorpus } from './scanner.js';

export const INDEX_SCHEMA_VERSION = '1';

const SCHEMA_SQL = `
  CREATE VIRTUAL TABLE docs USING fts5(
    title,
    headings,
    body,
    url UNINDEXED,
    path UNINDEXED,
    tokenize = 'unicode61 remove_diacritics 2'
  );
  CREATE TABLE meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

const MetaRowsSchema = z.object({
  schema_version: z.string(),
  page_count: z.coerce.number().int().nonnegative(),
  corpus_fingerprint: z.string(),
  built_at: z.string(),
  base_url: z.string(),
});

export interface SearchIndexBuilderOptions {
  resolver: UrlResolver;
  logger: Logger;
}

export class SearchIndexBuilder {
  private readonly resolver: UrlResolver;
  private readonly logger: Logger;

  constructor(options: SearchIndexBuilderOptions) {
    this.resolver = options.resolver;
    this.logger = options.logger;
  }

  /**
   * Build the index for `corpusRoot` at `indexPath`.
   *
   * Without `force`, an index already built from the same corpus is kept.
   * The previous index stays in place until a new one has been validated.
   */
  async build(corpusRoot: string, indexPath: string, options: BuildOptions = {}): Promise<BuildSummary> {
    const startTime = Date.now();
    const { pages } = await scanCorpus(corpusRoot);
    if (pages.length === 0) {
      throw new NotFoundError(`No HTML pages found under ${corpusRoot}`, { corpusRoot });
    }

    const fingerprint = await fingerprintCorpus(corpusRoot, pages);

    if (!options.force) {
      const existing = readIndexMetadata(indexPath);
      if (
        existing &&
        existing.schemaVersion === INDEX_SCHEMA_VERSION &&
        existing.corpusFingerprint === fingerprint &&
        existing.baseUrl === this.resolver.baseUrl
      ) {
        this.logger.info('Search index is up to date', { indexPath, pageCount: existing.pageCount });
        return {
          pageCount: existing.pageCount,
          durationMs: Date.now() - startTime,
          fingerprint,
          builtAt: existing.builtAt,
          indexPath,
          skipped: true,
        };
      }
    }

    this.logger.info('Building search index', { corpusRoot, indexPath, pages: pages.length });

    const records: SearchDocumentRecord[] = [];
    for (const [position, page] of pages.entries()) {
      records.push(await this.extractRecord(corpusRoot, page));
      options.onProgress?.(position + 1, pages.length, page);
    }

    const builtAt = new Date().toISOString();
    const metadata: IndexMetadata = {
      schemaVersion: INDEX_SCHEMA_VERSION,
      pageCount: records.length,
      corpusFingerprint: fingerprint,
      builtAt,
      baseUrl: this.resolver.baseUrl,
    };

    await fs.mkdir(path.dirname(path.resolve(indexPath)), { recursive: true });
    const tempPath = `${indexPath}.${process.pid}.building`;
    await removeDatabaseFiles(tempPath);

    try {
      writeIndex(tempPath, records, metadata);
      await fs.rename(tempPath, indexPath);
    } catch (error) {
      await removeDatabaseFiles(tempPath);
      this.logger.error('Search index build failed', error, { indexPath });
      if (error instanceof DocsError) {
        throw error;
      }
      throw new IndexBuildError(`Failed to build search index: ${(error as Error).message}`, { indexPath }, error as Error);
    }

    const summary: BuildSummary = {
      pageCount: records.length,
      durationMs: Date.now() - startTime,
      fingerprint,
      builtAt,
      indexPath,
      skipped: false,
    };
    this.logger.info('Search index built', { ...summary });
    return summary;
  }

  private async extractRecord(corpusRoot: string, page: string): Promise<SearchDocumentRecord> {
    const html = await loadSourceHtml(path.join(corpusRoot, ...page.split('/')));
    try {
      return { url: this.resolver.canonical(page), path: page, ...extractSearchFields(html) };
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`Failed to parse ${page}: ${error.message}`, { path: page }, error);
      }
      throw error;
    }
  }
}

/**
 * Write every record and the metadata into a fresh database, then
 * merge the FTS5 segments and validate it
 */
function writeIndex(dbPath: string, records: SearchDocumentRecord[], metadata: IndexMetadata): void {
  const db = new Database(dbPath);
  try {
    db.exec(SCHEMA_SQL);

    const insertDoc = db.prepare('INSERT INTO docs (title, headings, body, url, path) VALUES (?, ?, ?, ?, ?)');
    const insertMeta = db.prepare('INSERT INTO meta (key, value) VALUES (?, ?)');
    db.exec('BEGIN');
    try {
      for (const record of records) {
        insertDoc.run([record.title, record.headings, record.body, record.url, record.path]);
      }
      insertMeta.run(['schema_version', metadata.schemaVersion]);
      insertMeta.run(['page_count', String(metadata.pageCount)]);
      insertMeta.run(['corpus_fingerprint', metadata.corpusFingerprint]);
      insertMeta.run(['built_at', metadata.builtAt]);
      insertMeta.run(['base_url', metadata.baseUrl]);
      db.exec('COMMIT');
    } catch (error) {
      db.exec('ROLLBACK');
      throw error;
    } finally {
      insertDoc.finalize();
      insertMeta.finalize();
    }

    db.exec("INSERT INTO docs (docs) VALUES ('optimize')");

    validateIndex(db, records.length);
  } finally {
    db.close();
  }
}

const IntegrityRowSchema = z.object({ integrity_check: z.string() });
const CountRowSchema = z.object({ count: z.coerce.number() });
const MetaRowSchema = z.object({ key: z.string(), value: z.string() });

function validateIndex(db: Database, expectedRows: number): void {
  const integrity = IntegrityRowSchema.safeParse(db.get('PRAGMA integrity_check'));
  if (!integrity.success || integrity.data.integrity_check !== 'ok') {
    throw new IndexBuildError('Index failed SQLite integrity check', {
      result: integrity.success ? integrity.data.integrity_check : 'unreadable',
    });
  }

  // Raises on any inconsistency between the FTS5 table and its index
  db.exec("INSERT INTO docs (docs) VALUES ('integrity-check')");

  const count = CountRowSchema.parse(db.get('SELECT count(*) AS count FROM docs')).count;
  if (count !== expectedRows) {
    throw new IndexBuildError('Index row count does not match corpus', {
      expected: expectedRows,
      actual: count,
    });
  }
}

async function removeDatabaseFiles(dbPath: string): Promise<void> {
  await fs.rm(dbPath, { force: true });
  await fs.rm(`${dbPath}-journal`, { force: true });
}

/**
 * Provenance of an existing index; undefined when there is no readable one
 */
export function readIndexMetadata(indexPath: string): IndexMetadata | undefined {
  if (!existsSync(indexPath)) {
    return undefined;
  }

  let db: Database;
  try {
    db = new Database(indexPath, { readOnly: true, fileMustExist: true });
  } catch {
    return undefined;
  }

  let rows: unknown[];
  try {
    rows = db.all('SELECT key, value FROM meta');
  } catch {
    // Not an index file, or one without a meta table
    return undefined;
  } finally {
    db.close();
  }

  const entries = z.array(MetaRowSchema).safeParse(rows);
  if (!entries.success) {
    return undefined;
  }
  const parsed = MetaRowsSchema.safeParse(Object.fromEntries(entries.data.map((row) => [row.key, row.value])));
  if (!parsed.success) {
    return undefined;
  }
  return {
    schemaVersion: parsed.data.schema_version,
    pageCount: parsed.data.page_count,
    corpusFingerprint: parsed.data.corpus_fingerprint,
    builtAt: parsed.data.built_at,
    baseUrl: parsed.data.base_url,
  };
}
