/**
 * Markdown Store
 * Disk tier of the document cache: one JSON record per canonical URL,
 * sharded by hash prefix
 */

import { createHash, randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { ConvertedDocument, DiskStats } from '../types/docs.js';

export const STORE_RECORD_VERSION = 1;

const OutboundLinkSchema = z.object({
  text: z.string(),
  url: z.string(),
});

const HeadingAnchorSchema = z.object({
  level: z.number().int().min(1).max(6),
  text: z.string(),
  offset: z.number().int().nonnegative(),
  anchors: z.array(z.string()),
});

const ConvertedDocumentSchema = z.object({
  title: z.string(),
  body: z.string(),
  links: z.array(OutboundLinkSchema),
  fingerprint: z.string(),
  outline: z.object({
    headings: z.array(HeadingAnchorSchema),
    occurrences: z.array(
      z.object({
        link: z.number().int().nonnegative(),
        heading: z.number().int().min(-1),
      })
    ),
  }),
});

export const StoreRecordSchema = z.object({
  version: z.literal(STORE_RECORD_VERSION),
  url: z.string(),
  storedAt: z.string(),
  document: ConvertedDocumentSchema,
});

export type StoreRecord = z.infer<typeof StoreRecordSchema>;

/**
 * Outcome of reading one record
 */
export type StoreReadResult =
  | { status: 'hit'; document: ConvertedDocument; storedAt: string }
  | { status: 'miss' }
  | { status: 'invalid'; reason: string };

export class MarkdownStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  /**
   * Record location: `<dir>/<h[0..2]>/<h>.json`, h = sha256(url)
   */
  path(url: string): string {
    const hash = createHash('sha256').update(url).digest('hex');
    return path.join(this.dir, hash.slice(0, 2), `${hash}.json`);
  }

  async read(url: string): Promise<StoreReadResult> {
    let content: string;
    try {
      content = await fs.readFile(this.path(url), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return { status: 'miss' };
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      return { status: 'invalid', reason: `Malformed JSON: ${(error as Error).message}` };
    }

    const parsed = StoreRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return { status: 'invalid', reason: parsed.error.issues.map((issue) => issue.message).join('; ') };
    }
    if (parsed.data.url !== url) {
      return { status: 'invalid', reason: `Record belongs to ${parsed.data.url}` };
    }

    return { status: 'hit', document: parsed.data.document, storedAt: parsed.data.storedAt };
  }

  /**
   * Write a record through a temp file and rename; last writer wins
   */
  async write(url: string, document: ConvertedDocument, storedAt: Date = new Date()): Promise<void> {
    const target = this.path(url);
    await fs.mkdir(path.dirname(target), { recursive: true });

    const { fragment: _fragment, ...whole } = document;
    const record: StoreRecord = {
      version: STORE_RECORD_VERSION,
      url,
      storedAt: storedAt.toISOString(),
      document: whole,
    };

    const temp = `${target}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fs.writeFile(temp, JSON.stringify(record), 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }

  /**
   * Remove a record; returns whether one existed
   */
  async remove(url: string): Promise<boolean> {
    try {
      await fs.unlink(this.path(url));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Count records on disk
   */
  async stats(): Promise<DiskStats> {
    let records = 0;
    let totalSize = 0;

    let shards: string[];
    try {
      shards = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return { records, totalSize };
      }
      throw error;
    }

    for (const shard of shards) {
      const shardPath = path.join(this.dir, shard);
      const stat = await fs.stat(shardPath);
      if (!stat.isDirectory()) {
        continue;
      }
      for (const file of await fs.readdir(shardPath)) {
        if (!file.endsWith('.json')) {
          continue;
        }
        records++;
        totalSize += (await fs.stat(path.join(shardPath, file))).size;
      }
    }

    return { records, totalSize };
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
