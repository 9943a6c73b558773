/**
 * Corpus Scanner
 * Enumerates the HTML pages of the corpus in a stable order
 */

import { createHash } from 'crypto';
import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ScanResult } from '../types/docs.js';
import { NotFoundError } from '../errors/index.js';

/**
 * Scan the corpus root for HTML pages.
 * Paths are corpus-relative, POSIX-separated and sorted by code unit so
 * the order never depends on the host locale or filesystem.
 */
export async function scanCorpus(rootPath: string): Promise<ScanResult> {
  const startTime = Date.now();

  let rootStats: Stats;
  try {
    rootStats = await fs.stat(rootPath);
  } catch (error) {
    throw new NotFoundError(`Corpus root not found: ${rootPath}`, { rootPath }, error as Error);
  }
  if (!rootStats.isDirectory()) {
    throw new NotFoundError(`Corpus root is not a directory: ${rootPath}`, { rootPath });
  }

  const pages: string[] = [];
  const sizes = { total: 0 };
  await scanDirectoryRecursive(rootPath, [], pages, sizes);

  pages.sort(compareCodeUnits);

  return {
    pages,
    totalSize: sizes.total,
    scanDuration: Date.now() - startTime,
  };
}

/**
 * Recursive directory scanning helper
 */
async function scanDirectoryRecursive(
  dirPath: string,
  segments: string[],
  pages: string[],
  sizes: { total: number }
): Promise<void> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    // Skip hidden files and directories
    if (entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      await scanDirectoryRecursive(fullPath, [...segments, entry.name], pages, sizes);
    } else if (entry.isFile() && isHtmlFile(entry.name)) {
      const stats = await fs.stat(fullPath);
      sizes.total += stats.size;
      pages.push([...segments, entry.name].join('/'));
    }
  }
}

/**
 * Check if file is an HTML page
 */
export function isHtmlFile(filename: string): boolean {
  const ext = path.extname(filename).toLowerCase();
  return ext === '.html' || ext === '.htm';
}

/**
 * Hash of every page path and its bytes, in scan order.
 * Unchanged corpora always produce the same fingerprint.
 */
export async function fingerprintCorpus(rootPath: string, pages: string[]): Promise<string> {
  const corpusHash = createHash('sha256');
  for (const page of pages) {
    const bytes = await fs.readFile(path.join(rootPath, ...page.split('/')));
    const pageHash = createHash('sha256').update(bytes).digest('hex');
    corpusHash.update(`${page}\n${pageHash}\n`);
  }
  return corpusHash.digest('hex');
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
