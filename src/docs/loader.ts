/**
 * Source loader
 * Reads raw corpus HTML from disk
 */

import * as fs from 'fs/promises';
import { NotFoundError } from '../errors/index.js';

const MISSING_CODES = new Set(['ENOENT', 'EISDIR', 'ENOTDIR']);

/**
 * Read a corpus file as text: UTF-8 when valid, Latin-1 otherwise.
 * Missing files and directories raise NotFoundError.
 */
export async function loadSourceHtml(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    if (isMissing(error)) {
      throw new NotFoundError(`Document not found: ${filePath}`, { filePath }, error);
    }
    throw error;
  }
  return decodeHtml(buffer);
}

export function decodeHtml(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    // Older pages in the archive are Latin-1
    return buffer.toString('latin1');
  }
}

function isMissing(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    MISSING_CODES.has(error.code)
  );
}
