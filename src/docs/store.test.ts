/**
 * Unit tests for the on-disk Markdown store
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MarkdownStore, STORE_RECORD_VERSION } from './store.js';
import type { ConvertedDocument } from '../types/docs.js';
import { canonicalUrl, createTempDir, removeTempDir } from '../__tests__/utils.js';

const sampleDocument: ConvertedDocument = {
  title: 'QString Class Reference',
  body: '# QString Class Reference\n\nText.',
  links: [{ text: 'QStringList', url: canonicalUrl('qstringlist.html') }],
  fingerprint: 'f'.repeat(64),
  outline: {
    headings: [{ level: 1, text: 'QString Class Reference', offset: 0, anchors: ['top'] }],
    occurrences: [{ link: 0, heading: 0 }],
  },
};

describe('MarkdownStore', () => {
  let dir: string;
  let store: MarkdownStore;
  const url = canonicalUrl('qstring.html');

  beforeEach(async () => {
    dir = await createTempDir('qt-docs-store-');
    store = new MarkdownStore(path.join(dir, 'cache'));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should shard records by hash prefix', () => {
    const recordPath = store.path(url);
    const file = path.basename(recordPath, '.json');

    expect(file).toMatch(/^[0-9a-f]{64}$/);
    expect(path.basename(path.dirname(recordPath))).toBe(file.slice(0, 2));
    expect(store.path(url)).toBe(recordPath);
    expect(store.path(canonicalUrl('qstringlist.html'))).not.toBe(recordPath);
  });

  it('should report a miss for an unknown URL', async () => {
    expect(await store.read(url)).toEqual({ status: 'miss' });
  });

  it('should read back what it wrote', async () => {
    const storedAt = new Date('2024-03-01T12:00:00.000Z');
    await store.write(url, sampleDocument, storedAt);

    expect(await store.read(url)).toEqual({
      status: 'hit',
      document: sampleDocument,
      storedAt: '2024-03-01T12:00:00.000Z',
    });
  });

  it('should store fragment views as the whole document', async () => {
    await store.write(url, { ...sampleDocument, fragment: 'details' });
    const result = await store.read(url);

    expect(result.status).toBe('hit');
    if (result.status === 'hit') {
      expect(result.document.fragment).toBeUndefined();
    }
  });

  it('should leave no temp files behind', async () => {
    await store.write(url, sampleDocument);
    await store.write(url, { ...sampleDocument, title: 'Replaced' });

    const files = await fs.readdir(path.dirname(store.path(url)));
    expect(files).toEqual([path.basename(store.path(url))]);
  });

  it('should flag malformed JSON as invalid', async () => {
    await fs.mkdir(path.dirname(store.path(url)), { recursive: true });
    await fs.writeFile(store.path(url), '{"version": 1,');

    const result = await store.read(url);
    expect(result.status).toBe('invalid');
  });

  it('should flag records with another version as invalid', async () => {
    await fs.mkdir(path.dirname(store.path(url)), { recursive: true });
    await fs.writeFile(
      store.path(url),
      JSON.stringify({ version: STORE_RECORD_VERSION + 1, url, storedAt: 'x', document: sampleDocument })
    );

    expect((await store.read(url)).status).toBe('invalid');
  });

  it('should flag a record stored under another URL as invalid', async () => {
    const other = canonicalUrl('qstringlist.html');
    await store.write(other, sampleDocument);
    await fs.mkdir(path.dirname(store.path(url)), { recursive: true });
    await fs.copyFile(store.path(other), store.path(url));

    expect(await store.read(url)).toEqual({ status: 'invalid', reason: `Record belongs to ${other}` });
  });

  it('should remove records', async () => {
    await store.write(url, sampleDocument);

    expect(await store.remove(url)).toBe(true);
    expect(await store.remove(url)).toBe(false);
    expect(await store.read(url)).toEqual({ status: 'miss' });
  });

  it('should count records on disk', async () => {
    expect(await store.stats()).toEqual({ records: 0, totalSize: 0 });

    await store.write(url, sampleDocument);
    await store.write(canonicalUrl('qstringlist.html'), sampleDocument);

    const stats = await store.stats();
    expect(stats.records).toBe(2);
    expect(stats.totalSize).toBeGreaterThan(0);
  });
});
