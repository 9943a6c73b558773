/**
 * Unit tests for the environment check
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { checkEnvironment } from './validate.js';
import { DocsService } from '../docs/api.js';
import type { Config } from './schema.js';
import {
  createTempDir,
  createTestConfig,
  createTestLogger,
  removeTempDir,
  sampleCorpus,
  writeCorpus,
} from '../__tests__/utils.js';

describe('checkEnvironment', () => {
  let workspace: string;
  let config: Config;

  beforeEach(async () => {
    workspace = await createTempDir('qt-docs-validate-');
    config = createTestConfig(workspace);
  });

  afterEach(async () => {
    await removeTempDir(workspace);
  });

  it('should fail when the corpus is missing', async () => {
    const report = await checkEnvironment(config);

    expect(report.ok).toBe(false);
    expect(report.lines[0]).toBe(`Corpus: Corpus root not found: ${config.corpus.root}`);
    expect(report.lines[1]).toBe(`Index: not built yet (${config.index.path})`);
  });

  it('should warn about an empty corpus', async () => {
    await fs.mkdir(config.corpus.root, { recursive: true });

    const report = await checkEnvironment(config);

    expect(report.ok).toBe(false);
    expect(report.lines.slice(0, 2)).toEqual([
      `Corpus: 0 pages under ${config.corpus.root}`,
      '  warning: corpus contains no HTML pages',
    ]);
  });

  it('should report the corpus and a built index', async () => {
    await writeCorpus(config.corpus.root, sampleCorpus());
    const summary = await new DocsService(config, createTestLogger()).buildIndex();

    const report = await checkEnvironment(config);

    expect(report.ok).toBe(true);
    expect(report.lines).toEqual([
      `Corpus: 7 pages under ${config.corpus.root}`,
      `Index: 7 pages, built ${summary.builtAt}`,
    ]);
  });

  it('should flag an index built for another base URL', async () => {
    await writeCorpus(config.corpus.root, sampleCorpus());
    await new DocsService(config, createTestLogger()).buildIndex();

    const report = await checkEnvironment({
      ...config,
      corpus: { ...config.corpus, baseUrl: 'https://docs.example.com/qt/' },
    });

    expect(report.lines[2]).toBe('  warning: index was built for https://doc.qt.io/archives/qt-4.8/');
  });

  it('should flag a file that is not an index', async () => {
    await fs.mkdir(path.dirname(config.index.path), { recursive: true });
    await fs.writeFile(config.index.path, 'not sqlite');

    const report = await checkEnvironment(config);

    expect(report.lines[1]).toBe(`Index: ${config.index.path} is not a readable search index`);
  });
});
