#!/usr/bin/env node

/**
 * Configuration Validation Script
 * Validates the configuration and checks the corpus and index it points at,
 * without starting the server
 */

import { existsSync } from 'fs';
import type { Config } from './schema.js';
import { getConfig } from './index.js';
import { readIndexMetadata } from '../docs/indexer.js';
import { scanCorpus } from '../docs/scanner.js';

export interface ValidationReport {
  ok: boolean;
  lines: string[];
}

/**
 * Check that the corpus exists and report on the search index
 */
export async function checkEnvironment(config: Config): Promise<ValidationReport> {
  const lines: string[] = [];
  let ok = true;

  try {
    const scan = await scanCorpus(config.corpus.root);
    lines.push(`Corpus: ${scan.pages.length} pages under ${config.corpus.root}`);
    if (scan.pages.length === 0) {
      lines.push('  warning: corpus contains no HTML pages');
      ok = false;
    }
  } catch (error) {
    lines.push(`Corpus: ${(error as Error).message}`);
    ok = false;
  }

  const metadata = readIndexMetadata(config.index.path);
  if (metadata) {
    lines.push(`Index: ${metadata.pageCount} pages, built ${metadata.builtAt}`);
    if (metadata.baseUrl !== new URL(config.corpus.baseUrl).href) {
      lines.push(`  warning: index was built for ${metadata.baseUrl}`);
    }
  } else if (existsSync(config.index.path)) {
    lines.push(`Index: ${config.index.path} is not a readable search index`);
  } else {
    lines.push(`Index: not built yet (${config.index.path})`);
  }

  return { ok, lines };
}

async function main(): Promise<void> {
  console.log('Validating configuration...');
  const config = getConfig();
  console.log('Configuration is valid!');
  console.log('\nConfiguration:');
  console.log(JSON.stringify(config, null, 2));

  const report = await checkEnvironment(config);
  console.log('');
  report.lines.forEach((line) => console.log(line));
  process.exit(report.ok ? 0 : 1);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Configuration validation failed:');
    console.error((error as Error).message);
    process.exit(1);
  });
}
