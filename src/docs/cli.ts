#!/usr/bin/env node
/**
 * Documentation System CLI
 * Maintenance commands: index build, cache warm-up and ad-hoc queries
 */

import { parseArgs } from 'util';
import { getConfig } from '../config/index.js';
import { getLogger } from '../logger/index.js';
import { DocsError, ValidationError } from '../errors/index.js';
import { DocsService } from './api.js';

const USAGE = [
  'Usage: qt-archive-docs-cli <command> [options]',
  '',
  'Commands:',
  '  build [--force]                 - Build the search index (skipped when up to date)',
  '  warm [--limit N]                - Convert and persist corpus pages to the disk cache',
  '  search <query> [--limit N]      - Search the index',
  '  read <url> [--fragment ID] [--start N] [--max N]',
  '                                  - Print a page as Markdown',
  '  invalidate <url>                - Drop a page from the memory and disk cache',
  '  meta                            - Show search index metadata',
  '  stats                           - Show document cache statistics',
  '  help                            - Show this help message',
].join('\n');

const PROGRESS_EVERY = 100;

export type CliOutput = (line: string) => void;

/**
 * Run one CLI command; returns the process exit code
 */
export async function runCli(argv: string[], service: DocsService, out: CliOutput = console.log): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    out(`Error: ${(error as Error).message}`);
    out(USAGE);
    return 1;
  }

  const [command, ...rest] = parsed.positionals;
  const { values } = parsed;

  try {
    switch (command) {
      case 'build': {
        out('Building search index...');
        const summary = await service.buildIndex({
          force: values.force,
          onProgress: (current, total, page) => {
            if (current % PROGRESS_EVERY === 0 || current === total) {
              out(`  [${current}/${total}] ${page}`);
            }
          },
        });
        out(summary.skipped ? 'Index is up to date; nothing to do.' : 'Index built successfully!');
        out(JSON.stringify(summary, null, 2));
        return 0;
      }

      case 'warm': {
        const limit = parseCount(values.limit, 'limit');
        out('Warming document cache...');
        const summary = await service.warmCache({ limit });
        out(JSON.stringify(summary, null, 2));
        return 0;
      }

      case 'search': {
        if (rest.length === 0) {
          out('Usage: qt-archive-docs-cli search <query> [--limit N]');
          return 1;
        }
        const query = rest.join(' ');
        const response = service.searchDocuments(query, parseCount(values.limit, 'limit'));
        if (response.count === 0) {
          out('No results found.');
          return 0;
        }
        out(`Found ${response.count} results:\n`);
        response.results.forEach((result, index) => {
          out(`${index + 1}. ${result.title} (score: ${result.score.toFixed(2)})`);
          out(`   ${result.url}`);
          out(`   ${result.context}`);
          out('');
        });
        return 0;
      }

      case 'read': {
        const url = rest[0];
        if (!url) {
          out('Usage: qt-archive-docs-cli read <url> [--fragment ID] [--start N] [--max N]');
          return 1;
        }
        const document = await service.readDocument({
          url,
          fragment: values.fragment,
          startIndex: parseCount(values.start, 'start'),
          maxLength: parseCount(values.max, 'max'),
        });
        out(`# ${document.title}`);
        out(`<${document.canonicalUrl}>\n`);
        out(document.body);
        if (document.pagination.truncated) {
          out(`\n[truncated: continue with --start ${document.pagination.nextIndex}]`);
        }
        return 0;
      }

      case 'invalidate': {
        const url = rest[0];
        if (!url) {
          out('Usage: qt-archive-docs-cli invalidate <url>');
          return 1;
        }
        await service.invalidate(url);
        out(`Invalidated ${service.resolver.resolve(url).url}`);
        return 0;
      }

      case 'meta': {
        const metadata = service.indexMetadata();
        out(metadata ? JSON.stringify(metadata, null, 2) : 'No search index found.');
        return 0;
      }

      case 'stats': {
        out(JSON.stringify(await service.cacheStats(), null, 2));
        return 0;
      }

      case undefined:
      case 'help':
        out(USAGE);
        return 0;

      default:
        out(`Unknown command: ${command}`);
        out(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof DocsError) {
      out(`Error: ${error.toString()}`);
      return 1;
    }
    throw error;
  }
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      force: { type: 'boolean', default: false },
      limit: { type: 'string' },
      fragment: { type: 'string' },
      start: { type: 'string' },
      max: { type: 'string' },
    },
  });
}

function parseCount(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return count;
}

async function main(): Promise<void> {
  const config = getConfig();
  const logger = getLogger(config.logging);
  const service = new DocsService(config, logger);
  process.exitCode = await runCli(process.argv.slice(2), service);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Error:', error);
    process.exit(1);
  });
}
