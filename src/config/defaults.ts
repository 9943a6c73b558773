import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  corpus: {
    root: './data/corpus',
    baseUrl: 'https://doc.qt.io/archives/qt-4.8/',
  },
  cache: {
    dir: './data/cache/md',
    memoryEntries: 128,
    warmOnStart: false,
  },
  index: {
    path: './data/index/fts.sqlite',
    buildOnStart: false,
  },
  reader: {
    defaultLength: 20000,
    maxLength: 50000,
  },
  search: {
    defaultLimit: 10,
    maxLimit: 50,
  },
  logging: {
    level: 'info',
    format: 'json',
    dir: './logs',
    maxFiles: 10,
    maxSize: '10m',
    toFile: true,
    silent: false,
  },
  mcp: {
    serverName: 'qt-archive-docs',
    serverVersion: '0.1.0',
    transport: 'stdio',
  },
};
