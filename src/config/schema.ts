import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 * Ensures type safety and validation of all configuration values
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const TransportSchema = z.enum(['stdio']);

export const CorpusConfigSchema = z.object({
  root: z.string().min(1).default('./data/corpus'),
  baseUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), 'baseUrl must use http or https')
    .default('https://doc.qt.io/archives/qt-4.8/'),
});

export const CacheConfigSchema = z.object({
  dir: z.string().min(1).default('./data/cache/md'),
  memoryEntries: z.number().int().min(1).default(128),
  warmOnStart: z.boolean().default(false),
});

export const IndexConfigSchema = z.object({
  path: z.string().min(1).default('./data/index/fts.sqlite'),
  buildOnStart: z.boolean().default(false),
});

export const ReaderConfigSchema = z
  .object({
    defaultLength: z.number().int().min(1).default(20000),
    maxLength: z.number().int().min(1).default(50000),
  })
  .refine((reader) => reader.defaultLength <= reader.maxLength, {
    message: 'defaultLength must not exceed maxLength',
  });

export const SearchConfigSchema = z
  .object({
    defaultLimit: z.number().int().min(1).default(10),
    maxLimit: z.number().int().min(1).max(50).default(50),
  })
  .refine((search) => search.defaultLimit <= search.maxLimit, {
    message: 'defaultLimit must not exceed maxLimit',
  });

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  dir: z.string().default('./logs'),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
  toFile: z.boolean().default(true),
  silent: z.boolean().default(false),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('qt-archive-docs'),
  serverVersion: z.string().default('0.1.0'),
  transport: TransportSchema.default('stdio'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  corpus: CorpusConfigSchema,
  cache: CacheConfigSchema,
  index: IndexConfigSchema,
  reader: ReaderConfigSchema,
  search: SearchConfigSchema,
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
});

/**
 * TypeScript type derived from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type Transport = z.infer<typeof TransportSchema>;
