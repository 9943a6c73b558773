#!/usr/bin/env node

/**
 * Qt Archive Docs MCP Server - Entry Point
 * Serves the local documentation corpus as Markdown with full-text search
 */

import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { DocsService } from './docs/api.js';
import { DocsMCPServer } from './server.js';
import { ConfigurationError } from './errors/index.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();
    const logger = getLogger(config.logging);

    logger.info('Starting documentation MCP server', {
      version: config.mcp.serverVersion,
      baseUrl: config.corpus.baseUrl,
    });

    const service = new DocsService(config, logger);
    const server = new DocsMCPServer(config, logger, service);
    server.getLifecycle().installSignalHandlers();
    await server.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
