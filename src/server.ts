import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import type { DocsService } from './docs/api.js';
import { LifecycleManager, type LifecycleOptions } from './lifecycle/index.js';
import { listAllTools, callTool } from './tools/index.js';

/**
 * Documentation MCP Server
 * Exposes the read and search tools over stdio
 */
export class DocsMCPServer {
  private server: Server;
  private logger: Logger;
  private config: Config;
  private service: DocsService;
  private lifecycle: LifecycleManager;
  private transport?: Transport;

  constructor(config: Config, logger: Logger, service: DocsService, lifecycleOptions: LifecycleOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.service = service;

    this.server = new Server(
      {
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.lifecycle = new LifecycleManager(logger, lifecycleOptions);

    this.setupLifecycleHooks();
    this.setupMCPHandlers();
  }

  /**
   * Setup lifecycle hooks
   */
  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('initialize-server', async () => {
      this.logger.info('Initializing MCP server', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
        corpusRoot: this.config.corpus.root,
      });
    });

    this.lifecycle.onStartup('build-search-index', async () => {
      if (!this.config.index.buildOnStart) {
        return;
      }
      const summary = await this.service.buildIndex();
      this.logger.info('Search index ready', { ...summary });
    });

    this.lifecycle.onStartup('warm-document-cache', async () => {
      if (this.config.cache.warmOnStart) {
        await this.service.warmCache();
      }
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.transport.close();
      }
    });
  }

  /**
   * Setup MCP protocol handlers
   */
  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: listAllTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolName = request.params.name;
      const args = request.params.arguments;

      this.logger.debug('Received call_tool request', { tool: toolName, args });

      const result = await callTool(this.service, toolName, args);
      if (result.isError) {
        this.logger.warn('Tool call failed', { tool: toolName, content: result.content });
      }
      return result;
    });
  }

  /**
   * Start the MCP server on stdio, or on the given transport
   */
  async start(transport?: Transport): Promise<void> {
    try {
      await this.lifecycle.startup();

      this.logger.info(`Starting MCP server with ${transport ? 'injected' : 'stdio'} transport`);
      this.transport = transport ?? new StdioServerTransport();
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  /**
   * Get server instance
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Get lifecycle manager
   */
  getLifecycle(): LifecycleManager {
    return this.lifecycle;
  }
}
