#!/usr/bin/env node
/**
 * ragcrawl MCP server - main entry point
 *
 * Exposes crawl control, knowledge-base search and a service check as MCP
 * tools over stdio. Logs never go to stdout, which carries the protocol.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError
} from '@modelcontextprotocol/sdk/types.js';

import type { BaseToolHandler } from './handlers/base-tool-handler.js';
import { CheckToolHandler } from './handlers/check-tool-handler.js';
import { CrawlToolHandler } from './handlers/crawl-tool-handler.js';
import { SearchToolHandler } from './handlers/search-tool-handler.js';
import type { McpToolResponse } from './tool-types.js';

import {
  CrawlerServiceProvider,
  type RagCrawlServices
} from '../../services/crawler/infrastructure/CrawlerServiceProvider.js';
import { toError } from '../../shared/domain/errors.js';
import { Logger, getLogger } from '../../shared/infrastructure/logging.js';

/**
 * Build the tool handlers for a service graph
 */
export function createToolHandlers(services: RagCrawlServices, logger?: Logger): BaseToolHandler[] {
  return [
    new CrawlToolHandler(services.jobManager, services.config.security.allowedHosts, logger),
    new SearchToolHandler(services.queryPipeline, logger),
    new CheckToolHandler(services.vectorRepository, services.llm, logger)
  ];
}

/**
 * Main MCP server class
 */
class RagCrawlServer {
  private server: Server;
  private services: RagCrawlServices;
  private handlers: BaseToolHandler[];
  private logger: Logger;

  constructor(services: RagCrawlServices) {
    this.services = services;
    this.logger = getLogger();
    this.handlers = createToolHandlers(services, this.logger);

    this.server = new Server(
      {
        name: services.config.mcp.name,
        version: services.config.mcp.version
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.server.onerror = (error) => {
      this.logger.error('MCP transport error', 'RagCrawlServer', error);
    };

    process.on('SIGINT', () => {
      this.shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          this.logger.error('Shutdown failed', 'RagCrawlServer', error);
          process.exit(1);
        }
      );
    });
  }

  private initializeHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.handlers.flatMap(handler => handler.getToolDefinitions())
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: toolArgs } = request.params;

      const handler = this.handlers.find(candidate => candidate.handles(name));
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      const response: McpToolResponse = await handler.handleToolCall(name, toolArgs);
      return {
        content: response.content.map(item => ({ type: 'text' as const, text: item.text })),
        isError: response.isError ?? false,
        ...(response.errorDetails ? { errorDetails: response.errorDetails } : {})
      };
    });
  }

  async start(): Promise<void> {
    this.initializeHandlers();
    this.services.jobManager.startProgressMonitor();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info(
      `${this.services.config.mcp.name} ${this.services.config.mcp.version} running on stdio`,
      'RagCrawlServer'
    );
  }

  async shutdown(): Promise<void> {
    await this.services.jobManager.shutdown();
    await this.server.close();
    this.logger.info('Server stopped', 'RagCrawlServer');
  }
}

async function main(): Promise<void> {
  const services = CrawlerServiceProvider.getInstance();
  const server = new RagCrawlServer(services);
  await server.start();
}

main().catch((error: unknown) => {
  const err = toError(error);
  getLogger().logError(err, 'RagCrawlServer', 'Failed to start server');
  process.stderr.write(`ragcrawl: ${err.message}\n`);
  process.exit(1);
});
