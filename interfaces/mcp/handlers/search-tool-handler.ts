/**
 * Handler for the kb-search tool
 */
import { z } from 'zod';
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import type { McpToolResponse } from '../tool-types.js';
import type { QueryPipeline } from '../../../services/search/domain/QueryPipeline.js';
import type { Logger } from '../../../shared/infrastructure/logging.js';

const searchToolParamsSchema = z.object({
  domain: z.string().min(1, 'Domain cannot be empty'),
  query: z.string().trim().min(1, 'Query cannot be empty')
});

export class SearchToolHandler extends BaseToolHandler {
  constructor(private readonly queryPipeline: QueryPipeline, loggerInstance?: Logger) {
    super(loggerInstance);
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'kb-search',
        description: 'Search the knowledge base built for a domain. Returns the closest stored passages with their source URLs and, when a language model is configured, an answer synthesized from them.',
        inputSchema: {
          type: 'object',
          properties: {
            domain: { type: 'string', description: "The domain to search within, e.g. 'example.com'." },
            query: { type: 'string', description: 'Natural-language question.' }
          },
          required: ['domain', 'query']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    if (name !== 'kb-search') {
      return this.createErrorResponse(`Unknown tool: ${name}`);
    }

    try {
      const { domain, query } = this.parseArgs(searchToolParamsSchema, args);
      const result = await this.queryPipeline.search(domain, query);
      this.logger.info(`Search returned ${result.matches.length} matches for "${query}"`, 'SearchToolHandler');
      return this.createJsonResponse(result);
    } catch (error: unknown) {
      this.logger.error('Search failed', 'SearchToolHandler', error);
      return this.createStructuredErrorResponse(error);
    }
  }
}
