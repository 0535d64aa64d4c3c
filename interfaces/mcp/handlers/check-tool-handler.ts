/**
 * Handler for the service-check tool
 *
 * Reports whether the capabilities behind the knowledge base are reachable.
 */
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import type { McpToolResponse } from '../tool-types.js';
import type { LlmProvider } from '../../../shared/domain/capabilities/LlmProvider.js';
import type { VectorRepository } from '../../../shared/domain/repositories/VectorRepository.js';
import type { Logger } from '../../../shared/infrastructure/logging.js';

export type ServiceState = 'ok' | 'unreachable' | 'disabled';

export class CheckToolHandler extends BaseToolHandler {
  constructor(
    private readonly vectorRepository: VectorRepository,
    private readonly llm: LlmProvider | null,
    loggerInstance?: Logger
  ) {
    super(loggerInstance);
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'service-check',
        description: 'Check whether the vector store and, when enabled, the language model server are reachable.',
        inputSchema: {
          type: 'object',
          properties: {}
        }
      }
    ];
  }

  async handleToolCall(name: string, _args: unknown): Promise<McpToolResponse> {
    if (name !== 'service-check') {
      return this.createErrorResponse(`Unknown tool: ${name}`);
    }

    const [vectorStore, llm] = await Promise.all([
      this.vectorRepository.healthCheck(),
      this.llm ? this.llm.healthCheck() : Promise.resolve(null)
    ]);

    const report: Record<'vectorStore' | 'llm', ServiceState> = {
      vectorStore: vectorStore ? 'ok' : 'unreachable',
      llm: llm === null ? 'disabled' : llm ? 'ok' : 'unreachable'
    };
    return this.createJsonResponse(report);
  }
}
