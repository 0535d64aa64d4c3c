/**
 * Base interface and class for MCP tool handlers
 */
import { z } from 'zod';
import type { McpToolResponse } from '../tool-types.js';
import { ValidationError, isRagCrawlError } from '../../../shared/domain/errors.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';

/**
 * Tool definition as used in MCP SDK
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Base interface for all tool handlers
 */
export interface IToolHandler {
  getToolDefinitions(): ToolDefinition[];
  handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;
}

/**
 * Base abstract class for all tool handlers
 */
export abstract class BaseToolHandler implements IToolHandler {
  protected logger: Logger;

  constructor(loggerInstance?: Logger) {
    this.logger = loggerInstance || getLogger();
  }

  abstract getToolDefinitions(): ToolDefinition[];

  abstract handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;

  /**
   * Whether this handler provides the named tool
   */
  handles(name: string): boolean {
    return this.getToolDefinitions().some(tool => tool.name === name);
  }

  /**
   * Validate tool arguments against a schema
   * @throws ValidationError listing every issue
   */
  protected parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
      throw new ValidationError(issues.join('; '), { issues });
    }
    return parsed.data;
  }

  /**
   * Create a standard success response
   */
  protected createSuccessResponse(text: string): McpToolResponse {
    return {
      content: [{ type: 'text', text }]
    };
  }

  /**
   * Create a success response carrying pretty-printed JSON
   */
  protected createJsonResponse(value: unknown): McpToolResponse {
    return this.createSuccessResponse(JSON.stringify(value, null, 2));
  }

  /**
   * Create a standard error response (simple text)
   */
  protected createErrorResponse(text: string): McpToolResponse {
    return {
      content: [{ type: 'text', text }],
      isError: true,
      errorDetails: { type: 'HandlerError', code: 'HANDLER_ERROR' }
    };
  }

  /**
   * Create a structured error response with error type derived from the error object
   */
  protected createStructuredErrorResponse(error: unknown): McpToolResponse {
    let message = 'An unknown error occurred';
    let errorType = 'UnknownError';
    let errorCode = 'UNKNOWN';

    if (isRagCrawlError(error)) {
      message = error.message;
      errorType = error.name; // The specific class name, e.g. JobNotFoundError
      errorCode = error.errorCode;
    } else if (error instanceof Error) {
      message = error.message;
      errorType = error.name && error.name !== 'Error' ? error.name : 'GenericError';
      errorCode = 'GENERIC_ERROR';
    } else if (typeof error === 'string') {
      message = error;
      errorType = 'StringError';
      errorCode = 'STRING_ERROR';
    }

    return {
      isError: true,
      content: [{ type: 'text', text: message }],
      errorDetails: {
        type: errorType,
        code: errorCode
      }
    };
  }
}
