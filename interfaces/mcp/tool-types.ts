/**
 * Type definitions for MCP tool responses
 */

/**
 * Content item for MCP tool responses
 */
export interface McpContentItem {
  type: 'text';
  text: string;
}

/**
 * Machine readable error classification
 */
export interface McpErrorDetails {
  /** Error class name, e.g. JobNotFoundError */
  type: string;

  /** Stable error code, e.g. NOT_FOUND */
  code: string;
}

/**
 * Response for MCP tools
 */
export interface McpToolResponse {
  content: McpContentItem[];

  /** Whether the response is an error */
  isError?: boolean;

  errorDetails?: McpErrorDetails;
}
