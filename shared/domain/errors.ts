/**
 * Defines custom error types for the ragcrawl application.
 */

/**
 * Base class for all ragcrawl specific errors.
 * Carries a stable errorCode and optional structured details.
 */
export class RagCrawlError extends Error {
  public errorCode: string; // Mutable so subclasses can override
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name; // Set the error name to the class name
    this.errorCode = errorCode;
    this.details = details;

    // Maintains proper stack trace in V8 environments (like Node.js)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Configuration Errors ---

export class ConfigError extends RagCrawlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

// --- Validation Errors ---

export class ValidationError extends RagCrawlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, 'VALIDATION_ERROR', details);
  }
}

// --- Fetch Errors (page level, absorbed by the crawl) ---

export class FetchError extends RagCrawlError {
  constructor(message: string, errorCode: string = 'FETCH_ERROR', details?: Record<string, unknown>) {
    super(`Fetch failed: ${message}`, errorCode, details);
  }
}

export class FetchTimeoutError extends FetchError {
  constructor(url: string, timeoutMs: number, details?: Record<string, unknown>) {
    super(`Timeout (${timeoutMs}ms) occurred while fetching URL: ${url}`, 'FETCH_TIMEOUT', { url, timeoutMs, ...details });
  }
}

export class FetchHttpError extends FetchError {
  constructor(url: string, statusCode: number, details?: Record<string, unknown>) {
    super(`HTTP status ${statusCode} returned for URL: ${url}`, 'FETCH_HTTP_ERROR', { url, statusCode, ...details });
  }
}

export class FetchNetworkError extends FetchError {
  constructor(url: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Network error occurred while fetching URL: ${url}. ${originalError?.message || ''}`.trim(), 'FETCH_NETWORK_ERROR', { url, originalError, ...details });
  }
}

export class RobotsDisallowedError extends FetchError {
  constructor(url: string) {
    super(`URL ${url} is disallowed by robots.txt`, 'ROBOTS_DISALLOWED', { url });
  }
}

// --- Capability Errors (renderer, embedding, vector store, LLM) ---

export type CapabilityName = 'renderer' | 'embedding' | 'vector-store' | 'llm';

export class CapabilityUnavailableError extends RagCrawlError {
  public readonly capability: CapabilityName;

  constructor(capability: CapabilityName, message: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`${capability} unavailable: ${message}${originalError ? `. ${originalError.message}` : ''}`, 'CAPABILITY_UNAVAILABLE', { capability, originalError, ...details });
    this.capability = capability;
  }
}

export class RendererUnavailableError extends CapabilityUnavailableError {
  constructor(url: string, originalError?: Error) {
    super('renderer', `could not reach ${url}`, originalError, { url });
  }
}

export class EmbeddingError extends CapabilityUnavailableError {
  constructor(message: string, model?: string, originalError?: Error) {
    super('embedding', `${message}${model ? ` (model ${model})` : ''}`, originalError, { model });
  }
}

export class VectorStoreError extends CapabilityUnavailableError {
  constructor(message: string, originalError?: Error, details?: Record<string, unknown>) {
    super('vector-store', message, originalError, details);
  }
}

export class LlmError extends CapabilityUnavailableError {
  constructor(message: string, model?: string, originalError?: Error) {
    super('llm', `${message}${model ? ` (model ${model})` : ''}`, originalError, { model });
  }
}

// --- Job Errors ---

export class NotFoundError extends RagCrawlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
  }
}

export class JobNotFoundError extends NotFoundError {
  constructor(domain: string) {
    super(`No crawl job found for domain '${domain}'.`, { domain });
  }
}

export class JobAlreadyRunningError extends RagCrawlError {
  constructor(domain: string, state: string) {
    super(`A crawl job for domain '${domain}' is already ${state}.`, 'ALREADY_RUNNING', { domain, state });
  }
}

// --- Utility functions ---

export function isRagCrawlError(error: unknown): error is RagCrawlError {
  return error instanceof RagCrawlError;
}

/**
 * Coerce an unknown thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
