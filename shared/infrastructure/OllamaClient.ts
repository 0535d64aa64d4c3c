import axios, { AxiosInstance } from 'axios';
import type { LlmProvider } from '../domain/capabilities/LlmProvider.js';
import { LlmError, toError } from '../domain/errors.js';
import { Logger, getLogger } from './logging.js';

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Text generation through an Ollama server's HTTP API
 */
export class OllamaClient implements LlmProvider {
  private http: AxiosInstance;
  private model: string;
  private logger: Logger;

  constructor(options: OllamaClientOptions, loggerInstance?: Logger) {
    this.model = options.model;
    this.logger = loggerInstance || getLogger();
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeout ?? 120000
    });
  }

  async generate(prompt: string): Promise<string> {
    this.logger.debug(`Generating with ${this.model} (prompt length: ${prompt.length})`, 'OllamaClient.generate');

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/api/generate', {
        model: this.model,
        prompt,
        stream: false
      });
      data = response.data;
    } catch (error: unknown) {
      const message = axios.isAxiosError(error) && error.response
        ? `Ollama returned status ${error.response.status}`
        : 'Ollama request failed';
      this.logger.error(message, 'OllamaClient.generate', error);
      throw new LlmError(message, this.model, toError(error));
    }

    if (typeof data === 'object' && data !== null && 'response' in data && typeof data.response === 'string') {
      return data.response;
    }
    throw new LlmError('Unexpected response format from Ollama', this.model);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.http.get('/api/tags');
      return true;
    } catch (error: unknown) {
      this.logger.warn('Ollama health check failed', 'OllamaClient.healthCheck', error);
      return false;
    }
  }
}
