import axios, { AxiosInstance } from 'axios';
import type { EmbeddingProvider } from '../domain/capabilities/EmbeddingProvider.js';
import { EmbeddingError, toError } from '../domain/errors.js';
import { Logger, getLogger } from './logging.js';

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  /** e.g. all-minilm (384 dimensions) */
  model: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

/**
 * Sentence embeddings from an Ollama server's embeddings endpoint
 */
export class OllamaEmbeddingService implements EmbeddingProvider {
  private http: AxiosInstance;
  private model: string;
  private logger: Logger;

  constructor(options: OllamaEmbeddingOptions, loggerInstance?: Logger) {
    this.model = options.model;
    this.logger = loggerInstance || getLogger();
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeout ?? 60000
    });
    this.logger.info(`OllamaEmbeddingService initialized with model: ${this.model}`, 'OllamaEmbeddingService');
  }

  async embed(text: string): Promise<number[]> {
    this.logger.debug(`Generating embedding for text (length: ${text.length})...`, 'OllamaEmbeddingService.embed');

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/api/embeddings', {
        model: this.model,
        prompt: text
      });
      data = response.data;
    } catch (error: unknown) {
      const message = axios.isAxiosError(error) && error.response
        ? `Ollama returned status ${error.response.status}`
        : 'Ollama request failed';
      this.logger.error(message, 'OllamaEmbeddingService.embed', error);
      throw new EmbeddingError(message, this.model, toError(error));
    }

    if (typeof data === 'object' && data !== null && 'embedding' in data && isNumberArray(data.embedding) && data.embedding.length > 0) {
      return data.embedding;
    }
    throw new EmbeddingError('Unexpected response format from Ollama', this.model);
  }
}
