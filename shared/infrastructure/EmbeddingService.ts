import { pipeline } from '@xenova/transformers';
import type { EmbeddingProvider } from '../domain/capabilities/EmbeddingProvider.js';
import { EmbeddingError, toError } from '../domain/errors.js';
import { Logger, getLogger } from './logging.js';

type FeatureExtractor = (text: string, options: { pooling: 'mean'; normalize: boolean }) => Promise<unknown>;

function isFeatureExtractor(value: unknown): value is FeatureExtractor {
  return typeof value === 'function';
}

function isNumberArrayLike(value: unknown): value is ArrayLike<number> {
  if (Array.isArray(value)) {
    return value.every(item => typeof item === 'number');
  }
  return value instanceof Float32Array || value instanceof Float64Array;
}

/**
 * Pull the vector out of a feature-extraction result.
 * Tensors carry a Float32Array in `data`; plain arrays may be nested one level.
 */
export function toVector(output: unknown): number[] | null {
  if (output && typeof output === 'object' && 'data' in output && isNumberArrayLike(output.data)) {
    return Array.from(output.data);
  }
  if (Array.isArray(output) && output.length > 0) {
    const first: unknown = output[0];
    if (isNumberArrayLike(first)) {
      return Array.from(first);
    }
  }
  if (isNumberArrayLike(output)) {
    return Array.from(output);
  }
  return null;
}

/**
 * Sentence embeddings through a local transformers.js pipeline
 * (mean pooled, L2 normalized).
 */
export class EmbeddingService implements EmbeddingProvider {
  private modelName: string;
  private embedder: FeatureExtractor | null = null;
  private initPromise: Promise<FeatureExtractor> | null = null;
  private logger: Logger;

  constructor(modelName = 'Xenova/all-MiniLM-L6-v2', loggerInstance?: Logger) {
    this.modelName = modelName;
    this.logger = loggerInstance || getLogger();
    this.logger.info(`EmbeddingService initialized with model: ${this.modelName}`, 'EmbeddingService');
  }

  /**
   * Load the model once; concurrent callers share the same load.
   * A failed load is not cached, so the next call retries.
   */
  init(): Promise<FeatureExtractor> {
    if (this.embedder) {
      return Promise.resolve(this.embedder);
    }
    if (!this.initPromise) {
      this.initPromise = this.loadModel().finally(() => {
        this.initPromise = null;
      });
    }
    return this.initPromise;
  }

  private async loadModel(): Promise<FeatureExtractor> {
    this.logger.info(`Initializing embedding model: ${this.modelName}...`, 'EmbeddingService.init');
    try {
      const loaded: unknown = await pipeline('feature-extraction', this.modelName);
      if (!isFeatureExtractor(loaded)) {
        throw new EmbeddingError('Pipeline is not callable', this.modelName);
      }
      this.embedder = loaded;
      this.logger.info(`Embedding model ${this.modelName} loaded successfully.`, 'EmbeddingService.init');
      return loaded;
    } catch (error: unknown) {
      const message = `Failed to initialize embedding model ${this.modelName}`;
      this.logger.error(message, 'EmbeddingService.init', error);
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(message, this.modelName, toError(error));
    }
  }

  async embed(text: string): Promise<number[]> {
    const embedder = await this.init();

    try {
      this.logger.debug(`Generating embedding for text (length: ${text.length})...`, 'EmbeddingService.embed');
      const output = await embedder(text, { pooling: 'mean', normalize: true });
      const vector = toVector(output);

      if (!vector) {
        throw new EmbeddingError('Unexpected output format from embedding model', this.modelName);
      }
      return vector;
    } catch (error: unknown) {
      this.logger.error('Failed to generate embedding', 'EmbeddingService.embed', error);
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError('Failed to generate embedding', this.modelName, toError(error));
    }
  }
}
