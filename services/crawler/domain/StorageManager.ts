/**
 * StorageManager: the embedding/store sink
 *
 * Embeds each chunk and upserts it into the domain's collection under a
 * key derived from (domain, url, chunk index), so re-crawls overwrite
 * rather than duplicate.
 */

import { v5 as uuidv5 } from 'uuid';
import EventEmitter from 'events';
import type { EmbeddingProvider } from '../../../shared/domain/capabilities/EmbeddingProvider.js';
import type { VectorRepository } from '../../../shared/domain/repositories/VectorRepository.js';
import type { Chunk, ChunkPayload } from '../../../shared/domain/models/Page.js';
import { collectionName } from '../../../shared/domain/collections.js';
import { ConfigError } from '../../../shared/domain/errors.js';
import type { DistanceMetric } from '../../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';

export interface StorageManagerOptions {
  /** Configured collection identifier */
  collectionPrefix: string;
  vectorSize: number;
  distanceMetric: DistanceMetric;
}

/**
 * Event payload emitted for every stored chunk
 */
export interface ChunkStoredEvent {
  domain: string;
  collection: string;
  key: string;
  url: string;
  chunkIndex: number;
}

/**
 * Stable point key for a chunk
 */
export function chunkKey(domain: string, url: string, index: number): string {
  return uuidv5(`${domain}:${url}:${index}`, uuidv5.URL);
}

export class StorageManager {
  /** Event emitter for storage events */
  private eventEmitter = new EventEmitter();
  /** Collections known to exist, or being created */
  private ensured = new Map<string, Promise<void>>();
  private logger: Logger;

  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly vectorRepository: VectorRepository,
    private readonly options: StorageManagerOptions,
    loggerInstance?: Logger
  ) {
    this.logger = loggerInstance || getLogger();
  }

  collectionFor(domain: string): string {
    return collectionName(this.options.collectionPrefix, domain);
  }

  /**
   * Embed and upsert chunks in order.
   * @param shouldContinue Checked before each embedding and again right before each upsert
   * @returns Number of chunks stored
   * @throws ConfigError when the embedding size differs from the configured vector size
   */
  async storeChunks(domain: string, chunks: Iterable<Chunk>, shouldContinue: () => boolean = () => true): Promise<number> {
    const collection = this.collectionFor(domain);
    let stored = 0;

    for (const chunk of chunks) {
      if (!shouldContinue()) {
        break;
      }

      const vector = await this.embedder.embed(chunk.text);
      if (vector.length !== this.options.vectorSize) {
        throw new ConfigError(
          `Embedding dimensionality ${vector.length} does not match configured vector size ${this.options.vectorSize}`,
          { expected: this.options.vectorSize, actual: vector.length }
        );
      }

      await this.ensureCollection(collection);

      if (!shouldContinue()) {
        break;
      }

      const key = chunkKey(domain, chunk.url, chunk.index);
      const payload: ChunkPayload = {
        domain,
        url: chunk.url,
        title: chunk.title,
        text: chunk.text,
        chunkIndex: chunk.index,
        contentHash: chunk.contentHash,
        lastModified: chunk.lastModified,
        scrapedAt: new Date().toISOString()
      };
      await this.vectorRepository.upsert(collection, key, vector, payload);
      stored++;

      const event: ChunkStoredEvent = { domain, collection, key, url: chunk.url, chunkIndex: chunk.index };
      this.eventEmitter.emit('chunk-stored', event);
    }

    if (stored > 0) {
      this.logger.debug(`Stored ${stored} chunks in '${collection}'`, 'StorageManager');
    }
    return stored;
  }

  /**
   * Get the event emitter for storage events
   */
  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  private ensureCollection(collection: string): Promise<void> {
    let ready = this.ensured.get(collection);
    if (!ready) {
      ready = this.vectorRepository.ensureCollection(collection, this.options.vectorSize, this.options.distanceMetric);
      // A failed attempt is retried by the next caller
      void ready.catch(() => this.ensured.delete(collection));
      this.ensured.set(collection, ready);
    }
    return ready;
  }
}
