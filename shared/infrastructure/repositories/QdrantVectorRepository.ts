import { QdrantClient } from '@qdrant/js-client-rest';
import type { VectorMatch, VectorRepository } from '../../domain/repositories/VectorRepository.js';
import { parseChunkPayload, type ChunkPayload } from '../../domain/models/Page.js';
import { ConfigError, VectorStoreError, toError } from '../../domain/errors.js';
import type { DistanceMetric } from '../config.js';
import { Logger, getLogger } from '../logging.js';

type QdrantDistance = 'Cosine' | 'Euclid' | 'Dot';

const DISTANCES: Record<DistanceMetric, QdrantDistance> = {
  cosine: 'Cosine',
  euclidean: 'Euclid',
  dot: 'Dot'
};

interface VectorParams {
  size: number;
  distance: string;
}

function isVectorParams(value: unknown): value is VectorParams {
  return typeof value === 'object' && value !== null &&
    'size' in value && typeof value.size === 'number' &&
    'distance' in value && typeof value.distance === 'string';
}

/**
 * Compare the vector parameters Qdrant reports for a collection with the configured ones.
 * Collections with named vectors have no single size and are rejected.
 * @throws ConfigError on any mismatch
 */
export function checkVectorParams(collection: string, vectors: unknown, vectorSize: number, metric: DistanceMetric): void {
  const expected = DISTANCES[metric];
  if (!isVectorParams(vectors)) {
    throw new ConfigError(`Collection '${collection}' does not use a single unnamed vector`, { collection });
  }
  if (vectors.size !== vectorSize || vectors.distance !== expected) {
    throw new ConfigError(
      `Collection '${collection}' holds ${vectors.size}-dimensional ${vectors.distance} vectors, configured ${vectorSize}-dimensional ${expected}`,
      { collection, actualSize: vectors.size, actualDistance: vectors.distance, expectedSize: vectorSize, expectedDistance: expected }
    );
  }
}

export class QdrantVectorRepository implements VectorRepository {
  private client: QdrantClient;
  private logger: Logger;
  private knownCollections = new Set<string>();
  /** Collections whose size and distance matched, keyed `collection/size/metric` */
  private verified = new Set<string>();

  constructor(qdrantUrl: string, loggerInstance?: Logger) {
    this.client = new QdrantClient({ url: qdrantUrl });
    this.logger = loggerInstance || getLogger();
    this.logger.info(`QdrantVectorRepository initialized. URL: ${qdrantUrl}`, 'QdrantVectorRepository');
  }

  private async collectionExists(collection: string): Promise<boolean> {
    if (this.knownCollections.has(collection)) {
      return true;
    }
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c: { name: string }) => c.name === collection);
    if (exists) {
      this.knownCollections.add(collection);
    }
    return exists;
  }

  private async verifyCollection(collection: string, vectorSize: number, metric: DistanceMetric): Promise<void> {
    const key = `${collection}/${vectorSize}/${metric}`;
    if (this.verified.has(key)) {
      return;
    }
    const info = await this.client.getCollection(collection);
    checkVectorParams(collection, info.config.params.vectors, vectorSize, metric);
    this.verified.add(key);
  }

  async ensureCollection(collection: string, vectorSize: number, metric: DistanceMetric): Promise<void> {
    try {
      if (await this.collectionExists(collection)) {
        await this.verifyCollection(collection, vectorSize, metric);
        this.logger.debug(`Collection '${collection}' already exists.`, 'QdrantVectorRepository.ensureCollection');
        return;
      }

      this.logger.info(`Collection '${collection}' not found. Creating...`, 'QdrantVectorRepository.ensureCollection');
      await this.client.createCollection(collection, {
        vectors: {
          size: vectorSize,
          distance: DISTANCES[metric]
        }
      });
      this.knownCollections.add(collection);
      this.verified.add(`${collection}/${vectorSize}/${metric}`);
      this.logger.info(`Collection '${collection}' created (size ${vectorSize}, ${DISTANCES[metric]}).`, 'QdrantVectorRepository.ensureCollection');
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        throw error;
      }
      const message = `Failed to ensure Qdrant collection '${collection}'`;
      this.logger.error(message, 'QdrantVectorRepository.ensureCollection', error);
      throw new VectorStoreError(message, toError(error), { collection });
    }
  }

  async upsert(collection: string, key: string, vector: number[], payload: ChunkPayload): Promise<void> {
    try {
      await this.client.upsert(collection, {
        wait: true, // Wait for operation to complete
        points: [
          {
            id: key,
            vector,
            payload
          }
        ]
      });
      this.logger.debug(`Upserted point ${key} into '${collection}'`, 'QdrantVectorRepository.upsert');
    } catch (error: unknown) {
      const message = `Failed to upsert point ${key} into '${collection}'`;
      this.logger.error(message, 'QdrantVectorRepository.upsert', error);
      throw new VectorStoreError(message, toError(error), { collection, key });
    }
  }

  async query(
    collection: string,
    vector: number[],
    k: number,
    metric: DistanceMetric,
    scoreThreshold?: number
  ): Promise<VectorMatch[]> {
    try {
      if (!(await this.collectionExists(collection))) {
        this.logger.debug(`Collection '${collection}' does not exist; no matches.`, 'QdrantVectorRepository.query');
        return [];
      }
      await this.verifyCollection(collection, vector.length, metric);

      const results = await this.client.search(collection, {
        vector,
        limit: k,
        with_payload: true,
        score_threshold: scoreThreshold
      });

      const matches: VectorMatch[] = [];
      for (const point of results) {
        const payload = parseChunkPayload(point.payload);
        if (!payload) {
          this.logger.warn(`Point ${point.id} in '${collection}' has an unexpected payload`, 'QdrantVectorRepository.query');
          continue;
        }
        matches.push({ id: String(point.id), score: point.score, payload });
      }
      this.logger.debug(`Query on '${collection}' (${metric}) returned ${matches.length} matches`, 'QdrantVectorRepository.query');
      return matches;
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        throw error;
      }
      const message = `Failed to query collection '${collection}'`;
      this.logger.error(message, 'QdrantVectorRepository.query', error);
      throw new VectorStoreError(message, toError(error), { collection });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error: unknown) {
      this.logger.warn('Qdrant health check failed', 'QdrantVectorRepository.healthCheck', error);
      return false;
    }
  }
}
