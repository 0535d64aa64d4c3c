import type { VectorMatch, VectorRepository } from '../../domain/repositories/VectorRepository.js';
import type { ChunkPayload } from '../../domain/models/Page.js';
import { ConfigError } from '../../domain/errors.js';
import type { DistanceMetric } from '../config.js';
import { Logger, getLogger } from '../logging.js';

interface StoredPoint {
  vector: number[];
  payload: ChunkPayload;
}

interface MemoryCollection {
  vectorSize: number;
  metric: DistanceMetric;
  points: Map<string, StoredPoint>;
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Score two vectors under a metric. Cosine and dot are similarities
 * (higher is closer), euclidean is a distance (lower is closer).
 */
export function score(a: number[], b: number[], metric: DistanceMetric): number {
  switch (metric) {
    case 'dot':
      return dot(a, b);
    case 'euclidean': {
      let sum = 0;
      for (let i = 0; i < a.length; i++) {
        const diff = a[i] - b[i];
        sum += diff * diff;
      }
      return Math.sqrt(sum);
    }
    case 'cosine': {
      const norms = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
      return norms === 0 ? 0 : dot(a, b) / norms;
    }
  }
}

function assertCollectionParams(
  collection: string,
  actualSize: number,
  actualMetric: DistanceMetric,
  expectedSize: number,
  expectedMetric: DistanceMetric
): void {
  if (actualSize !== expectedSize || actualMetric !== expectedMetric) {
    throw new ConfigError(
      `Collection '${collection}' holds ${actualSize}-dimensional ${actualMetric} vectors, configured ${expectedSize}-dimensional ${expectedMetric}`,
      { collection, actualSize, actualMetric, expectedSize, expectedMetric }
    );
  }
}

/**
 * Process-local vector store. Contents live as long as the process.
 */
export class InMemoryVectorRepository implements VectorRepository {
  private collections = new Map<string, MemoryCollection>();
  private logger: Logger;

  constructor(loggerInstance?: Logger) {
    this.logger = loggerInstance || getLogger();
  }

  /**
   * @throws ConfigError when the collection exists with another size or metric
   */
  async ensureCollection(collection: string, vectorSize: number, metric: DistanceMetric): Promise<void> {
    const existing = this.collections.get(collection);
    if (!existing) {
      this.collections.set(collection, { vectorSize, metric, points: new Map() });
      this.logger.info(`Created in-memory collection '${collection}' (size ${vectorSize}, ${metric})`, 'InMemoryVectorRepository');
      return;
    }
    assertCollectionParams(collection, existing.vectorSize, existing.metric, vectorSize, metric);
  }

  async upsert(collection: string, key: string, vector: number[], payload: ChunkPayload): Promise<void> {
    const target = this.collections.get(collection);
    if (!target) {
      throw new ConfigError(`Collection '${collection}' does not exist`, { collection });
    }
    if (vector.length !== target.vectorSize) {
      throw new ConfigError(`Vector of size ${vector.length} does not fit collection '${collection}' (size ${target.vectorSize})`, { collection });
    }
    target.points.set(key, { vector: [...vector], payload: { ...payload } });
  }

  async query(
    collection: string,
    vector: number[],
    k: number,
    metric: DistanceMetric,
    scoreThreshold?: number
  ): Promise<VectorMatch[]> {
    const target = this.collections.get(collection);
    if (!target) {
      return [];
    }
    assertCollectionParams(collection, target.vectorSize, target.metric, vector.length, metric);

    const ascending = metric === 'euclidean';
    const matches: VectorMatch[] = [];
    for (const [id, point] of target.points) {
      const value = score(vector, point.vector, metric);
      if (scoreThreshold !== undefined && (ascending ? value > scoreThreshold : value < scoreThreshold)) {
        continue;
      }
      matches.push({ id, score: value, payload: { ...point.payload } });
    }

    matches.sort((a, b) => (ascending ? a.score - b.score : b.score - a.score));
    return matches.slice(0, k);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of points stored in a collection */
  count(collection: string): number {
    return this.collections.get(collection)?.points.size ?? 0;
  }
}
