import type { DistanceMetric } from '../../infrastructure/config.js';
import type { ChunkPayload } from '../models/Page.js';

export interface VectorMatch {
  id: string;
  score: number;
  payload: ChunkPayload;
}

export interface VectorRepository {
  /**
   * Ensure the collection exists, creating it with the given dimensionality if necessary.
   */
  ensureCollection(collection: string, vectorSize: number, metric: DistanceMetric): Promise<void>;

  /**
   * Create or replace the vector stored under key.
   */
  upsert(collection: string, key: string, vector: number[], payload: ChunkPayload): Promise<void>;

  /**
   * Return up to k stored vectors nearest to vector, best first.
   * A collection that does not exist yields no matches.
   * @param scoreThreshold Drop matches scoring worse than this
   */
  query(collection: string, vector: number[], k: number, metric: DistanceMetric, scoreThreshold?: number): Promise<VectorMatch[]>;

  /**
   * Whether the store is reachable.
   */
  healthCheck(): Promise<boolean>;
}
