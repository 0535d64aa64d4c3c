export interface QueryMatch {
  text: string;
  url: string;
  title: string;
  chunkIndex: number;
  /** Similarity (cosine, dot) or distance (euclidean) as reported by the store */
  score: number;
}

/**
 * Ordered matches for a query, most relevant first, with an optional synthesized answer
 */
export interface QueryResult {
  domain: string;
  query: string;
  matches: QueryMatch[];
  answer?: string;
}
