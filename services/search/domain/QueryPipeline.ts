/**
 * QueryPipeline: retrieval with optional generative answer
 *
 * Embeds the query with the ingestion model, reads the nearest chunks from
 * the domain's collection and, when an LLM is configured, asks it to
 * answer from those chunks.
 */

import type { EmbeddingProvider } from '../../../shared/domain/capabilities/EmbeddingProvider.js';
import type { LlmProvider } from '../../../shared/domain/capabilities/LlmProvider.js';
import type { VectorRepository } from '../../../shared/domain/repositories/VectorRepository.js';
import type { QueryMatch, QueryResult } from '../../../shared/domain/models/Query.js';
import { collectionName } from '../../../shared/domain/collections.js';
import { ConfigError, ValidationError } from '../../../shared/domain/errors.js';
import type { DistanceMetric } from '../../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { extractDomain } from '../../crawler/domain/UrlProcessor.js';

export interface QueryPipelineOptions {
  collectionPrefix: string;
  vectorSize: number;
  distanceMetric: DistanceMetric;
  topK: number;
  scoreThreshold?: number;
}

/**
 * Prompt given to the LLM: retrieved chunk texts in similarity order, then the question.
 */
export function buildPrompt(query: string, contexts: string[]): string {
  return `Context: ${contexts.join('\n')}\n\nQuestion: ${query}\nAnswer:`;
}

export class QueryPipeline {
  private logger: Logger;

  /**
   * @param llm Omitted when generation is disabled; matches are then returned alone
   */
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly vectorRepo: VectorRepository,
    private readonly options: QueryPipelineOptions,
    private readonly llm: LlmProvider | null = null,
    loggerInstance?: Logger
  ) {
    this.logger = loggerInstance || getLogger();
  }

  /**
   * @param domain Host name, or a URL whose host is used
   * @throws ValidationError for an empty query or domain
   * @throws ConfigError when the query embedding does not match the configured vector size
   */
  async search(domain: string, query: string): Promise<QueryResult> {
    const host = extractDomain(domain);
    const question = query.trim();
    if (!question) {
      throw new ValidationError('Query must not be empty');
    }

    this.logger.info(`Search on ${host}: "${question}"`, 'QueryPipeline.search');

    const vector = await this.embedder.embed(question);
    if (vector.length !== this.options.vectorSize) {
      throw new ConfigError(
        `Query embedding dimensionality ${vector.length} does not match configured vector size ${this.options.vectorSize}`,
        { expected: this.options.vectorSize, actual: vector.length }
      );
    }

    const collection = collectionName(this.options.collectionPrefix, host);
    const found = await this.vectorRepo.query(
      collection,
      vector,
      this.options.topK,
      this.options.distanceMetric,
      this.options.scoreThreshold
    );

    const matches: QueryMatch[] = found.map(match => ({
      text: match.payload.text,
      url: match.payload.url,
      title: match.payload.title,
      chunkIndex: match.payload.chunkIndex,
      score: match.score
    }));

    if (matches.length === 0) {
      this.logger.info(`No stored chunks matched on ${host}`, 'QueryPipeline.search');
      return { domain: host, query: question, matches };
    }

    if (!this.llm) {
      return { domain: host, query: question, matches };
    }

    const prompt = buildPrompt(question, matches.map(match => match.text));
    const answer = await this.llm.generate(prompt);
    this.logger.debug(`Generated answer (${answer.length} chars)`, 'QueryPipeline.search');

    return { domain: host, query: question, matches, answer };
  }
}
