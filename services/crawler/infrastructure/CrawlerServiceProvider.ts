/**
 * Wires the crawl engine and query pipeline to concrete adapters
 */

import type { EmbeddingProvider } from '../../../shared/domain/capabilities/EmbeddingProvider.js';
import type { LlmProvider } from '../../../shared/domain/capabilities/LlmProvider.js';
import type { Renderer, RobotsFetcher } from '../../../shared/domain/capabilities/Renderer.js';
import type { CrawlSettings } from '../../../shared/domain/models/CrawlJob.js';
import type { VectorRepository } from '../../../shared/domain/repositories/VectorRepository.js';
import { EmbeddingService } from '../../../shared/infrastructure/EmbeddingService.js';
import { HttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { OllamaClient } from '../../../shared/infrastructure/OllamaClient.js';
import { OllamaEmbeddingService } from '../../../shared/infrastructure/OllamaEmbeddingService.js';
import { getConfig, type RagCrawlConfig } from '../../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { InMemoryVectorRepository } from '../../../shared/infrastructure/repositories/InMemoryVectorRepository.js';
import { QdrantVectorRepository } from '../../../shared/infrastructure/repositories/QdrantVectorRepository.js';
import { QueryPipeline } from '../../search/domain/QueryPipeline.js';
import { ContentProcessor } from '../domain/ContentProcessor.js';
import { JobManager } from '../domain/JobManager.js';
import { StorageManager } from '../domain/StorageManager.js';

/**
 * Adapters that can be replaced, e.g. by in-process fakes
 */
export interface AdapterOverrides {
  renderer?: Renderer;
  robotsFetcher?: RobotsFetcher;
  embedder?: EmbeddingProvider;
  vectorRepository?: VectorRepository;
  /** null disables generation */
  llm?: LlmProvider | null;
}

export interface RagCrawlServices {
  config: RagCrawlConfig;
  jobManager: JobManager;
  queryPipeline: QueryPipeline;
  vectorRepository: VectorRepository;
  llm: LlmProvider | null;
}

export function crawlSettingsFrom(config: RagCrawlConfig): CrawlSettings {
  return {
    userAgent: config.crawler.userAgent,
    maxPages: config.crawler.maxPages,
    concurrency: config.crawler.concurrency,
    crawlDelay: config.crawler.crawlDelay,
    robotsOverride: config.crawler.robotsOverride,
    failureThreshold: config.crawler.failureThreshold
  };
}

/**
 * Embedding provider selected by `embedding.provider`
 */
export function createEmbedder(config: RagCrawlConfig, loggerInstance?: Logger): EmbeddingProvider {
  const { embedding } = config;
  if (embedding.provider === 'transformers') {
    return new EmbeddingService(embedding.localModel, loggerInstance);
  }
  return new OllamaEmbeddingService(
    { baseUrl: embedding.baseUrl, model: embedding.model, timeout: embedding.timeout },
    loggerInstance
  );
}

/**
 * Factory for the application's services
 */
export class CrawlerServiceProvider {
  private static instance: RagCrawlServices | null = null;

  /**
   * Get the services singleton, created from the process configuration on first call
   */
  static getInstance(): RagCrawlServices {
    if (!this.instance) {
      this.instance = this.create(getConfig());
    }
    return this.instance;
  }

  /**
   * Build a service graph from configuration
   */
  static create(config: RagCrawlConfig, overrides: AdapterOverrides = {}, loggerInstance?: Logger): RagCrawlServices {
    const logger = loggerInstance || getLogger();

    let renderer = overrides.renderer;
    let robotsFetcher = overrides.robotsFetcher;
    if (!renderer || !robotsFetcher) {
      const httpClient = new HttpClient({ timeout: config.crawler.requestTimeout }, logger);
      renderer = renderer ?? httpClient;
      robotsFetcher = robotsFetcher ?? httpClient;
    }

    const embedder = overrides.embedder ?? createEmbedder(config, logger);

    const vectorRepository = overrides.vectorRepository ?? (
      config.vectorDatabase.type === 'memory'
        ? new InMemoryVectorRepository(logger)
        : new QdrantVectorRepository(config.vectorDatabase.url, logger)
    );

    const llm = config.llm.disable
      ? null
      : overrides.llm !== undefined
        ? overrides.llm
        : new OllamaClient({ baseUrl: config.llm.baseUrl, model: config.llm.model, timeout: config.llm.timeout }, logger);

    const contentProcessor = new ContentProcessor({
      chunkSize: config.crawler.chunkSize,
      chunkOverlap: config.crawler.chunkOverlap,
      minTextLength: config.crawler.minTextLength,
      minTextDensity: config.crawler.minTextDensity
    }, logger);

    const storageManager = new StorageManager(embedder, vectorRepository, {
      collectionPrefix: config.vectorDatabase.collection,
      vectorSize: config.vectorDatabase.vectorSize,
      distanceMetric: config.vectorDatabase.distanceMetric
    }, logger);

    const jobManager = new JobManager(
      { renderer, robotsFetcher, contentProcessor, storageManager },
      { defaults: crawlSettingsFrom(config), conflictPolicy: config.crawler.conflictPolicy },
      logger
    );

    const queryPipeline = new QueryPipeline(embedder, vectorRepository, {
      collectionPrefix: config.vectorDatabase.collection,
      vectorSize: config.vectorDatabase.vectorSize,
      distanceMetric: config.vectorDatabase.distanceMetric,
      topK: config.vectorDatabase.topK,
      scoreThreshold: config.vectorDatabase.scoreThreshold
    }, llm, logger);

    logger.info(
      `Services created (vector store: ${config.vectorDatabase.type}, llm: ${llm ? config.llm.model : 'disabled'})`,
      'CrawlerServiceProvider'
    );

    return { config, jobManager, queryPipeline, vectorRepository, llm };
  }
}
