import { describe, it } from 'node:test';
import assert from 'assert';
import { buildConfig, configFromEnv, defaultConfig } from '../infrastructure/config.js';
import { ConfigError } from '../domain/errors.js';

describe('buildConfig', () => {
  it('returns the defaults when nothing is set', () => {
    const config = buildConfig({});
    assert.deepStrictEqual(config, defaultConfig);
    assert.strictEqual(config.crawler.maxPages, 200);
    assert.strictEqual(config.crawler.concurrency, 25);
    assert.strictEqual(config.crawler.crawlDelay, 2);
    assert.strictEqual(config.crawler.userAgent, 'Mozilla/5.0 (compatible; RAGSearchBot/1.0;)');
  });

  it('lets the environment override file settings key by key', () => {
    const config = buildConfig(
      { RAGCRAWL_CONCURRENCY: '3' },
      [{ crawler: { concurrency: 7, crawlDelay: 1 } }]
    );
    assert.strictEqual(config.crawler.concurrency, 3);
    assert.strictEqual(config.crawler.crawlDelay, 1);
    assert.strictEqual(config.crawler.maxPages, 200);
  });

  it('applies later file layers over earlier ones', () => {
    const config = buildConfig({}, [
      { vectorDatabase: { type: 'memory', topK: 3 } },
      { vectorDatabase: { topK: 8 } }
    ]);
    assert.strictEqual(config.vectorDatabase.type, 'memory');
    assert.strictEqual(config.vectorDatabase.topK, 8);
  });

  it('embeds through Ollama by default and can switch to a local model', () => {
    assert.strictEqual(buildConfig({}).embedding.provider, 'ollama');
    assert.strictEqual(buildConfig({}).embedding.model, 'all-minilm');

    const config = buildConfig({ RAGCRAWL_EMBEDDING_PROVIDER: 'Transformers' });
    assert.strictEqual(config.embedding.provider, 'transformers');
    assert.strictEqual(config.embedding.localModel, 'Xenova/all-MiniLM-L6-v2');
  });

  it('reads booleans and lists from the environment', () => {
    const config = buildConfig({
      RAGCRAWL_LLM_DISABLE: 'yes',
      RAGCRAWL_ROBOTS_OVERRIDE: '0',
      RAGCRAWL_ALLOWED_HOSTS: 'example.com, docs.example.org'
    });
    assert.strictEqual(config.llm.disable, true);
    assert.strictEqual(config.crawler.robotsOverride, false);
    assert.deepStrictEqual(config.security.allowedHosts, ['example.com', 'docs.example.org']);
  });

  it('rejects a non-numeric number', () => {
    assert.throws(
      () => buildConfig({ RAGCRAWL_MAX_PAGES: 'many' }),
      (error: unknown) => error instanceof ConfigError && /crawler\.maxPages/.test(error.message)
    );
  });

  it('rejects an overlap of half the chunk size or more', () => {
    assert.throws(
      () => buildConfig({}, [{ crawler: { chunkSize: 100, chunkOverlap: 50 } }]),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === 'Configuration error: crawler.chunkOverlap: chunkOverlap must be smaller than half of chunkSize'
    );
  });

  it('rejects a collection name with spaces', () => {
    assert.throws(
      () => buildConfig({ RAGCRAWL_COLLECTION: 'my kb' }),
      (error: unknown) => error instanceof ConfigError && /vectorDatabase\.collection/.test(error.message)
    );
  });

  it('rejects an unknown distance metric', () => {
    assert.throws(() => buildConfig({ RAGCRAWL_DISTANCE_METRIC: 'manhattan' }), ConfigError);
  });
});

describe('configFromEnv', () => {
  it('leaves unset variables out', () => {
    assert.deepStrictEqual(configFromEnv({ RAGCRAWL_TOP_K: '4' }), {
      crawler: {},
      vectorDatabase: { topK: 4 },
      embedding: {},
      llm: {},
      security: {}
    });
  });

  it('lowercases enum values', () => {
    const layer = configFromEnv({ RAGCRAWL_LOG_LEVEL: 'DEBUG', RAGCRAWL_DISTANCE_METRIC: 'Dot' });
    assert.strictEqual(layer.logLevel, 'debug');
    assert.deepStrictEqual(layer.vectorDatabase, { distanceMetric: 'dot' });
  });
});
