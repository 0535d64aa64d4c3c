/**
 * Configuration module for ragcrawl
 *
 * Loads configuration from defaults, config files and environment variables,
 * then validates the merged result.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../domain/errors.js';

// Load environment variables from .env file if present
dotenv.config();

const distanceMetricSchema = z.enum(['cosine', 'euclidean', 'dot']);

const configSchema = z.object({
  /** Base directory for data storage (logs) */
  dataDir: z.string().min(1),

  /** Minimum log level */
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),

  /** Where log lines are written; stdout is reserved for MCP */
  logTarget: z.enum(['file', 'stderr', 'none']),

  crawler: z.object({
    userAgent: z.string().min(1),
    /** Hard cap on fetch attempts per job run */
    maxPages: z.number().int().positive(),
    /** Worker count */
    concurrency: z.number().int().positive(),
    /** Minimum spacing between fetches on one domain, in seconds */
    crawlDelay: z.number().nonnegative(),
    robotsOverride: z.boolean(),
    /** Renderer request timeout in milliseconds */
    requestTimeout: z.number().int().positive(),
    /** Consecutive capability failures before a job fails */
    failureThreshold: z.number().int().positive(),
    /** Pages with less visible text than this are discarded */
    minTextLength: z.number().int().nonnegative(),
    /** Visible text / html length ratio below which a page is boilerplate (0 disables) */
    minTextDensity: z.number().min(0).max(1),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    conflictPolicy: z.enum(['reject', 'supersede'])
  }).refine(crawler => crawler.chunkOverlap < crawler.chunkSize / 2, {
    message: 'chunkOverlap must be smaller than half of chunkSize',
    path: ['chunkOverlap']
  }),

  vectorDatabase: z.object({
    type: z.enum(['qdrant', 'memory']),
    url: z.string().url(),
    /** Collection identifier; each domain gets `<collection>_<domain>` */
    collection: z.string().min(1).regex(/^[A-Za-z0-9_-]+$/, 'collection may only contain letters, digits, _ and -'),
    vectorSize: z.number().int().positive(),
    distanceMetric: distanceMetricSchema,
    topK: z.number().int().positive(),
    scoreThreshold: z.number().optional()
  }),

  embedding: z.object({
    /** ollama calls the embeddings endpoint; transformers runs a local model */
    provider: z.enum(['ollama', 'transformers']),
    /** Ollama embedding model */
    model: z.string().min(1),
    baseUrl: z.string().url(),
    timeout: z.number().int().positive(),
    /** transformers.js model, fetched on first use */
    localModel: z.string().min(1)
  }),

  llm: z.object({
    disable: z.boolean(),
    model: z.string().min(1),
    baseUrl: z.string().url(),
    timeout: z.number().int().positive()
  }),

  mcp: z.object({
    name: z.string().min(1),
    version: z.string().min(1)
  }),

  security: z.object({
    /** Hosts accepted as crawl targets; '*' accepts any host */
    allowedHosts: z.array(z.string().min(1))
  })
});

export type RagCrawlConfig = z.infer<typeof configSchema>;
export type DistanceMetric = z.infer<typeof distanceMetricSchema>;

// Get home directory
const HOME_DIR = os.homedir();

export const defaultConfig: RagCrawlConfig = {
  dataDir: path.join(HOME_DIR, '.ragcrawl'),
  logLevel: 'info',
  logTarget: 'file',

  crawler: {
    userAgent: 'Mozilla/5.0 (compatible; RAGSearchBot/1.0;)',
    maxPages: 200,
    concurrency: 25,
    crawlDelay: 2,
    robotsOverride: false,
    requestTimeout: 30000,
    failureThreshold: 5,
    minTextLength: 50,
    minTextDensity: 0,
    chunkSize: 1000,
    chunkOverlap: 200,
    conflictPolicy: 'reject'
  },

  vectorDatabase: {
    type: 'qdrant',
    url: 'http://localhost:6333',
    collection: 'kb',
    vectorSize: 384, // all-minilm / all-MiniLM-L6-v2
    distanceMetric: 'cosine',
    topK: 5
  },

  embedding: {
    provider: 'ollama',
    model: 'all-minilm',
    baseUrl: 'http://localhost:11434',
    timeout: 60000,
    localModel: 'Xenova/all-MiniLM-L6-v2'
  },

  llm: {
    disable: false,
    model: 'gemma3:12b',
    baseUrl: 'http://localhost:11434',
    timeout: 120000
  },

  mcp: {
    name: 'ragcrawl',
    version: '1.0.0'
  },

  security: {
    allowedHosts: ['*']
  }
};

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  // Non-numeric input becomes NaN and is rejected by the schema
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/** Drop keys whose value is undefined so they do not shadow lower layers */
function compact(section: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(section).filter(([, value]) => value !== undefined)
  );
}

/**
 * Map RAGCRAWL_* environment variables onto a partial, unvalidated config.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    ...compact({
      dataDir: env.RAGCRAWL_DATA_DIR,
      logLevel: env.RAGCRAWL_LOG_LEVEL?.toLowerCase(),
      logTarget: env.RAGCRAWL_LOG_TARGET?.toLowerCase()
    }),
    crawler: compact({
      userAgent: env.RAGCRAWL_USER_AGENT,
      maxPages: parseNumber(env.RAGCRAWL_MAX_PAGES),
      concurrency: parseNumber(env.RAGCRAWL_CONCURRENCY),
      crawlDelay: parseNumber(env.RAGCRAWL_CRAWL_DELAY),
      robotsOverride: parseBoolean(env.RAGCRAWL_ROBOTS_OVERRIDE),
      requestTimeout: parseNumber(env.RAGCRAWL_REQUEST_TIMEOUT),
      failureThreshold: parseNumber(env.RAGCRAWL_FAILURE_THRESHOLD),
      chunkSize: parseNumber(env.RAGCRAWL_CHUNK_SIZE),
      chunkOverlap: parseNumber(env.RAGCRAWL_CHUNK_OVERLAP),
      conflictPolicy: env.RAGCRAWL_CONFLICT_POLICY
    }),
    vectorDatabase: compact({
      type: env.RAGCRAWL_VECTOR_DB_TYPE,
      url: env.RAGCRAWL_VECTOR_DB_URL,
      collection: env.RAGCRAWL_COLLECTION,
      vectorSize: parseNumber(env.RAGCRAWL_VECTOR_SIZE),
      distanceMetric: env.RAGCRAWL_DISTANCE_METRIC?.toLowerCase(),
      topK: parseNumber(env.RAGCRAWL_TOP_K),
      scoreThreshold: parseNumber(env.RAGCRAWL_SCORE_THRESHOLD)
    }),
    embedding: compact({
      provider: env.RAGCRAWL_EMBEDDING_PROVIDER?.toLowerCase(),
      model: env.RAGCRAWL_EMBEDDING_MODEL,
      baseUrl: env.RAGCRAWL_EMBEDDING_URL,
      timeout: parseNumber(env.RAGCRAWL_EMBEDDING_TIMEOUT),
      localModel: env.RAGCRAWL_EMBEDDING_LOCAL_MODEL
    }),
    llm: compact({
      disable: parseBoolean(env.RAGCRAWL_LLM_DISABLE),
      model: env.RAGCRAWL_LLM_MODEL,
      baseUrl: env.RAGCRAWL_LLM_URL,
      timeout: parseNumber(env.RAGCRAWL_LLM_TIMEOUT)
    }),
    security: compact({
      allowedHosts: parseList(env.RAGCRAWL_ALLOWED_HOSTS)
    })
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge config layers; object sections merge key by key, everything else is replaced.
 */
function mergeLayers(layers: unknown[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (!isRecord(layer)) {
      continue;
    }
    for (const [key, value] of Object.entries(layer)) {
      const current = merged[key];
      merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
    }
  }
  return merged;
}

/**
 * Build and validate configuration.
 * Precedence: defaults < file configs (in order) < environment.
 * @throws ConfigError listing every schema violation
 */
export function buildConfig(env: NodeJS.ProcessEnv = {}, fileConfigs: unknown[] = []): RagCrawlConfig {
  const merged = mergeLayers([defaultConfig, ...fileConfigs, configFromEnv(env)]);
  const result = configSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(issues.join('; '), { issues });
  }

  return result.data;
}

// Function to load configuration from a file
function loadConfigFromFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  try {
    const configData = fs.readFileSync(filePath, 'utf8');
    return JSON.parse(configData);
  } catch (error) {
    throw new ConfigError(`Failed to load configuration from ${filePath}`, {
      path: filePath,
      reason: error instanceof Error ? error.message : String(error)
    });
  }
}

const globalConfigPath = path.join(HOME_DIR, '.ragcrawl', 'config.json');
const localConfigPath = path.join(process.cwd(), 'ragcrawl.config.json');

let config: RagCrawlConfig | null = null;

/**
 * Get the process configuration, loading it on first use.
 */
export function getConfig(): RagCrawlConfig {
  if (!config) {
    config = reloadConfig();
  }
  return config;
}

// Also export a function to reload configuration
export function reloadConfig(): RagCrawlConfig {
  config = buildConfig(process.env, [
    loadConfigFromFile(globalConfigPath),
    loadConfigFromFile(localConfigPath)
  ]);
  return config;
}
