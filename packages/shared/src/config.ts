/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Batch extraction
  batchConcurrency: number;
  maxBatchDocuments: number;
  snippetChars: number;

  // Extraction profile
  defaultProfile: string;
  qualityDigitDefault: string;
  knownFactories: string[];

  // Output
  outputDir: string;

  // HTTP
  apiPort: number;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split('|')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '500', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '1000', 10),

  // Batch extraction
  batchConcurrency: parseInt(process.env.BATCH_CONCURRENCY || '4', 10),
  maxBatchDocuments: parseInt(process.env.MAX_BATCH_DOCUMENTS || '200', 10),
  snippetChars: parseInt(process.env.SNIPPET_CHARS || '3000', 10),

  // Extraction profile
  defaultProfile: process.env.EXTRACTION_PROFILE || 'aql_standard',
  qualityDigitDefault: process.env.QUALITY_DIGIT_DEFAULT || '2',
  knownFactories: parseList(process.env.KNOWN_FACTORIES, [
    'Huangshan Yinghui Textile Technology Co., Ltd.',
  ]),

  // Output
  outputDir: process.env.OUTPUT_DIR || '/object-store/exports',

  // HTTP
  apiPort: parseInt(process.env.PORT || '8080', 10),
};
