/**
 * Extract API
 *
 * HTTP front of the inspection report parser. Routes live in ./app.
 */

import {
  logger,
  config,
  createQueue,
  enableDefaultMetrics,
  QUEUE_NAMES,
  type ExtractBatchJob,
  type ExtractBatchResult,
} from '@aqlparse/shared';
import { createApp } from './app';

enableDefaultMetrics();

// Create the extract_batch queue
const batchQueue = createQueue<ExtractBatchJob, ExtractBatchResult>(QUEUE_NAMES.EXTRACT_BATCH);

const app = createApp({ batchQueue });

// Start server
const server = app.listen(config.apiPort, () => {
  logger.info('Extract API started', {
    port: config.apiPort,
    default_profile: config.defaultProfile,
  });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await batchQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
