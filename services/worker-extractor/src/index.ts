/**
 * Extractor Worker
 *
 * Consumes extract_batch jobs: reads each PDF, extracts the inspection
 * records and writes the merged workbook to the shared volume.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  enableDefaultMetrics,
  serveMetrics,
  QUEUE_NAMES,
  type ExtractBatchJob,
  type ExtractBatchResult,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@aqlparse/shared';
import { extractTextFromPdf } from './lib/pdf';
import { runBatchJob } from './lib/batch';

const METRICS_PORT = parseInt(process.env.METRICS_PORT || '9464', 10);

async function readPdfText(filePath: string): Promise<string> {
  const pdf = await extractTextFromPdf(filePath);
  return pdf.combinedText;
}

/**
 * Process extract_batch job
 */
async function processExtractBatch(
  job: Job<ExtractBatchJob, ExtractBatchResult>
): Promise<ExtractBatchResult> {
  const { correlation_id, batch_id, profile, files } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, batchId: batch_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing extract_batch', {
      jobId: job.id,
      profile,
      file_count: files.length,
      attempt: job.attemptsMade + 1,
    });

    try {
      const result = await runBatchJob(job.data, {
        readText: readPdfText,
        outputDir: config.outputDir,
      });

      // Record metrics
      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_BATCH, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_BATCH, status: 'success' }, duration);

      return result;
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_BATCH, status: 'failed' });
      throw error;
    }
  });
}

enableDefaultMetrics();
const metricsServer = serveMetrics(METRICS_PORT);

// Create and start the worker
const worker = createWorker<ExtractBatchJob, ExtractBatchResult>(
  QUEUE_NAMES.EXTRACT_BATCH,
  processExtractBatch
);

logger.info('Extractor worker started', { output_dir: config.outputDir });

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
