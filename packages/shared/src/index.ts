/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runForDocument,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export { ConfigurationError, NO_TEXT_CONTENT, describeError } from './errors';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractBatchJob,
  type ExtractBatchResult,
  type QueueCounts,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  enableDefaultMetrics,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  extractionDurationHistogram,
  fieldResolutionCounter,
  batchSizeHistogram,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateExtractRequest,
  validateBatchRequest,
  buildRecordSchema,
  compileRecordValidator,
  type ValidationResult,
  type RecordValidator,
} from './schemas';

// Workbook export
export {
  createWorkbook,
  writeWorkbookBuffer,
  writeWorkbookFile,
  WORKBOOK_FILENAME,
  WORKBOOK_MIME_TYPE,
  RECORDS_SHEET,
  FAILURES_SHEET,
} from './workbook';

// Field extraction
export * from './extractors';
