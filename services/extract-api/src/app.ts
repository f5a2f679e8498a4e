/**
 * Extract API - Express Application
 *
 * GET  /health        - Service status
 * GET  /metrics       - Prometheus metrics
 * GET  /profiles      - Registered extraction profiles and their columns
 * POST /extract       - Extract posted report texts, JSON response
 * POST /extract/xlsx  - Extract posted report texts, merged workbook response
 * POST /batches       - Enqueue PDFs on the shared volume for the worker
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  checkBackpressure,
  validateExtractRequest,
  validateBatchRequest,
  extractAll,
  hasProfile,
  getRegisteredProfiles,
  writeWorkbookBuffer,
  WORKBOOK_FILENAME,
  WORKBOOK_MIME_TYPE,
  QUEUE_NAMES,
  type BatchResult,
  type BatchSubmitRequest,
  type ErrorEnvelope,
  type ExtractBatchJob,
  type ExtractRequest,
  type ExtractResponse,
  type QueueCounts,
} from '@aqlparse/shared';

/** The part of the batch queue the API uses */
export interface BatchQueue extends QueueCounts {
  add(name: string, data: ExtractBatchJob, opts?: { jobId?: string }): Promise<unknown>;
}

export interface AppDependencies {
  batchQueue?: BatchQueue;
  maxBatchDocuments?: number;
}

class RequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(error);
}

function toExtractResponse(result: BatchResult, correlationId: string): ExtractResponse {
  return {
    correlation_id: correlationId,
    profile: result.profile,
    columns: result.columns,
    records: result.records.map(record => ({
      identifier: record.identifier,
      fields: record.fields,
    })),
    failures: result.failures,
    outcomes: result.outcomes.map(outcome => ({
      identifier: outcome.identifier,
      status: outcome.status,
    })),
  };
}

export function createApp(deps: AppDependencies = {}): Express {
  const app = express();
  const maxBatchDocuments = deps.maxBatchDocuments ?? config.maxBatchDocuments;

  // Middleware
  app.use(express.json({ limit: '20mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = req.headers['x-correlation-id'];
    const correlationId = typeof incoming === 'string' && incoming !== '' ? incoming : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  /**
   * Validate an extract body and resolve its profile.
   * The body arrives untyped; the schema check runs before any field is read.
   */
  function parseExtractRequest(request: ExtractRequest): ExtractRequest & { profile: string } {
    const validation = validateExtractRequest(request);
    if (!validation.valid) {
      throw new RequestError(400, 'invalid_request', (validation.errors ?? []).join('; '));
    }

    const profile = request.profile ?? config.defaultProfile;
    if (!hasProfile(profile)) {
      throw new RequestError(404, 'profile_not_found', `Unknown extraction profile: ${profile}`);
    }
    if (request.documents.length > maxBatchDocuments) {
      throw new RequestError(
        413,
        'batch_too_large',
        `At most ${maxBatchDocuments} documents per request (got ${request.documents.length})`
      );
    }

    return { ...request, profile };
  }

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      const backpressure = deps.batchQueue ? await checkBackpressure(deps.batchQueue) : null;

      res.json({
        status: 'healthy',
        service: 'extract-api',
        profiles: getRegisteredProfiles().map(profile => profile.id),
        queue_depth: backpressure?.depth ?? null,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'extract-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    if (deps.batchQueue) {
      await reportQueueMetrics([{ name: QUEUE_NAMES.EXTRACT_BATCH, queue: deps.batchQueue }]);
    }
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  app.get('/profiles', (req: Request, res: Response) => {
    res.json({
      default_profile: config.defaultProfile,
      profiles: getRegisteredProfiles().map(profile => ({
        id: profile.id,
        description: profile.description,
        columns: profile.schema.names,
      })),
    });
  });

  /**
   * POST /extract
   * Extracts every posted document; failures are reported alongside records
   */
  app.post('/extract', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseExtractRequest(req.body);
      const result = await extractAll(request.documents, { profile: request.profile });

      res.json(toExtractResponse(result, correlationIdOf(res)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /extract/xlsx
   * Same as /extract, answered with the merged workbook
   */
  app.post('/extract/xlsx', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseExtractRequest(req.body);
      const result = await extractAll(request.documents, { profile: request.profile });
      const workbook = await writeWorkbookBuffer(result);

      res.setHeader('Content-Type', WORKBOOK_MIME_TYPE);
      res.setHeader('Content-Disposition', `attachment; filename="${WORKBOOK_FILENAME}"`);
      res.setHeader('X-Failed-Documents', result.failures.length.toString());
      res.send(Buffer.from(workbook));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /batches
   * Enqueues an extract_batch job for the worker
   */
  app.post('/batches', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = validateBatchRequest(req.body);
      if (!validation.valid) {
        throw new RequestError(400, 'invalid_request', (validation.errors ?? []).join('; '));
      }

      const body: BatchSubmitRequest = req.body;
      const profile = body.profile ?? config.defaultProfile;
      if (!hasProfile(profile)) {
        throw new RequestError(404, 'profile_not_found', `Unknown extraction profile: ${profile}`);
      }
      if (body.files.length > maxBatchDocuments) {
        throw new RequestError(
          413,
          'batch_too_large',
          `At most ${maxBatchDocuments} files per batch (got ${body.files.length})`
        );
      }

      const queue = deps.batchQueue;
      if (!queue) {
        throw new RequestError(503, 'queue_unavailable', 'Batch queue is not configured');
      }

      // Check backpressure
      const backpressure = await checkBackpressure(queue);

      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Request rejected due to backpressure', {
          queue_depth: backpressure.depth,
        });
        throw new RequestError(
          503,
          'service_unavailable',
          'System is under heavy load. Please retry later.'
        );
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth approaching threshold', {
          queue_depth: backpressure.depth,
        });
      }

      const batchId = ulid();
      const correlationId = correlationIdOf(res);
      const job: ExtractBatchJob = {
        event_type: 'batch.submitted',
        batch_id: batchId,
        correlation_id: correlationId,
        profile,
        files: body.files,
        submitted_at: new Date().toISOString(),
      };

      await queue.add(QUEUE_NAMES.EXTRACT_BATCH, job, { jobId: `batch_${batchId}` });

      logger.info('Batch enqueued', {
        batch_id: batchId,
        profile,
        file_count: body.files.length,
      });

      res.status(202).json({
        batch_id: batchId,
        correlation_id: correlationId,
      });
    } catch (error) {
      next(error);
    }
  });

  // Error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof RequestError) {
      sendError(res, error.status, error.code, error.message);
      return;
    }

    // Raised by express.json before any route runs
    if (typeof error === 'object' && error !== null && 'type' in error) {
      if (error.type === 'entity.too.large') {
        sendError(res, 413, 'payload_too_large', 'Request body exceeds the size limit');
        return;
      }
    }

    if (error instanceof SyntaxError) {
      sendError(res, 400, 'invalid_json', 'Request body is not valid JSON');
      return;
    }

    logger.error('Request failed', error, { path: req.path });
    sendError(
      res,
      500,
      'internal_error',
      error instanceof Error ? error.message : 'Unknown error'
    );
  });

  return app;
}
