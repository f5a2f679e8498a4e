/**
 * Batch Aggregator
 *
 * Runs the FieldExtractor over many documents through a bounded pool.
 * Results are written into a pre-sized array at each document's input index,
 * so the outcome order always matches the input order regardless of which
 * unit finishes first. A failing document never stops the batch.
 */

import type {
  BatchResult,
  ExtractionOutcome,
  FailureSummary,
  InspectionDocument,
  InspectionRecord,
} from '../types';
import type { ExtractionProfile } from './types';
import { FieldExtractor } from './field-extractor';
import { makeSnippet, normalizeText } from './text-normalizer';
import { getExtractorOrThrow } from './registry';
import { runForDocument } from '../context';
import { describeError } from '../errors';
import { config } from '../config';
import { logger } from '../logger';
import { batchSizeHistogram, documentsProcessedCounter } from '../metrics';

/** Turns one document into an outcome; FieldExtractor is the built-in one */
export interface DocumentExtractor {
  readonly profile: ExtractionProfile;
  extract(document: InspectionDocument): ExtractionOutcome | Promise<ExtractionOutcome>;
}

export interface BatchOptions {
  /** Registered profile id or a profile value; defaults to the configured profile */
  profile?: string | ExtractionProfile;
  /** Extractor to run instead of the profile's FieldExtractor */
  extractor?: DocumentExtractor;
  /** Maximum documents extracted at once */
  concurrency?: number;
}

function resolveExtractor(options: BatchOptions): DocumentExtractor {
  const { profile } = options;
  if (options.extractor) return options.extractor;
  if (profile === undefined) return getExtractorOrThrow(config.defaultProfile);
  if (typeof profile === 'string') return getExtractorOrThrow(profile);
  return new FieldExtractor(profile);
}

async function extractOne(
  extractor: DocumentExtractor,
  document: InspectionDocument
): Promise<ExtractionOutcome> {
  return runForDocument(document.identifier, async (): Promise<ExtractionOutcome> => {
    try {
      return await extractor.extract(document);
    } catch (error) {
      logger.error('Extraction failed', error, {
        profile: extractor.profile.id,
        identifier: document.identifier,
      });
      documentsProcessedCounter.inc({ profile: extractor.profile.id, status: 'error' });

      return {
        status: 'failure',
        identifier: document.identifier,
        reason: `extraction error: ${describeError(error)}`,
        snippet: makeSnippet(normalizeText(document.text), config.snippetChars),
      };
    }
  });
}

/**
 * Extract all documents. `outcomes[i]` always belongs to `documents[i]`.
 */
export async function extractAll(
  documents: readonly InspectionDocument[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const startTime = Date.now();
  const extractor = resolveExtractor(options);
  const concurrency = Math.max(1, Math.min(options.concurrency ?? config.batchConcurrency, documents.length));

  logger.info('Starting batch extraction', {
    profile: extractor.profile.id,
    document_count: documents.length,
    concurrency,
  });
  batchSizeHistogram.observe(documents.length);

  const outcomes: ExtractionOutcome[] = new Array(documents.length);
  let next = 0;

  const runPoolWorker = async (): Promise<void> => {
    while (next < documents.length) {
      const index = next++;
      outcomes[index] = await extractOne(extractor, documents[index]);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, runPoolWorker));

  const result = summarizeOutcomes(extractor.profile, outcomes, Date.now() - startTime);

  logger.info('Batch extraction complete', {
    profile: extractor.profile.id,
    document_count: documents.length,
    record_count: result.records.length,
    failure_count: result.failures.length,
    duration_ms: result.durationMs,
  });

  return result;
}

/**
 * Partition ordered outcomes into records and failures, keeping input order
 */
export function summarizeOutcomes(
  profile: ExtractionProfile,
  outcomes: ExtractionOutcome[],
  durationMs: number
): BatchResult {
  const records: InspectionRecord[] = [];
  const failures: FailureSummary[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      records.push(outcome.record);
    } else {
      failures.push({ identifier: outcome.identifier, reason: outcome.reason });
    }
  }

  return {
    profile: profile.id,
    columns: profile.schema.names,
    outcomes,
    records,
    failures,
    durationMs,
  };
}
