/**
 * Batch Job
 *
 * Reads every file of an extract_batch job, extracts the readable ones and
 * writes the merged workbook plus a result.json summary under
 * <outputDir>/<batch_id>/.
 */

import fs from 'fs';
import path from 'path';
import {
  logger,
  describeError,
  extractAll,
  getExtractorOrThrow,
  summarizeOutcomes,
  writeWorkbookFile,
  WORKBOOK_FILENAME,
  type ExtractBatchJob,
  type ExtractBatchResult,
  type ExtractionOutcome,
  type InspectionDocument,
} from '@aqlparse/shared';

export const RESULT_FILENAME = 'result.json';

/** Returns the text of one PDF */
export type TextReader = (filePath: string) => Promise<string>;

export interface BatchJobOptions {
  readText: TextReader;
  outputDir: string;
  concurrency?: number;
}

export async function runBatchJob(
  job: ExtractBatchJob,
  options: BatchJobOptions
): Promise<ExtractBatchResult> {
  const startTime = Date.now();
  const { profile } = getExtractorOrThrow(job.profile);

  // Files are read one at a time; an unreadable file keeps its slot as a failure
  const unreadable = new Map<number, ExtractionOutcome>();
  const documents: InspectionDocument[] = [];
  const positions: number[] = [];

  for (const [index, file] of job.files.entries()) {
    try {
      const text = await options.readText(file.path);
      documents.push({ identifier: file.identifier, text });
      positions.push(index);
    } catch (error) {
      logger.warn('Could not read PDF', {
        identifier: file.identifier,
        path: file.path,
        error: describeError(error),
      });
      unreadable.set(index, {
        status: 'failure',
        identifier: file.identifier,
        reason: `unreadable pdf: ${describeError(error)}`,
        snippet: '',
      });
    }
  }

  const extracted = await extractAll(documents, {
    profile,
    concurrency: options.concurrency,
  });

  const outcomes: ExtractionOutcome[] = new Array(job.files.length);
  for (const [index, outcome] of unreadable) {
    outcomes[index] = outcome;
  }
  extracted.outcomes.forEach((outcome, i) => {
    outcomes[positions[i]] = outcome;
  });

  const result = summarizeOutcomes(profile, outcomes, Date.now() - startTime);

  const batchDir = path.join(options.outputDir, job.batch_id);
  await fs.promises.mkdir(batchDir, { recursive: true });

  const workbookPath = path.join(batchDir, WORKBOOK_FILENAME);
  await writeWorkbookFile(result, workbookPath);

  const summary: ExtractBatchResult = {
    batch_id: job.batch_id,
    workbook_path: workbookPath,
    record_count: result.records.length,
    failure_count: result.failures.length,
    failures: result.failures,
  };
  await fs.promises.writeFile(
    path.join(batchDir, RESULT_FILENAME),
    JSON.stringify(summary, null, 2)
  );

  logger.info('Batch written', {
    workbook_path: workbookPath,
    record_count: summary.record_count,
    failure_count: summary.failure_count,
    duration_ms: result.durationMs,
  });

  return summary;
}
