/**
 * Field Extractor
 *
 * Runs every field's strategy chain of a profile against one document and
 * builds the record. Fields are resolved independently: each chain reads the
 * whole canonical text, and one field's outcome never moves another's anchor.
 */

import type {
  CanonicalText,
  ExtractionOutcome,
  FieldResolution,
  InspectionDocument,
  InspectionRecord,
} from '../types';
import type { ExtractionProfile, FieldDefinition } from './types';
import { evaluateStrategy } from './strategies';
import { isEmptyText, makeSnippet, toCanonicalText } from './text-normalizer';
import { compileRecordValidator, type RecordValidator } from '../schemas';
import { NO_TEXT_CONTENT } from '../errors';
import { config } from '../config';
import { logger } from '../logger';
import {
  documentsProcessedCounter,
  extractionDurationHistogram,
  fieldResolutionCounter,
} from '../metrics';

export interface ResolvedField {
  value: string;
  resolution: FieldResolution;
}

export interface FieldExtractorOptions {
  /** Characters of normalized text kept on each outcome */
  snippetChars?: number;
}

/**
 * Walk one field's chain. The first step whose capture is non-empty and
 * accepted wins; otherwise the declared default, otherwise empty.
 */
export function resolveField(field: FieldDefinition, canonical: CanonicalText): ResolvedField {
  for (const step of field.steps) {
    const captures = evaluateStrategy(step.strategy, canonical);
    const value = captures?.[step.capture]?.trim() ?? '';

    if (value !== '' && (!field.accept || field.accept.test(value))) {
      return { value, resolution: { source: 'strategy', strategy: step.strategy.name } };
    }
  }

  if (field.defaultValue !== undefined) {
    return { value: field.defaultValue, resolution: { source: 'default' } };
  }

  return { value: '', resolution: { source: 'missing' } };
}

export class FieldExtractor {
  readonly profile: ExtractionProfile;

  private readonly validateFields: RecordValidator;
  private readonly snippetChars: number;

  constructor(profile: ExtractionProfile, options: FieldExtractorOptions = {}) {
    this.profile = profile;
    this.validateFields = compileRecordValidator(profile.schema.names);
    this.snippetChars = options.snippetChars ?? config.snippetChars;
  }

  /**
   * Extract the profile's fields from one document.
   * A document without text is a failure outcome, not an exception.
   */
  extract(document: InspectionDocument): ExtractionOutcome {
    const startTime = Date.now();
    const canonical = toCanonicalText(document.text);
    const snippet = makeSnippet(canonical.text, this.snippetChars);

    logger.debug('Starting extraction', {
      profile: this.profile.id,
      identifier: document.identifier,
      line_count: canonical.lines.length,
    });

    if (isEmptyText(canonical)) {
      logger.warn('Document has no text content', {
        profile: this.profile.id,
        identifier: document.identifier,
      });
      documentsProcessedCounter.inc({ profile: this.profile.id, status: 'no_content' });

      return {
        status: 'failure',
        identifier: document.identifier,
        reason: NO_TEXT_CONTENT,
        snippet,
      };
    }

    const fields: Record<string, string> = {};
    const resolution: Record<string, FieldResolution> = {};

    for (const field of this.profile.schema.fields) {
      const resolved = resolveField(field, canonical);
      fields[field.name] = resolved.value;
      resolution[field.name] = resolved.resolution;

      fieldResolutionCounter.inc({
        field: field.name,
        source: resolved.resolution.source,
        strategy: resolved.resolution.strategy ?? 'none',
      });
    }

    const validation = this.validateFields(fields);
    if (!validation.valid) {
      throw new Error(
        `Record for ${document.identifier} does not match profile ${this.profile.id}: ` +
          (validation.errors ?? []).join('; ')
      );
    }

    const record: InspectionRecord = Object.freeze({
      identifier: document.identifier,
      profile: this.profile.id,
      fields: Object.freeze(fields),
      resolution: Object.freeze(resolution),
    });

    const durationMs = Date.now() - startTime;
    const resolutions = Object.values(resolution);

    logger.info('Extraction complete', {
      profile: this.profile.id,
      identifier: document.identifier,
      resolved: resolutions.filter(r => r.source === 'strategy').length,
      defaulted: resolutions.filter(r => r.source === 'default').length,
      missing: resolutions.filter(r => r.source === 'missing').length,
      duration_ms: durationMs,
    });

    documentsProcessedCounter.inc({ profile: this.profile.id, status: 'success' });
    extractionDurationHistogram.observe({ profile: this.profile.id }, durationMs / 1000);

    return {
      status: 'success',
      identifier: document.identifier,
      record,
      snippet,
      durationMs,
    };
  }
}
