/**
 * Shared TypeScript Types
 *
 * Types for the inspection report extraction pipeline. HTTP and queue
 * payloads match the JSON schemas in docs/contracts/.
 */

// ============================================================================
// Field Schema
// ============================================================================

/** Canonical column order of the standard inspection record. */
export const STANDARD_FIELDS = [
  'Inspection No.',
  'Inspection Seq.',
  'Inspection Date',
  'PO / Split No.',
  'PO Date',
  'Style No.',
  'Item No.',
  'Delivered Quantity',
  'Customer',
  'Dept',
  'Factory',
  'FID Code',
  'Vendor',
] as const;

/** Optional quality indicator, appended after Vendor in the extended profile. */
export const QUALITY_DIGIT_FIELD = 'Quality Digit';

export type StandardField = (typeof STANDARD_FIELDS)[number];
export type FieldName = StandardField | typeof QUALITY_DIGIT_FIELD;

// ============================================================================
// Documents
// ============================================================================

/** One uploaded report, after an external collaborator recovered its text. */
export interface InspectionDocument {
  readonly identifier: string;
  readonly text: string;
}

/**
 * Normalized document text. `lines` holds the trimmed non-empty lines in
 * source order; `text` keeps the normalized blob for windowed lookahead.
 */
export interface CanonicalText {
  readonly text: string;
  readonly lines: readonly string[];
}

// ============================================================================
// Records & Outcomes
// ============================================================================

/** Field name -> value, holding exactly the profile's columns in order. */
export type RecordFields = Readonly<Record<string, string>>;

export type ResolutionSource = 'strategy' | 'default' | 'missing';

export interface FieldResolution {
  source: ResolutionSource;
  /** Name of the strategy that produced the value */
  strategy?: string;
}

export interface InspectionRecord {
  readonly identifier: string;
  readonly profile: string;
  readonly fields: RecordFields;
  readonly resolution: Readonly<Record<string, FieldResolution>>;
}

export interface ExtractionSuccess {
  status: 'success';
  identifier: string;
  record: InspectionRecord;
  /** Leading part of the normalized text, for diagnostics */
  snippet: string;
  durationMs: number;
}

export interface ExtractionFailure {
  status: 'failure';
  identifier: string;
  reason: string;
  snippet: string;
}

export type ExtractionOutcome = ExtractionSuccess | ExtractionFailure;

export interface FailureSummary {
  identifier: string;
  reason: string;
}

export interface BatchResult {
  profile: string;
  columns: readonly string[];
  /** One outcome per input document, in input order */
  outcomes: ExtractionOutcome[];
  records: InspectionRecord[];
  failures: FailureSummary[];
  durationMs: number;
}

// ============================================================================
// API Contracts
// ============================================================================

export interface ExtractRequest {
  profile?: string;
  documents: Array<{ identifier: string; text: string }>;
}

export interface BatchFile {
  identifier: string;
  path: string;
}

export interface BatchSubmitRequest {
  profile?: string;
  files: BatchFile[];
}

export interface ExtractResponse {
  correlation_id: string;
  profile: string;
  columns: readonly string[];
  records: Array<{ identifier: string; fields: RecordFields }>;
  failures: FailureSummary[];
  outcomes: Array<{ identifier: string; status: ExtractionOutcome['status'] }>;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
