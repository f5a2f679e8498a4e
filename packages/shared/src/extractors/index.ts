/**
 * Field Extraction Module
 *
 * TextNormalizer -> AnchorLocator -> strategy chains -> FieldExtractor,
 * with the BatchAggregator running many documents through a bounded pool.
 *
 * Profiles:
 * - 'aql_standard': the 13 inspection record columns
 * - 'aql_extended': the same plus Quality Digit (defaulted when absent)
 */

// Core types
export type {
  AnchorLabel,
  AnchorMode,
  AnchorMatch,
  FieldStrategy,
  StrategyKind,
  StrategyStep,
  FieldDefinition,
  FieldSchema,
  ExtractionProfile,
  InlineStrategy,
  NextLineStrategy,
  TabularRowStrategy,
  NumericWindowStrategy,
  SlashCompositeStrategy,
  SlashRowStrategy,
  LiteralCompositeStrategy,
  TrailingTotalStrategy,
  SubHeaderStrategy,
} from './types';

// Text & anchors
export { normalizeText, toCanonicalText, isEmptyText, makeSnippet } from './text-normalizer';
export { compileLabel, locateAnchor, findLabelLine, escapeRegex } from './anchor-locator';

// Strategies
export {
  evaluateStrategy,
  splitComposite,
  parseSlashPairs,
  stripParentheticals,
  cutAtLabels,
  cleanName,
} from './strategies';

// Schema, extractor, batch
export { defineFieldSchema } from './field-schema';
export { FieldExtractor, resolveField, type ResolvedField, type FieldExtractorOptions } from './field-extractor';
export {
  extractAll,
  summarizeOutcomes,
  type BatchOptions,
  type DocumentExtractor,
} from './batch-aggregator';

// Registry
export {
  registerProfile,
  getProfile,
  getProfileOrThrow,
  getExtractorOrThrow,
  hasProfile,
  getRegisteredProfiles,
  clearRegistry,
} from './registry';

// AQL report profile
export {
  createAqlReportProfile,
  buildAqlReportFields,
  aqlStandardProfile,
  aqlExtendedProfile,
  AQL_STANDARD_PROFILE_ID,
  AQL_EXTENDED_PROFILE_ID,
  DEFAULT_INSPECTION_SEQ,
  type AqlReportProfileOptions,
} from './aql-report';
export * as aqlReportPatterns from './aql-report/patterns';

// Import for registration
import { registerProfile } from './registry';
import { aqlStandardProfile, aqlExtendedProfile } from './aql-report';

/**
 * Register all built-in profiles.
 * Call this at application startup.
 */
export function registerAllProfiles(): void {
  registerProfile(aqlStandardProfile);
  registerProfile(aqlExtendedProfile);
}

// Auto-register all profiles on module load
registerAllProfiles();
