/**
 * Field Extraction Types
 *
 * Strategies are plain tagged values so a field's chain is an inspectable
 * data structure: the FieldExtractor walks the chain in order and the first
 * step yielding a non-empty, accepted value wins.
 */

import type { FieldName } from '../types';

/** A label phrase (whitespace and case tolerant) or an explicit pattern */
export type AnchorLabel = string | RegExp;

/**
 * - 'inline': the value may follow the label on the same line
 * - 'next_line': the value lives on the line after the label
 */
export type AnchorMode = 'inline' | 'next_line';

export interface AnchorMatch {
  /** Index of the anchor line in CanonicalText.lines */
  index: number;
  line: string;
  /** Text after the label on the anchor line, leading separators removed */
  rest: string;
  /** Following line (next_line mode only) */
  nextLine?: string;
}

interface StrategyBase {
  /** Stable name, reported in field resolution metadata and metrics */
  name: string;
}

/** Value pattern matched at the start of the text after the label. Group 1 is the value. */
export interface InlineStrategy extends StrategyBase {
  kind: 'inline';
  anchor: AnchorLabel;
  value: RegExp;
}

/** Label alone on its line; value pattern matched at the start of the next line. */
export interface NextLineStrategy extends StrategyBase {
  kind: 'next_line';
  anchor: AnchorLabel;
  value: RegExp;
}

/** Multi-column header line; the row pattern's groups are read from the line beneath it. */
export interface TabularRowStrategy extends StrategyBase {
  kind: 'tabular_row';
  anchor: AnchorLabel;
  row: RegExp;
}

/** All tokens in a window of lines after the anchor, in order of appearance. */
export interface NumericWindowStrategy extends StrategyBase {
  kind: 'numeric_window';
  anchor: AnchorLabel;
  windowLines: number;
  token: RegExp;
  minTokens: number;
}

/** "<name> / <code>" after the label, or on the next line when the label ends its line. */
export interface SlashCompositeStrategy extends StrategyBase {
  kind: 'slash_composite';
  anchor: AnchorLabel;
  /** Labels of neighbouring columns that end the value text */
  stopAt: AnchorLabel[];
}

/** Combined header; the next line holds consecutive "<name> / <code>" pairs. */
export interface SlashRowStrategy extends StrategyBase {
  kind: 'slash_row';
  anchor: AnchorLabel;
  pairs: number;
}

/** A known name followed by "/ <code>" anywhere in the text. */
export interface LiteralCompositeStrategy extends StrategyBase {
  kind: 'literal_composite';
  literal: string;
}

/** The number closing a table section that starts at the anchor. */
export interface TrailingTotalStrategy extends StrategyBase {
  kind: 'trailing_total';
  anchor: AnchorLabel;
  token: RegExp;
  sectionEnd: AnchorLabel[];
}

/** A numeric column of the row beneath a sub-header found near the anchor. */
export interface SubHeaderStrategy extends StrategyBase {
  kind: 'sub_header';
  anchor: AnchorLabel;
  subHeader: AnchorLabel;
  windowLines: number;
  token: RegExp;
  tokenIndex: number;
}

export type FieldStrategy =
  | InlineStrategy
  | NextLineStrategy
  | TabularRowStrategy
  | NumericWindowStrategy
  | SlashCompositeStrategy
  | SlashRowStrategy
  | LiteralCompositeStrategy
  | TrailingTotalStrategy
  | SubHeaderStrategy;

export type StrategyKind = FieldStrategy['kind'];

/** One entry of a field's chain: a strategy and which of its captures the field takes */
export interface StrategyStep {
  strategy: FieldStrategy;
  capture: number;
}

export interface FieldDefinition {
  name: FieldName;
  steps: readonly StrategyStep[];
  /** Well-formedness check applied to every candidate value */
  accept?: RegExp;
  /** Substituted when no step yields a value */
  defaultValue?: string;
}

export interface FieldSchema {
  readonly fields: readonly FieldDefinition[];
  readonly names: readonly FieldName[];
}

export interface ExtractionProfile {
  readonly id: string;
  readonly description: string;
  readonly schema: FieldSchema;
}
