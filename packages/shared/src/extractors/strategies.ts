/**
 * Field Strategies
 *
 * Evaluation of the strategy kinds declared in ./types. Every evaluator is a
 * pure function of the canonical text and returns the strategy's captures in
 * order, or null when the strategy does not apply to this document.
 *
 * Composite "<name> / <code>" values split at column slashes: a slash with
 * whitespace on either side, or one followed by a numeric code. A slash
 * packed between two letters belongs to the name:
 *   "H/M TRADING / 43.1"  -> ["H/M TRADING", "43.1"]
 * Pairs keep their column position when a code is missing:
 *   "ACME CO / FACTORY NAME / 028288" -> ["ACME CO", "", "FACTORY NAME", "028288"]
 */

import type { CanonicalText } from '../types';
import type {
  AnchorLabel,
  FieldStrategy,
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
import { compileLabel, escapeRegex, findLabelLine, locateAnchor } from './anchor-locator';

const COLUMN_SLASH = /\s*\/\s*(?=\d)|\s+\/\s*|\s*\/\s+/;
const LEADING_CODE = /^(\d+(?:\.\d+)*)(?=\s|$)/;
const TRAILING_NAME_PUNCTUATION = /[\s,;:|/-]+$/;
const PARENTHETICAL = /\([^)]*\)/g;
const DIGITS_TOKEN = /\b\d+\b/g;

// ============================================================================
// Helpers
// ============================================================================

function firstGroup(match: RegExpExecArray): string {
  return (match[1] ?? match[0]).trim();
}

function globalPattern(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, '');
  return new RegExp(pattern.source, `${flags}g`);
}

function allTokens(text: string, token: RegExp): string[] {
  return Array.from(text.matchAll(globalPattern(token)), match => (match[1] ?? match[0]).trim());
}

/** Header lines carry labels only; a digit means the line already holds values. */
function isBareHeader(line: string): boolean {
  return !/\d/.test(line);
}

export function cleanName(name: string): string {
  return name.trim().replace(TRAILING_NAME_PUNCTUATION, '');
}

/**
 * Remove parenthetical annotations such as "(pcs)" before numeric extraction
 */
export function stripParentheticals(text: string): string {
  return text.replace(PARENTHETICAL, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Split "<name> / <code>". A value without a code is malformed: the name is
 * kept and the code is left empty.
 */
export function splitComposite(text: string): [string, string] {
  const [name = '', code = ''] = parseSlashPairs(text, 1);
  return [name, code];
}

/**
 * Read up to `limit` "<name> / <code>" pairs from a row, by column position.
 * Returns [name1, code1, name2, code2, ...]; a pair whose code is missing
 * keeps an empty code so later pairs stay in their columns.
 */
export function parseSlashPairs(text: string, limit: number): string[] {
  const parts = text.trim().split(COLUMN_SLASH);
  const captures: string[] = [];
  let name = cleanName(parts[0]);

  for (const part of parts.slice(1)) {
    const code = LEADING_CODE.exec(part.trim());
    if (code) {
      captures.push(name, code[1]);
      name = cleanName(part.trim().slice(code[0].length));
    } else {
      captures.push(name, '');
      name = cleanName(part);
    }
  }
  if (name !== '') {
    captures.push(name, '');
  }

  return captures.slice(0, limit * 2);
}

function labelStartsLine(label: AnchorLabel, line: string): boolean {
  return compileLabel(label).exec(line)?.index === 0;
}

/**
 * Cut a value at the first neighbouring column label
 */
export function cutAtLabels(text: string, labels: readonly AnchorLabel[]): string {
  let end = text.length;
  for (const label of labels) {
    const match = compileLabel(label).exec(text);
    if (match && match.index < end) {
      end = match.index;
    }
  }
  return text.slice(0, end).trim();
}

// ============================================================================
// Evaluators
// ============================================================================

function evaluateInline(strategy: InlineStrategy, canonical: CanonicalText): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'inline');
  if (!anchor) return null;

  const match = strategy.value.exec(anchor.rest);
  return match ? [firstGroup(match)] : null;
}

function evaluateNextLine(strategy: NextLineStrategy, canonical: CanonicalText): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'next_line');
  if (!anchor || anchor.nextLine === undefined || anchor.rest !== '') return null;

  const match = strategy.value.exec(anchor.nextLine);
  return match ? [firstGroup(match)] : null;
}

function evaluateTabularRow(strategy: TabularRowStrategy, canonical: CanonicalText): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'next_line');
  if (!anchor || anchor.nextLine === undefined || !isBareHeader(anchor.line)) return null;

  const match = strategy.row.exec(anchor.nextLine);
  if (!match) return null;

  return match.slice(1).map(value => (value ?? '').trim());
}

function evaluateNumericWindow(
  strategy: NumericWindowStrategy,
  canonical: CanonicalText
): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'inline');
  if (!anchor) return null;

  const window = canonical.lines
    .slice(anchor.index + 1, anchor.index + 1 + strategy.windowLines)
    .join(' ');
  const tokens = allTokens(window, strategy.token);

  return tokens.length >= strategy.minTokens ? tokens : null;
}

function evaluateSlashComposite(
  strategy: SlashCompositeStrategy,
  canonical: CanonicalText
): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'inline');
  if (!anchor) return null;

  let value = cutAtLabels(anchor.rest, strategy.stopAt);

  // The next line is read only under a label that stands alone on its line
  if (value === '' && anchor.rest === '' && labelStartsLine(strategy.anchor, anchor.line)) {
    const nextLine = canonical.lines[anchor.index + 1] ?? '';
    if (nextLine.includes('/')) {
      value = cutAtLabels(nextLine, strategy.stopAt);
    }
  }
  if (value === '') return null;

  return splitComposite(value);
}

function evaluateSlashRow(strategy: SlashRowStrategy, canonical: CanonicalText): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'next_line');
  if (!anchor || anchor.nextLine === undefined || !isBareHeader(anchor.line)) return null;
  if (!anchor.nextLine.includes('/')) return null;

  const captures = parseSlashPairs(anchor.nextLine, strategy.pairs);
  return captures.length > 0 ? captures : null;
}

function evaluateLiteralComposite(
  strategy: LiteralCompositeStrategy,
  canonical: CanonicalText
): string[] | null {
  const literal = strategy.literal
    .trim()
    .split(/\s+/)
    .map(escapeRegex)
    .join('\\s+');
  const pattern = new RegExp(`${literal}\\s*/\\s*(\\d+(?:\\.\\d+)*)`, 'i');

  const match = pattern.exec(canonical.lines.join('\n'));
  return match ? [strategy.literal.trim(), match[1]] : null;
}

function evaluateTrailingTotal(
  strategy: TrailingTotalStrategy,
  canonical: CanonicalText
): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'inline');
  if (!anchor) return null;

  const sectionEnd = findLabelLine(canonical, strategy.sectionEnd, anchor.index + 1);
  const section = canonical.lines.slice(
    anchor.index + 1,
    sectionEnd === -1 ? canonical.lines.length : sectionEnd
  );
  const lastLine = section.length > 0 ? section[section.length - 1] : anchor.rest;

  const total = new RegExp(`\\b(${strategy.token.source})\\s*$`).exec(stripParentheticals(lastLine));
  return total ? [total[1]] : null;
}

function evaluateSubHeader(strategy: SubHeaderStrategy, canonical: CanonicalText): string[] | null {
  const anchor = locateAnchor(canonical, strategy.anchor, 'inline');
  if (!anchor) return null;

  const subHeaderIndex = findLabelLine(
    canonical,
    [strategy.subHeader],
    anchor.index,
    anchor.index + 1 + strategy.windowLines
  );
  if (subHeaderIndex === -1) return null;

  const row = canonical.lines[subHeaderIndex + 1];
  if (row === undefined) return null;

  const token = allTokens(stripParentheticals(row), DIGITS_TOKEN)[strategy.tokenIndex];
  if (token === undefined) return null;

  return new RegExp(`^(?:${strategy.token.source})$`).test(token) ? [token] : null;
}

/**
 * Evaluate one strategy against a document's canonical text
 */
export function evaluateStrategy(strategy: FieldStrategy, canonical: CanonicalText): string[] | null {
  switch (strategy.kind) {
    case 'inline':
      return evaluateInline(strategy, canonical);
    case 'next_line':
      return evaluateNextLine(strategy, canonical);
    case 'tabular_row':
      return evaluateTabularRow(strategy, canonical);
    case 'numeric_window':
      return evaluateNumericWindow(strategy, canonical);
    case 'slash_composite':
      return evaluateSlashComposite(strategy, canonical);
    case 'slash_row':
      return evaluateSlashRow(strategy, canonical);
    case 'literal_composite':
      return evaluateLiteralComposite(strategy, canonical);
    case 'trailing_total':
      return evaluateTrailingTotal(strategy, canonical);
    case 'sub_header':
      return evaluateSubHeader(strategy, canonical);
  }
}
