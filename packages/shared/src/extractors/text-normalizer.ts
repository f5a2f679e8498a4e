/**
 * Text Normalizer
 *
 * Cleans raw page text into the canonical form every strategy reads.
 */

import type { CanonicalText } from '../types';

const TABS_AND_CARRIAGE_RETURNS = /[\t\r]+/g;
const SOFT_HYPHEN = /\u00ad/g;
const PAGE_BREAKS = /[\f\v]/g;
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000e-\u001f\u007f]/g;

/**
 * Collapse tabs/carriage returns to one space, drop soft hyphens and control
 * characters. Newline structure is kept; form feeds become newlines.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(TABS_AND_CARRIAGE_RETURNS, ' ')
    .replace(SOFT_HYPHEN, '')
    .replace(PAGE_BREAKS, '\n')
    .replace(CONTROL_CHARACTERS, '');
}

export function toCanonicalText(raw: string): CanonicalText {
  const text = normalizeText(raw);
  const lines = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);

  return { text, lines };
}

export function isEmptyText(canonical: CanonicalText): boolean {
  return canonical.lines.length === 0;
}

/**
 * Leading part of the text kept on an outcome for diagnostics
 */
export function makeSnippet(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n...\n`;
}
