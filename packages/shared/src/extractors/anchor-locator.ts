/**
 * Anchor Locator
 *
 * Finds the first line carrying a field label. Labels are matched case
 * insensitively and any whitespace in the label matches any (or no)
 * whitespace in the text, so "PO / Split No." also finds "PO/Split No.".
 */

import type { CanonicalText } from '../types';
import type { AnchorLabel, AnchorMatch, AnchorMode } from './types';

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;
const LEADING_SEPARATORS = /^[\s:#-]+/;

export function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * Compile a label phrase into a tolerant pattern. RegExp labels keep their
 * source; stateful flags are dropped and matching is made case insensitive.
 */
export function compileLabel(label: AnchorLabel): RegExp {
  if (label instanceof RegExp) {
    const flags = label.flags.replace(/[gyi]/g, '');
    return new RegExp(label.source, `${flags}i`);
  }

  const source = label
    .trim()
    .split(/\s*\/\s*/)
    .map(part => part.split(/\s+/).map(escapeRegex).join('\\s*'))
    .join('\\s*/\\s*');

  return new RegExp(source, 'i');
}

/**
 * Locate the first line matching the label.
 *
 * In next_line mode a label on the last line counts as not found, since there
 * is no row beneath it to read.
 */
export function locateAnchor(
  canonical: CanonicalText,
  label: AnchorLabel,
  mode: AnchorMode = 'inline'
): AnchorMatch | null {
  const pattern = compileLabel(label);
  const { lines } = canonical;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const match = pattern.exec(line);
    if (!match) continue;

    const rest = line.slice(match.index + match[0].length).replace(LEADING_SEPARATORS, '');

    if (mode === 'inline') {
      return { index, line, rest };
    }

    // Only the first hit counts, even when it has no following line
    if (index + 1 >= lines.length) return null;
    return { index, line, rest, nextLine: lines[index + 1] };
  }

  return null;
}

/**
 * Index of the first line at or after `from` matching any of the labels
 */
export function findLabelLine(
  canonical: CanonicalText,
  labels: readonly AnchorLabel[],
  from: number,
  to: number = canonical.lines.length
): number {
  if (labels.length === 0) return -1;
  const patterns = labels.map(compileLabel);
  const end = Math.min(to, canonical.lines.length);

  for (let index = Math.max(0, from); index < end; index++) {
    if (patterns.some(pattern => pattern.test(canonical.lines[index]))) {
      return index;
    }
  }
  return -1;
}
