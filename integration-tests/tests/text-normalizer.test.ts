/**
 * Text Normalizer Tests
 */

import { normalizeText, toCanonicalText, isEmptyText, makeSnippet } from '@aqlparse/shared';

describe('normalizeText', () => {
  it('should turn tabs and carriage returns into spaces', () => {
    expect(normalizeText('A\tB\r\nC')).toBe('A B \nC');
  });

  it('should collapse a run of tabs into one space', () => {
    expect(normalizeText('Vendor\t\t\tACME')).toBe('Vendor ACME');
  });

  it('should drop soft hyphens', () => {
    expect(normalizeText('Inspec\u00adtion No.')).toBe('Inspection No.');
  });

  it('should turn form feeds into newlines', () => {
    expect(normalizeText('page one\fpage two')).toBe('page one\npage two');
  });

  it('should remove control characters', () => {
    expect(normalizeText('A\u0007B\u0000C')).toBe('ABC');
  });
});

describe('toCanonicalText', () => {
  it('should trim lines and drop empty ones', () => {
    const canonical = toCanonicalText('  Inspection No. X  \n\n\n  Seq 1\n');

    expect(canonical.lines).toEqual(['Inspection No. X', 'Seq 1']);
  });

  it('should treat whitespace-only text as empty', () => {
    expect(isEmptyText(toCanonicalText(' \n\t\n\r'))).toBe(true);
    expect(isEmptyText(toCanonicalText('x'))).toBe(false);
  });
});

describe('makeSnippet', () => {
  it('should keep short text whole', () => {
    expect(makeSnippet('abc', 3)).toBe('abc');
  });

  it('should mark truncated text', () => {
    expect(makeSnippet('abcdef', 3)).toBe('abc\n...\n');
  });
});
