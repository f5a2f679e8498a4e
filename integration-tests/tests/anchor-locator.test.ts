/**
 * Anchor Locator Tests
 */

import { compileLabel, locateAnchor, findLabelLine, toCanonicalText } from '@aqlparse/shared';

describe('compileLabel', () => {
  it('should tolerate spacing around slashes and between words', () => {
    const pattern = compileLabel('PO / Split No.');

    expect(pattern.test('PO/Split No.')).toBe(true);
    expect(pattern.test('po /  split no.')).toBe(true);
    expect(pattern.test('PO/SplitNo.')).toBe(true);
  });

  it('should escape regex characters in the label', () => {
    const pattern = compileLabel('Inspection No.');

    expect(pattern.test('Inspection NoX')).toBe(false);
  });

  it('should drop stateful flags from regex labels', () => {
    const pattern = compileLabel(/Customer.*Factory/g);

    expect(pattern.flags).toBe('i');
    expect(pattern.test('customer / dept factory')).toBe(true);
    expect(pattern.test('customer / dept factory')).toBe(true);
  });
});

describe('locateAnchor', () => {
  it('should return the first matching line only', () => {
    const canonical = toCanonicalText('Inspection No. A1\nInspection No. B2');
    const anchor = locateAnchor(canonical, 'Inspection No.');

    expect(anchor).toEqual({ index: 0, line: 'Inspection No. A1', rest: 'A1' });
  });

  it('should strip separators between label and value', () => {
    const canonical = toCanonicalText('Inspection Date: Aug 1, 25');

    expect(locateAnchor(canonical, 'Inspection Date')?.rest).toBe('Aug 1, 25');
  });

  it('should return the following line in next_line mode', () => {
    const canonical = toCanonicalText('Header\n\nValue');
    const anchor = locateAnchor(canonical, 'Header', 'next_line');

    expect(anchor?.nextLine).toBe('Value');
    expect(anchor?.rest).toBe('');
  });

  it('should not look past a first match on the last line', () => {
    const canonical = toCanonicalText('Value\nHeader');

    expect(locateAnchor(canonical, 'Header', 'next_line')).toBeNull();
  });

  it('should return null when the label is absent', () => {
    expect(locateAnchor(toCanonicalText('nothing here'), 'Vendor')).toBeNull();
  });
});

describe('findLabelLine', () => {
  const canonical = toCanonicalText('Total 1\nx\nTotal 2');

  it('should search from the given line', () => {
    expect(findLabelLine(canonical, ['Total'], 1)).toBe(2);
  });

  it('should stop at the upper bound', () => {
    expect(findLabelLine(canonical, ['Total'], 1, 2)).toBe(-1);
  });

  it('should return -1 without labels', () => {
    expect(findLabelLine(canonical, [], 0)).toBe(-1);
  });
});
