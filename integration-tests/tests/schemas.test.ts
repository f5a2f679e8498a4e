/**
 * Schema Validation Tests
 */

import {
  validateExtractRequest,
  validateBatchRequest,
  buildRecordSchema,
  compileRecordValidator,
} from '@aqlparse/shared';

describe('validateExtractRequest', () => {
  it('should accept documents with identifiers and text', () => {
    const result = validateExtractRequest({
      profile: 'aql_standard',
      documents: [{ identifier: 'a.pdf', text: '' }],
    });

    expect(result).toEqual({ valid: true });
  });

  it('should require at least one document', () => {
    const result = validateExtractRequest({ documents: [] });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['/documents: must NOT have fewer than 1 items']);
  });

  it('should reject unknown properties', () => {
    const result = validateExtractRequest({
      documents: [{ identifier: 'a.pdf', text: 'x', pages: 2 }],
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['/documents/0: must NOT have additional properties']);
  });
});

describe('validateBatchRequest', () => {
  it('should accept files with paths', () => {
    expect(
      validateBatchRequest({ files: [{ identifier: 'a.pdf', path: '/data/a.pdf' }] }).valid
    ).toBe(true);
  });

  it('should require files', () => {
    expect(validateBatchRequest({}).errors).toEqual(["/: must have required property 'files'"]);
  });
});

describe('record schema', () => {
  const validate = compileRecordValidator(['Customer', 'Dept']);

  it('should require every column as a string', () => {
    expect(buildRecordSchema(['Customer'])).toMatchObject({
      required: ['Customer'],
      additionalProperties: false,
    });
    expect(validate({ Customer: 'ACME CO', Dept: '' }).valid).toBe(true);
    expect(validate({ Customer: 'ACME CO' }).valid).toBe(false);
  });

  it('should reject extra columns', () => {
    expect(validate({ Customer: 'ACME CO', Dept: '43.1', Vendor: 'X' }).valid).toBe(false);
  });
});
