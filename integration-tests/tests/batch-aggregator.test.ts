/**
 * Batch Aggregator Tests
 */

import {
  extractAll,
  getExtractorOrThrow,
  buildAqlReportFields,
  defineFieldSchema,
  ConfigurationError,
  STANDARD_FIELDS,
  type DocumentExtractor,
  type ExtractionOutcome,
  type ExtractionProfile,
  type FieldDefinition,
  type InlineStrategy,
} from '@aqlparse/shared';
import { FULL_REPORT, makeDocument, sleep } from './helpers';

class ExplodingPattern extends RegExp {
  exec(): RegExpExecArray | null {
    throw new Error('pattern exploded');
  }
}

function explodingProfile(): ExtractionProfile {
  const exploding: InlineStrategy = {
    kind: 'inline',
    name: 'exploding',
    anchor: 'Inspection No.',
    value: new ExplodingPattern('x'),
  };
  const fields: FieldDefinition[] = buildAqlReportFields([]).map((field) =>
    field.name === 'Inspection No.' ? { ...field, steps: [{ strategy: exploding, capture: 0 }] } : field
  );

  return { id: 'exploding', description: 'throws on Inspection No.', schema: defineFieldSchema(fields) };
}

describe('extractAll', () => {
  it('should keep input order under concurrency', async () => {
    const documents = Array.from({ length: 7 }, (_, i) =>
      makeDocument(`doc-${i}.pdf`, `Inspection No. QA-${i}`)
    );

    const result = await extractAll(documents, { concurrency: 3 });

    expect(result.outcomes).toHaveLength(7);
    expect(result.outcomes.map((outcome) => outcome.identifier)).toEqual(
      documents.map((document) => document.identifier)
    );
    expect(result.records.map((record) => record.fields['Inspection No.'])).toEqual([
      'QA-0',
      'QA-1',
      'QA-2',
      'QA-3',
      'QA-4',
      'QA-5',
      'QA-6',
    ]);
  });

  it('should place outcomes by input index when units finish out of order', async () => {
    const delays = [80, 10, 50, 0, 20];
    const documents = delays.map((_, i) => makeDocument(`doc-${i}.pdf`, `Inspection No. QA-${i}`));
    const standard = getExtractorOrThrow('aql_standard');
    const finished: string[] = [];
    const delayed: DocumentExtractor = {
      profile: standard.profile,
      async extract(document): Promise<ExtractionOutcome> {
        await sleep(delays[documents.indexOf(document)]);
        finished.push(document.identifier);
        return standard.extract(document);
      },
    };

    const result = await extractAll(documents, { extractor: delayed, concurrency: 3 });

    expect(finished).toEqual(['doc-1.pdf', 'doc-3.pdf', 'doc-4.pdf', 'doc-2.pdf', 'doc-0.pdf']);
    expect(result.outcomes.map((outcome) => outcome.identifier)).toEqual(
      documents.map((document) => document.identifier)
    );
    expect(result.records.map((record) => record.fields['Inspection No.'])).toEqual([
      'QA-0',
      'QA-1',
      'QA-2',
      'QA-3',
      'QA-4',
    ]);
  });

  it('should report failures alongside records without stopping', async () => {
    const result = await extractAll([
      makeDocument('a.pdf', FULL_REPORT),
      makeDocument('b.pdf', ''),
      makeDocument('c.pdf', 'Inspection No. QA-3'),
    ]);

    expect(result.outcomes.map((outcome) => outcome.status)).toEqual([
      'success',
      'failure',
      'success',
    ]);
    expect(result.records.map((record) => record.identifier)).toEqual(['a.pdf', 'c.pdf']);
    expect(result.failures).toEqual([{ identifier: 'b.pdf', reason: 'no text content' }]);
  });

  it('should use the default profile and report its columns', async () => {
    const result = await extractAll([makeDocument('a.pdf', FULL_REPORT)]);

    expect(result.profile).toBe('aql_standard');
    expect(result.columns).toEqual([...STANDARD_FIELDS]);
  });

  it('should select a registered profile by id', async () => {
    const result = await extractAll([makeDocument('a.pdf', FULL_REPORT)], {
      profile: 'aql_extended',
    });

    expect(result.profile).toBe('aql_extended');
    expect(result.columns).toHaveLength(14);
    expect(result.records[0].fields['Quality Digit']).toBe('3');
  });

  it('should reject an unknown profile', async () => {
    await expect(extractAll([makeDocument('a.pdf', 'x')], { profile: 'nope' })).rejects.toThrow(
      ConfigurationError
    );
  });

  it('should return an empty result for an empty batch', async () => {
    const result = await extractAll([]);

    expect(result.outcomes).toEqual([]);
    expect(result.records).toEqual([]);
    expect(result.failures).toEqual([]);
  });

  it('should turn an extraction error into a failure outcome', async () => {
    const result = await extractAll(
      [makeDocument('a.pdf', 'Inspection No. QA-1'), makeDocument('b.pdf', 'Vendor / Vendor No.')],
      { profile: explodingProfile() }
    );

    expect(result.failures).toEqual([
      { identifier: 'a.pdf', reason: 'extraction error: pattern exploded' },
    ]);
    expect(result.records.map((record) => record.identifier)).toEqual(['b.pdf']);
  });
});
