/**
 * AQL Inspection Report Profile
 *
 * Strategy chains for every column of the inspection record. Chains run the
 * template-aware strategies first and the generic labeled lookups last, since
 * a generic lookup happily captures a similar-looking value from elsewhere on
 * the page.
 */

import { STANDARD_FIELDS, QUALITY_DIGIT_FIELD } from '../../types';
import type { ExtractionProfile, FieldDefinition, FieldStrategy, StrategyStep } from '../types';
import { defineFieldSchema } from '../field-schema';
import { config } from '../../config';
import {
  customerDeptComposite,
  customerFactoryRow,
  deliveredQtyTotal,
  deliveredQuantityHeader,
  descriptionNumbers,
  factoryFidComposite,
  inspectionDateInline,
  inspectionDateNextLine,
  inspectionNoInline,
  inspectionNoNextLine,
  inspectionSeqInline,
  inspectionSeqNextLine,
  itemNoInline,
  knownFactory,
  poDateInline,
  poSplitNoInline,
  poTableRow,
  qualityDigitInline,
  styleNoInline,
  vendorComposite,
  DIGITS,
  NUMERIC_CODE,
  SINGLE_DIGIT,
} from './patterns';

export const AQL_STANDARD_PROFILE_ID = 'aql_standard';
export const AQL_EXTENDED_PROFILE_ID = 'aql_extended';

/** Sequence number when the report does not print one */
export const DEFAULT_INSPECTION_SEQ = '1';

export interface AqlReportProfileOptions {
  id?: string;
  /** Append the Quality Digit column */
  includeQualityDigit?: boolean;
  /** Value substituted when no Quality Digit is printed */
  qualityDigitDefault?: string;
  /** Factory names matched ahead of the generic Factory / FID Code lookups */
  knownFactories?: readonly string[];
}

function step(strategy: FieldStrategy, capture = 0): StrategyStep {
  return { strategy, capture };
}

/**
 * Build the standard field definitions, in canonical column order
 */
export function buildAqlReportFields(knownFactories: readonly string[]): FieldDefinition[] {
  const factoryLiterals = knownFactories.map(knownFactory);

  const fields: FieldDefinition[] = [
    {
      name: 'Inspection No.',
      steps: [step(inspectionNoInline), step(inspectionNoNextLine)],
    },
    {
      name: 'Inspection Seq.',
      steps: [step(inspectionSeqInline), step(inspectionSeqNextLine)],
      accept: DIGITS,
      defaultValue: DEFAULT_INSPECTION_SEQ,
    },
    {
      name: 'Inspection Date',
      steps: [step(inspectionDateInline), step(inspectionDateNextLine)],
    },
    {
      name: 'PO / Split No.',
      steps: [step(poTableRow, 0), step(poSplitNoInline)],
      accept: DIGITS,
    },
    {
      name: 'PO Date',
      steps: [step(poTableRow, 1), step(poDateInline)],
    },
    {
      name: 'Style No.',
      steps: [step(descriptionNumbers, 0), step(styleNoInline)],
    },
    {
      name: 'Item No.',
      steps: [step(descriptionNumbers, 1), step(itemNoInline)],
    },
    {
      name: 'Delivered Quantity',
      steps: [step(deliveredQtyTotal), step(deliveredQuantityHeader)],
      accept: DIGITS,
    },
    {
      name: 'Customer',
      steps: [step(customerFactoryRow, 0), step(customerDeptComposite, 0)],
    },
    {
      name: 'Dept',
      steps: [step(customerFactoryRow, 1), step(customerDeptComposite, 1)],
      accept: NUMERIC_CODE,
    },
    {
      name: 'Factory',
      steps: [
        ...factoryLiterals.map(strategy => step(strategy, 0)),
        step(customerFactoryRow, 2),
        step(factoryFidComposite, 0),
      ],
    },
    {
      name: 'FID Code',
      steps: [
        ...factoryLiterals.map(strategy => step(strategy, 1)),
        step(customerFactoryRow, 3),
        step(factoryFidComposite, 1),
      ],
      accept: NUMERIC_CODE,
    },
    {
      name: 'Vendor',
      steps: [step(vendorComposite, 0)],
    },
  ];

  return fields;
}

export function createAqlReportProfile(options: AqlReportProfileOptions = {}): ExtractionProfile {
  const includeQualityDigit = options.includeQualityDigit ?? false;
  const fields = buildAqlReportFields(options.knownFactories ?? config.knownFactories);

  if (includeQualityDigit) {
    fields.push({
      name: QUALITY_DIGIT_FIELD,
      steps: [step(qualityDigitInline)],
      accept: SINGLE_DIGIT,
      defaultValue: options.qualityDigitDefault ?? config.qualityDigitDefault,
    });
  }

  const id =
    options.id ?? (includeQualityDigit ? AQL_EXTENDED_PROFILE_ID : AQL_STANDARD_PROFILE_ID);

  return {
    id,
    description: includeQualityDigit
      ? `AQL inspection report, ${STANDARD_FIELDS.length} columns plus ${QUALITY_DIGIT_FIELD}`
      : `AQL inspection report, ${STANDARD_FIELDS.length} columns`,
    schema: defineFieldSchema(fields),
  };
}

export const aqlStandardProfile = createAqlReportProfile();
export const aqlExtendedProfile = createAqlReportProfile({ includeQualityDigit: true });
