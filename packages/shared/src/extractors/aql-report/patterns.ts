/**
 * AQL Inspection Report Patterns
 *
 * Labels, value shapes and strategies for the inspection report template.
 *
 * Typical layouts the strategies cover:
 *   "Inspection No. QA-2025-0042"                     label and value inline
 *   "PO / Split No. PO Date PO Type"                  header, row beneath:
 *   "4500123456 Aug 1, 25 Bulk"
 *   "Customer / Dept Factory / FID Code"              combined header, row beneath:
 *   "ACME CO / 43.1 FACTORY NAME / 028288"
 *   "Item Description ..."                            description, row beneath
 *   "COTTON TEE 43145156 906730 NAVY"                 holds style then item number
 */

import type {
  InlineStrategy,
  LiteralCompositeStrategy,
  NextLineStrategy,
  NumericWindowStrategy,
  SlashCompositeStrategy,
  SlashRowStrategy,
  SubHeaderStrategy,
  TabularRowStrategy,
  TrailingTotalStrategy,
} from '../types';

// ============================================================================
// Labels
// ============================================================================

export const LABELS = {
  inspectionNo: 'Inspection No.',
  inspectionSeq: 'Inspection Seq.',
  inspectionDate: 'Inspection Date',
  poSplitNo: 'PO / Split No.',
  poDate: 'PO Date',
  itemDescription: 'Item Description',
  styleNo: 'Style No.',
  itemNo: 'Item No.',
  deliveredQty: 'Delivered Qty.',
  deliveredQuantity: 'Delivered Quantity',
  itemQuantity: 'Item Quantity',
  customerDept: 'Customer / Dept',
  factoryFid: 'Factory / FID Code',
  vendor: 'Vendor / Vendor No.',
  qualityDigit: 'Quality Digit',
} as const;

/** Three-column header of the purchase order table */
export const PO_TABLE_HEADER = /PO\s*\/\s*Split\s*No\.\s*PO\s*Date\s*PO\s*Type/;

/** Header naming both the customer and the factory columns */
export const CUSTOMER_FACTORY_HEADER = /Customer\s*\/\s*Dept.*Factory/;

/** Lines that close the quantity table; a page footer is never part of it */
export const QUANTITY_SECTION_END = [
  /^Remarks\b/,
  /^Inspection\s*Result/,
  /^Printed\b/,
  /^Page\s+\d+/,
];

// ============================================================================
// Value Shapes
// ============================================================================

/** "Mon D, YY" (a four digit year is kept whole) */
const DATE = '[A-Za-z]{3}\\.?\\s+\\d{1,2},\\s*\\d{2}(?:\\d{2})?(?!\\d)';

export const INSPECTION_NO_VALUE = /^([A-Z0-9][A-Z0-9-]*)(?=\s|$)/;
export const INTEGER_VALUE = /^(\d+)(?=\s|$)/;
export const DATE_VALUE = new RegExp(`^(${DATE})`);
export const IDENTIFIER_VALUE = /^([0-9A-Za-z/]+)/;
export const QUALITY_DIGIT_VALUE = /^(\d)(?=\s|$)/;
export const PO_ROW = new RegExp(`^(\\d+)\\s*(${DATE})`);

/** Style and item numbers in the description row */
export const DESCRIPTION_NUMBER = /\b(\d{6,8})\b/;
export const QUANTITY = /\d{2,6}/;

export const NUMERIC_CODE = /^\d+(?:\.\d+)*$/;
export const DIGITS = /^\d+$/;
export const SINGLE_DIGIT = /^\d$/;

// ============================================================================
// Strategies
// ============================================================================

export const inspectionNoInline: InlineStrategy = {
  kind: 'inline',
  name: 'inspection_no_inline',
  anchor: LABELS.inspectionNo,
  value: INSPECTION_NO_VALUE,
};

export const inspectionNoNextLine: NextLineStrategy = {
  kind: 'next_line',
  name: 'inspection_no_next_line',
  anchor: LABELS.inspectionNo,
  value: INSPECTION_NO_VALUE,
};

export const inspectionSeqInline: InlineStrategy = {
  kind: 'inline',
  name: 'inspection_seq_inline',
  anchor: LABELS.inspectionSeq,
  value: INTEGER_VALUE,
};

export const inspectionSeqNextLine: NextLineStrategy = {
  kind: 'next_line',
  name: 'inspection_seq_next_line',
  anchor: LABELS.inspectionSeq,
  value: INTEGER_VALUE,
};

export const inspectionDateInline: InlineStrategy = {
  kind: 'inline',
  name: 'inspection_date_inline',
  anchor: LABELS.inspectionDate,
  value: DATE_VALUE,
};

export const inspectionDateNextLine: NextLineStrategy = {
  kind: 'next_line',
  name: 'inspection_date_next_line',
  anchor: LABELS.inspectionDate,
  value: DATE_VALUE,
};

/** Captures: [PO / Split No., PO Date] */
export const poTableRow: TabularRowStrategy = {
  kind: 'tabular_row',
  name: 'po_table_row',
  anchor: PO_TABLE_HEADER,
  row: PO_ROW,
};

export const poSplitNoInline: InlineStrategy = {
  kind: 'inline',
  name: 'po_split_no_inline',
  anchor: LABELS.poSplitNo,
  value: INTEGER_VALUE,
};

export const poDateInline: InlineStrategy = {
  kind: 'inline',
  name: 'po_date_inline',
  anchor: LABELS.poDate,
  value: DATE_VALUE,
};

/** Captures: the 6-8 digit numbers of the description row, in order */
export const descriptionNumbers: NumericWindowStrategy = {
  kind: 'numeric_window',
  name: 'description_numbers',
  anchor: LABELS.itemDescription,
  windowLines: 1,
  token: DESCRIPTION_NUMBER,
  minTokens: 2,
};

export const styleNoInline: InlineStrategy = {
  kind: 'inline',
  name: 'style_no_inline',
  anchor: LABELS.styleNo,
  value: IDENTIFIER_VALUE,
};

export const itemNoInline: InlineStrategy = {
  kind: 'inline',
  name: 'item_no_inline',
  anchor: LABELS.itemNo,
  value: IDENTIFIER_VALUE,
};

export const deliveredQtyTotal: TrailingTotalStrategy = {
  kind: 'trailing_total',
  name: 'delivered_qty_total',
  anchor: LABELS.deliveredQty,
  token: QUANTITY,
  sectionEnd: QUANTITY_SECTION_END,
};

/** Header detail: "<item quantity> <delivered quantity>" under the sub-header */
export const deliveredQuantityHeader: SubHeaderStrategy = {
  kind: 'sub_header',
  name: 'delivered_quantity_header',
  anchor: LABELS.deliveredQuantity,
  subHeader: LABELS.itemQuantity,
  windowLines: 2,
  token: QUANTITY,
  tokenIndex: 1,
};

/** Captures: [Customer, Dept, Factory, FID Code] */
export const customerFactoryRow: SlashRowStrategy = {
  kind: 'slash_row',
  name: 'customer_factory_row',
  anchor: CUSTOMER_FACTORY_HEADER,
  pairs: 2,
};

/** Captures: [Customer, Dept] */
export const customerDeptComposite: SlashCompositeStrategy = {
  kind: 'slash_composite',
  name: 'customer_dept_composite',
  anchor: LABELS.customerDept,
  stopAt: [LABELS.factoryFid, LABELS.vendor, LABELS.poSplitNo],
};

/** Captures: [Factory, FID Code] */
export const factoryFidComposite: SlashCompositeStrategy = {
  kind: 'slash_composite',
  name: 'factory_fid_composite',
  anchor: LABELS.factoryFid,
  stopAt: [LABELS.vendor, LABELS.customerDept, LABELS.poSplitNo],
};

/** Captures: [Vendor, Vendor No.] */
export const vendorComposite: SlashCompositeStrategy = {
  kind: 'slash_composite',
  name: 'vendor_composite',
  anchor: LABELS.vendor,
  stopAt: [LABELS.customerDept, LABELS.factoryFid, LABELS.poSplitNo],
};

export const qualityDigitInline: InlineStrategy = {
  kind: 'inline',
  name: 'quality_digit_inline',
  anchor: LABELS.qualityDigit,
  value: QUALITY_DIGIT_VALUE,
};

/** Captures: [the factory name as configured, FID Code] */
export function knownFactory(name: string): LiteralCompositeStrategy {
  return {
    kind: 'literal_composite',
    name: `known_factory:${name}`,
    literal: name,
  };
}
