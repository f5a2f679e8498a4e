/**
 * Test Helpers
 *
 * Sample report texts, laid out the way pdf text extraction returns them.
 */

import type { InspectionDocument } from '@aqlparse/shared';

/** A report with every field present in its template-aware layout */
export const FULL_REPORT = `AQL INSPECTION REPORT
Inspection No. QA-2025-0042
Inspection Seq. 2
Inspection Date Aug 12, 25
PO / Split No. PO Date PO Type
4500123456 Aug 1, 25 Bulk
Customer / Dept Factory / FID Code
ACME CO / 43.1 FACTORY NAME / 028288
Vendor / Vendor No. GLOBAL SOURCING LTD / 700123
Item Description
COTTON TEE 43145156 906730 NAVY
Delivered Quantity
Item Quantity Delivered Quantity
1200 1150
Quality Digit 3
Delivered Qty.
Size S 400
Size M 750
Total 1150`;

export const FULL_REPORT_FIELDS = {
  'Inspection No.': 'QA-2025-0042',
  'Inspection Seq.': '2',
  'Inspection Date': 'Aug 12, 25',
  'PO / Split No.': '4500123456',
  'PO Date': 'Aug 1, 25',
  'Style No.': '43145156',
  'Item No.': '906730',
  'Delivered Quantity': '1150',
  Customer: 'ACME CO',
  Dept: '43.1',
  Factory: 'FACTORY NAME',
  'FID Code': '028288',
  Vendor: 'GLOBAL SOURCING LTD',
};

export function makeDocument(identifier: string, text: string): InspectionDocument {
  return { identifier, text };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
