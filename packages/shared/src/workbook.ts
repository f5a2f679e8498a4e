/**
 * Merged Workbook Export
 *
 * Renders a batch into one spreadsheet: a "Records" sheet whose columns are
 * exactly the profile's field schema, in order, and a "Failures" sheet
 * listing documents that produced no record.
 */

import ExcelJS from 'exceljs';
import type { BatchResult } from './types';

export const WORKBOOK_FILENAME = 'AQL_Parsed_All.xlsx';
export const WORKBOOK_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const RECORDS_SHEET = 'Records';
export const FAILURES_SHEET = 'Failures';

function styleHeader(row: ExcelJS.Row): void {
  row.font = { bold: true, color: { argb: 'FFFFFFFF' } };
  row.fill = {
    type: 'pattern',
    pattern: 'solid',
    fgColor: { argb: 'FF4472C4' },
  };
  row.alignment = { horizontal: 'center', vertical: 'middle' };
}

/**
 * Build the workbook for a batch. Values are written as text, exactly as
 * extracted.
 */
export function createWorkbook(result: BatchResult): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'aqlparse';
  workbook.created = new Date();

  const records = workbook.addWorksheet(RECORDS_SHEET);
  records.columns = result.columns.map(column => ({
    header: column,
    key: column,
    width: Math.max(14, column.length + 4),
  }));
  styleHeader(records.getRow(1));

  for (const record of result.records) {
    records.addRow(result.columns.map(column => record.fields[column] ?? ''));
  }

  const failures = workbook.addWorksheet(FAILURES_SHEET);
  failures.columns = [
    { header: 'Identifier', key: 'identifier', width: 40 },
    { header: 'Reason', key: 'reason', width: 60 },
  ];
  styleHeader(failures.getRow(1));

  for (const failure of result.failures) {
    failures.addRow([failure.identifier, failure.reason]);
  }

  return workbook;
}

export async function writeWorkbookBuffer(result: BatchResult): Promise<ExcelJS.Buffer> {
  return createWorkbook(result).xlsx.writeBuffer();
}

export async function writeWorkbookFile(result: BatchResult, filePath: string): Promise<void> {
  await createWorkbook(result).xlsx.writeFile(filePath);
}
