import * as XLSX from 'xlsx';
import type { CellObject, WorkSheet } from 'xlsx';

import type { CellValue } from './numbers.js';
import type { Row } from './table.js';

// ── Reading ──────────────────────────────────────────────────

function cellValue(sheet: WorkSheet, r: number, c: number): CellValue {
  const cell: CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
  return cell?.v ?? null;
}

/**
 * Cell values of a sheet as a dense grid anchored at A1, so column
 * indexes match the sheet even when the used range starts further in.
 */
export function sheetRows(sheet: WorkSheet): Row[] {
  const ref = sheet['!ref'];
  if (ref === undefined) return [];

  const range = XLSX.utils.decode_range(ref);
  const rows: Row[] = [];
  for (let r = 0; r <= range.e.r; r++) {
    const row: CellValue[] = [];
    for (let c = 0; c <= range.e.c; c++) {
      row.push(cellValue(sheet, r, c));
    }
    rows.push(row);
  }
  return rows;
}

/** Rows of the first sheet of an `.xlsx` workbook. */
export function readWorkbookRows(data: Buffer): Row[] {
  const workbook = XLSX.read(data, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) return [];
  const sheet = workbook.Sheets[sheetName];
  return sheet ? sheetRows(sheet) : [];
}

// ── Writing ──────────────────────────────────────────────────

const CSV_LINE_END = '\r\n';

/** CSV text, one CRLF-terminated line per row. */
export function toCsv(rows: readonly (readonly string[])[]): string {
  const sheet = XLSX.utils.aoa_to_sheet(rows.map((row) => [...row]));
  return XLSX.utils.sheet_to_csv(sheet, { RS: CSV_LINE_END }) + CSV_LINE_END;
}
