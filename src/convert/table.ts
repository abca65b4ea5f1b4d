import { CONVERSION } from '../config/defaults.js';
import type { CellValue } from './numbers.js';
import { parseNumber, parseYear } from './numbers.js';

export const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type Month = (typeof MONTHS)[number];

export const CSV_HEADER: readonly string[] = ['year', ...MONTHS, 'Total'];

export type Row = readonly CellValue[];

export interface ColumnMap {
  months: Partial<Record<Month, number>>;
  total: number | null;
}

// ── Cells ────────────────────────────────────────────────────

function cellText(cell: CellValue): string {
  if (cell === null || cell === undefined) return '';
  return String(cell).trim();
}

function monthOf(text: string): Month | undefined {
  const lower = text.toLowerCase();
  return MONTHS.find((m) => m.toLowerCase() === lower);
}

// ── Header ───────────────────────────────────────────────────

/** Index of the first row naming at least six months, or -1. */
export function findMonthHeaderRow(rows: readonly Row[]): number {
  return rows.findIndex((row) => {
    const found = new Set<Month>();
    for (const cell of row) {
      const month = monthOf(cellText(cell));
      if (month !== undefined) found.add(month);
    }
    return found.size >= CONVERSION.MIN_MONTH_HEADERS;
  });
}

/**
 * Map month names and the total column to column indexes.
 * Without a `Total` header, the right-most non-empty header cell that
 * is not a month name is taken as the total.
 */
export function mapColumns(header: Row): ColumnMap {
  const months: Partial<Record<Month, number>> = {};
  let total: number | null = null;

  for (const [index, cell] of header.entries()) {
    const text = cellText(cell);
    if (text.length === 0) continue;
    const month = monthOf(text);
    if (month !== undefined) months[month] = index;
    if (text.toLowerCase() === 'total') total = index;
  }

  if (total === null) {
    for (let index = header.length - 1; index >= 0; index--) {
      const text = cellText(header[index]);
      if (text.length > 0 && monthOf(text) === undefined) {
        total = index;
        break;
      }
    }
  }

  return { months, total };
}

// ── Body ─────────────────────────────────────────────────────

/**
 * Year-by-month rows below the header. Stops at the first row with an
 * empty leading cell or a `Total` label; skips rows not led by a number.
 */
export function extractYearRows(rows: readonly Row[], headerIndex: number, columns: ColumnMap): string[][] {
  const out: string[][] = [];

  for (const row of rows.slice(headerIndex + 1)) {
    const first = cellText(row[0]);
    if (first.length === 0) break;
    if (first.toLowerCase().startsWith('total')) break;

    const year = parseYear(row[0]);
    if (year === null) continue;

    const values = [String(year)];
    for (const month of MONTHS) {
      const col = columns.months[month];
      values.push(parseNumber(col === undefined ? null : row[col]));
    }
    values.push(columns.total === null ? '' : parseNumber(row[columns.total]));
    out.push(values);
  }

  return out;
}

export type TableResult =
  | { status: 'ok'; rows: string[][] }
  | { status: 'no-header' }
  | { status: 'no-rows' };

/** Reduce a sheet grid to the simplified year × month table. */
export function simplifyReportTable(rows: readonly Row[]): TableResult {
  const headerIndex = findMonthHeaderRow(rows);
  if (headerIndex === -1) return { status: 'no-header' };

  const header = rows[headerIndex] ?? [];
  const body = extractYearRows(rows, headerIndex, mapColumns(header));
  if (body.length === 0) return { status: 'no-rows' };
  return { status: 'ok', rows: body };
}
