/**
 * Conversion module.
 * Turns a downloaded FIRST workbook into a year × month CSV table.
 */

export { parseNumber, parseYear } from './numbers.js';
export type { CellValue } from './numbers.js';
export {
  MONTHS,
  CSV_HEADER,
  findMonthHeaderRow,
  mapColumns,
  extractYearRows,
  simplifyReportTable,
} from './table.js';
export type { Month, Row, ColumnMap, TableResult } from './table.js';
export { readWorkbookRows, sheetRows, toCsv } from './workbook.js';
