export type CellValue = string | number | boolean | Date | null | undefined;

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const LOOSE_NUMBER_RE = /^-?\(?\$?([0-9,]+(?:\.[0-9]+)?)\)?$/;

function integerText(value: number): string {
  return BigInt(value).toString();
}

function numberText(value: number): string {
  return Number.isInteger(value) ? integerText(value) : String(value);
}

/**
 * Normalise a report cell to plain numeric text.
 *
 * Thousands separators and `$` are dropped, `(12)` reads as `-12`,
 * integral decimals lose their fraction. Text that still is not a number
 * falls back to the digits it wraps, or to itself.
 */
export function parseNumber(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return numberText(value);
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (value instanceof Date) return value.toISOString();

  const s = value.trim();
  if (s.length === 0) return '';

  let cleaned = s.replaceAll(',', '').replaceAll('$', '');
  if (cleaned.startsWith('(') && cleaned.endsWith(')')) {
    cleaned = '-' + cleaned.slice(1, -1);
  }

  if (cleaned.includes('.')) {
    if (FLOAT_RE.test(cleaned)) return numberText(Number(cleaned));
  } else if (INT_RE.test(cleaned)) {
    return BigInt(cleaned.replace(/^\+/, '')).toString();
  }

  const match = LOOSE_NUMBER_RE.exec(s);
  return match?.[1] ?? cleaned;
}

/** Integer part of a numeric cell, or null when the cell is not a number. */
export function parseYear(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value !== 'string') return null;
  const s = value.trim();
  if (!FLOAT_RE.test(s)) return null;
  return Math.trunc(Number(s));
}
