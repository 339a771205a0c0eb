import { IntegerCoercionError } from './errors';
import { assertColumns, cellToString, mapColumns, mapRows } from './table';
import type { Cell, Table } from './types';

export const WEIGHT_SENTINEL = -1;
export const MIN_MANUFACTURE_YEAR = 1910;

/**
 * DDMMYY or DDMMYYYY -> YYYY-MM-DD. Anything that is not an all-digit string
 * is returned verbatim; day and month are not range-checked.
 */
export const reformatDate = (value: string | null): string | null => {
  if (value === null) {
    return null;
  }

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return value;
  }

  const day = trimmed.slice(0, 2);
  const month = trimmed.slice(2, 4);
  let year = trimmed.slice(4);

  if (year.length === 2) {
    year = Number.parseInt(year, 10) < 20 ? `20${year}` : `19${year}`;
  }

  return `${year}-${month}-${day}`;
};

export const reformatDates = (table: Table, columns: readonly string[]): Table =>
  mapColumns(table, columns, (value) => reformatDate(cellToString(value)));

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/**
 * Blank and non-numeric cells become null. A numeric value with a fractional
 * part is rejected rather than truncated, and so is one beyond 2^53.
 */
export const toStrictNullableInt = (
  value: Cell,
  column: string,
  rowIndex: number,
): number | null => {
  if (value === null || typeof value === 'boolean') {
    return null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }

    if (!Number.isSafeInteger(value)) {
      throw new IntegerCoercionError(column, rowIndex, String(value));
    }

    return value;
  }

  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new IntegerCoercionError(column, rowIndex, value);
  }

  return parsed;
};

export const coerceNullableInt = (table: Table, columns: readonly string[]): Table =>
  mapColumns(table, columns, (value, column, index) => toStrictNullableInt(value, column, index));

/**
 * Weight strings such as "1,234.5 kg" or "5670,5". When both separators are
 * present the last one is the decimal point; a lone comma is a decimal comma.
 */
export const parseWeight = (value: string | null): number => {
  if (value === null) {
    return WEIGHT_SENTINEL;
  }

  let cleaned = value.replace(/[^0-9,.]/g, '').trim();
  const lastComma = cleaned.lastIndexOf(',');
  const lastDot = cleaned.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    const grouping = lastComma > lastDot ? /\./g : /,/g;
    cleaned = cleaned.replace(grouping, '');
  }

  cleaned = cleaned.replace(/,/g, '.');

  if (!/^(\d+\.?\d*|\.\d+)$/.test(cleaned)) {
    return WEIGHT_SENTINEL;
  }

  return Number.parseFloat(cleaned);
};

export const coerceWeight = (table: Table, columns: readonly string[]): Table =>
  mapColumns(table, columns, (value) =>
    typeof value === 'number' ? value : parseWeight(cellToString(value)),
  );

export const deriveAge = (
  table: Table,
  referenceYear: number = new Date().getFullYear(),
): Table => {
  assertColumns(table, ['year_mfg']);

  return mapRows(table, ['age'], (row) => {
    const year = row['year_mfg'];
    if (typeof year !== 'number' || year < MIN_MANUFACTURE_YEAR) {
      return { year_mfg: null, age: null };
    }

    return { year_mfg: year, age: referenceYear - year };
  });
};
