import { MissingColumnError } from './errors';
import type { Cell, Row, Table } from './types';

export const assertColumns = (table: Table, columns: readonly string[]): void => {
  for (const column of columns) {
    if (!table.columns.includes(column)) {
      throw new MissingColumnError(column);
    }
  }
};

const appendMissing = (columns: string[], added: readonly string[]): string[] => {
  const next = [...columns];
  for (const column of added) {
    if (!next.includes(column)) {
      next.push(column);
    }
  }

  return next;
};

/**
 * Rebuilds every row with `derive`. Derived values are merged over a copy of
 * the row; columns not seen before are appended to the column list.
 */
export const mapRows = (
  table: Table,
  addedColumns: readonly string[],
  derive: (row: Row, index: number) => Row,
): Table => ({
  columns: appendMissing(table.columns, addedColumns),
  rows: table.rows.map((row, index) => ({ ...row, ...derive(row, index) })),
});

export const mapColumns = (
  table: Table,
  columns: readonly string[],
  transform: (value: Cell, column: string, index: number) => Cell,
): Table => {
  assertColumns(table, columns);

  return mapRows(table, [], (row, index) => {
    const updates: Row = {};
    for (const column of columns) {
      updates[column] = transform(row[column] ?? null, column, index);
    }

    return updates;
  });
};

export const cellToString = (value: Cell): string | null => {
  if (value === null) {
    return null;
  }

  return typeof value === 'string' ? value : String(value);
};
