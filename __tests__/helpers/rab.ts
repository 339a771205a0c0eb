import {
  CANONICAL_FIELDS,
  HEADER_VOCABULARIES,
  type CanonicalField,
  type VocabularyName,
} from '../../src/cleaning/columns';
import type { RawRecord, RawTable, Row, Table } from '../../src/cleaning/types';

export type CanonicalRawRow = Partial<Record<CanonicalField, string | null>>;

export const VALID_CNPJ = '11444777000161';
export const VALID_CNPJ_PRINT = '11.444.777/0001-61';
export const VALID_CPF = '52998224725';
export const VALID_CPF_PRINT = '529.982.247-25';

export const buildRawTable = (
  rows: CanonicalRawRow[],
  vocabulary: VocabularyName = 'csv',
): RawTable => {
  const headers = HEADER_VOCABULARIES[vocabulary];

  return {
    columns: CANONICAL_FIELDS.map((field) => headers[field]),
    rows: rows.map((row) => {
      const raw: RawRecord = {};
      for (const field of CANONICAL_FIELDS) {
        raw[headers[field]] = row[field] ?? null;
      }

      return raw;
    }),
  };
};

export const buildTable = (rows: Row[]): Table => {
  const columns: string[] = [];
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
    }
  }

  return { columns, rows };
};

export const columnValues = (table: Table, column: string) =>
  table.rows.map((row) => row[column]);
