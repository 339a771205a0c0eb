import { assertColumns, cellToString, mapRows } from './table';
import { formatCnpj, formatCpf, isValidCnpj, isValidCpf, normalizeDigits } from './taxId';
import type { CustomerType, Table, TaxIdType } from './types';

const CUSTOMER_TYPES: readonly CustomerType[] = ['owner', 'operator'];

/** Empty values and all-zero placeholders such as "00000000000" carry no identifier. */
export const toNullableTaxId = (value: string | null): string | null => {
  if (value === null) {
    return null;
  }

  const digitSum = normalizeDigits(value)
    .split('')
    .reduce((sum, digit) => sum + Number(digit), 0);

  return digitSum === 0 ? null : value;
};

export const classifyTaxId = (value: string | null): TaxIdType => {
  if (value === null) {
    return 'EMPTY';
  }

  if (isValidCnpj(value)) {
    return 'CNPJ';
  }

  if (isValidCpf(value)) {
    return 'CPF';
  }

  return 'INVALID';
};

export const printableTaxId = (type: TaxIdType, value: string | null): string | null => {
  switch (type) {
    case 'CNPJ':
      return value === null ? null : formatCnpj(value);
    case 'CPF':
      return value === null ? null : formatCpf(value);
    case 'INVALID':
      return value;
    case 'EMPTY':
      return null;
  }
};

const enrichCustomerTaxId = (table: Table, customerType: CustomerType): Table => {
  const idColumn = `${customerType}_tax_id`;
  const typeColumn = `${idColumn}_type`;
  const printColumn = `${idColumn}_print`;

  assertColumns(table, [idColumn]);

  return mapRows(table, [typeColumn, printColumn], (row) => {
    const taxId = toNullableTaxId(cellToString(row[idColumn]));
    const type = classifyTaxId(taxId);

    return {
      [idColumn]: taxId,
      [typeColumn]: type,
      [printColumn]: printableTaxId(type, taxId),
    };
  });
};

/** Adds `<role>_tax_id_type` and `<role>_tax_id_print` for the owner, then the operator. */
export const enrichTaxIds = (table: Table): Table =>
  CUSTOMER_TYPES.reduce(enrichCustomerTaxId, table);

export const markOwnedOperated = (table: Table): Table => {
  assertColumns(table, ['owner_tax_id', 'operator_tax_id']);

  return mapRows(table, ['owned_operated'], (row) => {
    const owner = row['owner_tax_id'];
    const operator = row['operator_tax_id'];

    return {
      owned_operated: owner !== null && operator !== null && owner === operator,
    };
  });
};
