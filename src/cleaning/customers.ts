import type { Logger } from '../lib/logger';
import type { CustomerType, Row, Table } from './types';

export const CUSTOMER_INFO_FIELDS = [
  'customer_name',
  'tax_id',
  'tax_id_type',
  'tax_id_print',
  'other',
] as const;

const isCustomerType = (value: string): value is CustomerType =>
  value === 'owner' || value === 'operator';

const prefixed = (customerType: CustomerType): string[] =>
  CUSTOMER_INFO_FIELDS.map((field) => `${customerType}_${field}`);

/**
 * Keeps one customer role per row: `<role>_customer_name` and friends become
 * `customer_name`, the other role's fields are dropped and `customer_type`
 * records the role. An unknown role leaves the table as it is.
 */
export const selectCustomerRole = (
  table: Table,
  customerType: string,
  logger: Pick<Logger, 'warn'> = console,
): Table => {
  if (!isCustomerType(customerType)) {
    logger.warn(
      `[RAB Customers] "${customerType}" is not a valid customer type, expected owner or operator`,
    );
    return table;
  }

  const otherType: CustomerType = customerType === 'owner' ? 'operator' : 'owner';
  const dropped = new Set(prefixed(otherType));
  const renames: ReadonlyMap<string, string> = new Map(
    CUSTOMER_INFO_FIELDS.map((field) => [`${customerType}_${field}`, field] as const),
  );
  const rename = (column: string): string => renames.get(column) ?? column;

  const columns = table.columns.filter((column) => !dropped.has(column)).map(rename);
  if (!columns.includes('customer_type')) {
    columns.push('customer_type');
  }

  return {
    columns,
    rows: table.rows.map((row) => {
      const projected: Row = {};
      for (const [column, value] of Object.entries(row)) {
        if (!dropped.has(column)) {
          projected[rename(column)] = value;
        }
      }

      projected['customer_type'] = customerType;
      return projected;
    }),
  };
};

/** One row per aircraft and role: all owner rows, then all operator rows. */
export const reshapeByCustomerRole = (table: Table): Table => {
  const owners = selectCustomerRole(table, 'owner');
  const operators = selectCustomerRole(table, 'operator');

  return {
    columns: owners.columns,
    rows: [...owners.rows, ...operators.rows],
  };
};
