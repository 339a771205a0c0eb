export class SchemaMismatchError extends Error {
  readonly expected: Record<string, readonly string[]>;
  readonly actual: readonly string[];

  constructor(expected: Record<string, readonly string[]>, actual: readonly string[]) {
    super(
      `RAB columns do not match a known header vocabulary (received: ${actual.join(', ') || 'none'})`,
    );
    this.name = 'SchemaMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class MissingColumnError extends Error {
  readonly column: string;

  constructor(column: string) {
    super(`Column "${column}" is not present in the table`);
    this.name = 'MissingColumnError';
    this.column = column;
  }
}

export class IntegerCoercionError extends Error {
  readonly column: string;
  readonly rowIndex: number;
  readonly value: string;

  constructor(column: string, rowIndex: number, value: string) {
    super(`Cannot coerce "${value}" in column "${column}" (row ${rowIndex}) to an integer`);
    this.name = 'IntegerCoercionError';
    this.column = column;
    this.rowIndex = rowIndex;
    this.value = value;
  }
}

export class TaxIdFormatError extends Error {
  constructor(kind: 'CNPJ' | 'CPF', expectedDigits: number, value: string) {
    super(`${kind} must have ${expectedDigits} digits to be formatted (received "${value}")`);
    this.name = 'TaxIdFormatError';
  }
}
