import { TaxIdFormatError } from './errors';

/**
 * Validation and formatting of Brazilian tax identifiers:
 * CNPJ (14 digits, organisations) and CPF (11 digits, individuals).
 */

const CNPJ_LENGTH = 14;
const CPF_LENGTH = 11;

const CNPJ_WEIGHTS = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2] as const;

export const normalizeDigits = (value: string | null | undefined): string => {
  if (!value) {
    return '';
  }

  return value.replace(/\D+/g, '');
};

const toCheckDigit = (weights: readonly number[], digits: string): number => {
  let sum = 0;
  for (let index = 0; index < weights.length; index += 1) {
    sum += weights[index] * Number(digits[index]);
  }

  const remainder = sum % 11;

  return remainder < 2 ? 0 : 11 - remainder;
};

// Check digit n (1 or 2) covers the first 11 + n digits
const cnpjCheckDigit = (digits: string, n: 1 | 2): number =>
  toCheckDigit(CNPJ_WEIGHTS.slice(2 - n), digits);

// Weights run from 9 + n down to 2 over the first 8 + n digits
const cpfCheckDigit = (digits: string, n: 1 | 2): number => {
  const weights: number[] = [];
  for (let weight = 9 + n; weight >= 2; weight -= 1) {
    weights.push(weight);
  }

  return toCheckDigit(weights, digits);
};

const hasValidCheckDigits = (
  digits: string,
  checkDigit: (digits: string, n: 1 | 2) => number,
): boolean => {
  const first = Number(digits[digits.length - 2]);
  const second = Number(digits[digits.length - 1]);

  return checkDigit(digits, 1) === first && checkDigit(digits, 2) === second;
};

export const isValidCnpj = (value: string | null | undefined): boolean => {
  if (value === null || value === undefined) {
    return false;
  }

  const digits = normalizeDigits(value);
  if (digits.length !== CNPJ_LENGTH) {
    return false;
  }

  return hasValidCheckDigits(digits, cnpjCheckDigit);
};

export const isValidCpf = (value: string | null | undefined): boolean => {
  if (value === null || value === undefined) {
    return false;
  }

  const digits = normalizeDigits(value);
  if (digits.length !== CPF_LENGTH) {
    return false;
  }

  return hasValidCheckDigits(digits, cpfCheckDigit);
};

/** Formats as XX.XXX.XXX/XXXX-XX; throws when the value does not hold 14 digits. */
export const formatCnpj = (value: string): string => {
  const digits = normalizeDigits(value);
  if (digits.length !== CNPJ_LENGTH) {
    throw new TaxIdFormatError('CNPJ', CNPJ_LENGTH, value);
  }

  return `${digits.slice(0, 2)}.${digits.slice(2, 5)}.${digits.slice(5, 8)}/${digits.slice(8, 12)}-${digits.slice(12, 14)}`;
};

/** Formats as XXX.XXX.XXX-XX; throws when the value does not hold 11 digits. */
export const formatCpf = (value: string): string => {
  const digits = normalizeDigits(value);
  if (digits.length !== CPF_LENGTH) {
    throw new TaxIdFormatError('CPF', CPF_LENGTH, value);
  }

  return `${digits.slice(0, 3)}.${digits.slice(3, 6)}.${digits.slice(6, 9)}-${digits.slice(9, 11)}`;
};
