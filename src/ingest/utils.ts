export const toNullableString = (value: string | undefined | null): string | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();

  return trimmed.length > 0 ? trimmed : null;
};

export const toRawCell = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'string') {
    return toNullableString(value);
  }

  return String(value);
};

export const normalizeTailNumber = (tailNumber: string | undefined | null): string => {
  if (!tailNumber) {
    return '';
  }

  return tailNumber.trim().toUpperCase().replace(/-/g, '');
};

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const parseIsoDate = (value: string): Date | null => {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
};

/**
 * Whether an ISO `YYYY-MM-DD` date lies before `today`. Dates left verbatim by
 * the cleaning pipeline, or impossible calendar dates, give null.
 */
export const isPastDue = (date: string | null, today: Date = new Date()): boolean | null => {
  if (date === null) {
    return null;
  }

  const parsed = parseIsoDate(date);
  if (!parsed) {
    return null;
  }

  const todayUtc = Date.UTC(today.getFullYear(), today.getMonth(), today.getDate());

  return parsed.getTime() < todayUtc;
};
