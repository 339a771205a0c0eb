import type { CleanAircraftRecord } from '../cleaning/record';
import type { TaxIdType } from '../cleaning/types';
import { normalizeDigits } from '../cleaning/taxId';
import { isPastDue, normalizeTailNumber } from '../ingest/utils';

export type AircraftCustomerSummary = {
  name: string | null;
  state: string | null;
  taxId: string | null;
  taxIdType: TaxIdType;
};

export type AircraftSearchResult = {
  tailNumber: string | null;
  manufacturer: string | null;
  model: string | null;
  serialNumber: string | null;
  yearManufactured: number | null;
  age: number | null;
  maxTakeoffWeightKg: number | null;
  icaoTypeDescription: string | null;
  agricultural: boolean;
  ownedOperated: boolean;
  owner: AircraftCustomerSummary;
  operator: AircraftCustomerSummary;
};

export type AircraftDetail = AircraftSearchResult & {
  operationType: string | null;
  seats: number | null;
  maxPassengers: number | null;
  minCrewSize: number | null;
  certificateExpiresOn: string | null;
  inspectionExpiresOn: string | null;
  certificateExpired: boolean | null;
  inspectionExpired: boolean | null;
};

export type AircraftSearchParams = {
  tailNumber?: {
    value: string;
    exact: boolean;
  };
  manufacturer?: string;
  owner?: string;
  agricultural?: boolean;
  page: number;
  pageSize: number;
};

export type AircraftSearchPayload = {
  data: AircraftSearchResult[];
  total: number;
  page: number;
  pageSize: number;
};

const mapCustomer = (
  record: CleanAircraftRecord,
  customerType: 'owner' | 'operator',
): AircraftCustomerSummary => ({
  name: record[`${customerType}_customer_name` as const],
  state: record[`${customerType}_state` as const],
  taxId: record[`${customerType}_tax_id_print` as const],
  taxIdType: record[`${customerType}_tax_id_type` as const],
});

export const mapAircraft = (record: CleanAircraftRecord): AircraftSearchResult => ({
  tailNumber: record.tail_number,
  manufacturer: record.mfg,
  model: record.model,
  serialNumber: record.serial,
  yearManufactured: record.year_mfg,
  age: record.age,
  // -1 marks an unparseable weight in the cleaned table
  maxTakeoffWeightKg: record.max_takeoff_wgt < 0 ? null : record.max_takeoff_wgt,
  icaoTypeDescription: record.icao_type_desc,
  agricultural: record.agaircraft,
  ownedOperated: record.owned_operated,
  owner: mapCustomer(record, 'owner'),
  operator: mapCustomer(record, 'operator'),
});

export const mapAircraftDetail = (
  record: CleanAircraftRecord,
  today: Date = new Date(),
): AircraftDetail => ({
  ...mapAircraft(record),
  operationType: record.operation_type,
  seats: record.seats,
  maxPassengers: record.max_passengers,
  minCrewSize: record.min_crew_size,
  certificateExpiresOn: record.exp_date_ca,
  inspectionExpiresOn: record.exp_date_iam,
  certificateExpired: isPastDue(record.exp_date_ca, today),
  inspectionExpired: isPastDue(record.exp_date_iam, today),
});

const containsIgnoreCase = (value: string | null, term: string): boolean =>
  value !== null && value.toLowerCase().includes(term);

const matchesOwner = (record: CleanAircraftRecord, term: string): boolean => {
  const lowered = term.toLowerCase();
  const digits = normalizeDigits(term);

  return (['owner', 'operator'] as const).some((customerType) => {
    if (containsIgnoreCase(record[`${customerType}_customer_name` as const], lowered)) {
      return true;
    }

    const taxId = record[`${customerType}_tax_id` as const];
    return digits.length > 0 && taxId !== null && normalizeDigits(taxId).includes(digits);
  });
};

const buildPredicate = (params: AircraftSearchParams) => {
  const tailFilter = params.tailNumber
    ? { value: normalizeTailNumber(params.tailNumber.value), exact: params.tailNumber.exact }
    : undefined;
  const manufacturer = params.manufacturer?.trim().toLowerCase();
  const owner = params.owner?.trim();

  return (record: CleanAircraftRecord): boolean => {
    if (tailFilter) {
      const tailNumber = normalizeTailNumber(record.tail_number);
      const matches = tailFilter.exact
        ? tailNumber === tailFilter.value
        : tailNumber.startsWith(tailFilter.value);
      if (!matches) {
        return false;
      }
    }

    if (manufacturer && !containsIgnoreCase(record.mfg, manufacturer)) {
      return false;
    }

    if (owner && !matchesOwner(record, owner)) {
      return false;
    }

    if (params.agricultural !== undefined && record.agaircraft !== params.agricultural) {
      return false;
    }

    return true;
  };
};

const compareTailNumbers = (left: CleanAircraftRecord, right: CleanAircraftRecord): number =>
  (left.tail_number ?? '').localeCompare(right.tail_number ?? '');

export const searchAircraft = (
  records: readonly CleanAircraftRecord[],
  params: AircraftSearchParams,
): AircraftSearchPayload => {
  const matches = records.filter(buildPredicate(params)).sort(compareTailNumbers);
  const skip = (params.page - 1) * params.pageSize;

  return {
    data: matches.slice(skip, skip + params.pageSize).map(mapAircraft),
    total: matches.length,
    page: params.page,
    pageSize: params.pageSize,
  };
};
