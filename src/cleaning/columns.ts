import type { Row, RawTable, Table } from './types';

export const CANONICAL_FIELDS = [
  'tail_number',
  'owner_customer_name',
  'owner_other',
  'owner_state',
  'owner_tax_id',
  'operator_customer_name',
  'operator_other',
  'operator_state',
  'operator_tax_id',
  'certificate_num',
  'serial',
  'operation_type',
  'pilot_license_type',
  'model',
  'mfg',
  'icao_type_desc',
  'max_takeoff_wgt',
  'icao_type_code',
  'min_crew_size',
  'max_passengers',
  'seats',
  'year_mfg',
  'exp_date_iam',
  'exp_date_ca',
  'cancellation_date',
  'cancellation_reason',
  'interdiction_code',
  'national_mark_1',
  'national_mark_2',
  'national_mark_3',
  'foreign_tail_number',
  'lien_description',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type VocabularyName = 'csv' | 'json';

type HeaderVocabulary = Readonly<Record<CanonicalField, string>>;

// Canonical field -> raw ANAC header, per export format
export const HEADER_VOCABULARIES = {
  csv: {
    tail_number: 'MARCA',
    owner_customer_name: 'PROPRIETARIO',
    owner_other: 'OUTROS_PROPRIETARIOS',
    owner_state: 'UF_PROPRIETARIO',
    owner_tax_id: 'CPF_CNPJ_PROPRIETARIO',
    operator_customer_name: 'OPERADOR',
    operator_other: 'OUTROS_OPERADORES',
    operator_state: 'UF_OPERADOR',
    operator_tax_id: 'CPF_CGC_OPERADOR',
    certificate_num: 'MATRICULA',
    serial: 'NUM_SERIE',
    operation_type: 'CATEGORIA',
    pilot_license_type: 'TIPO_CERT',
    model: 'MODELO',
    mfg: 'NOME_FABRICANTE',
    icao_type_desc: 'CLASSE',
    max_takeoff_wgt: 'PMD',
    icao_type_code: 'TIPO_ICAO',
    min_crew_size: 'TRIP_MIN',
    max_passengers: 'PAX_MAX',
    seats: 'ASSENTOS',
    year_mfg: 'ANO_FABRICACAO',
    exp_date_iam: 'VAL_CAV',
    exp_date_ca: 'VAL_CA',
    cancellation_date: 'DATA_CANC',
    cancellation_reason: 'MOTIVO',
    interdiction_code: 'CD_INTERDICAO',
    national_mark_1: 'MARCA_NAC_1',
    national_mark_2: 'MARCA_NAC_2',
    national_mark_3: 'MARCA_NAC_3',
    foreign_tail_number: 'MARCA_EST',
    lien_description: 'DESCRICAO_DO_GRAVAME',
  },
  json: {
    tail_number: 'MARCA',
    owner_customer_name: 'PROPRIETARIO',
    owner_other: 'OUTROSPROPRIETARIOS',
    owner_state: 'SGUF',
    owner_tax_id: 'CPFCNPJ',
    operator_customer_name: 'NMOPERADOR',
    operator_other: 'OUTROSOPERADORES',
    operator_state: 'UFOPERADOR',
    operator_tax_id: 'CPFCGC',
    certificate_num: 'NRCERTMATRICULA',
    serial: 'NRSERIE',
    operation_type: 'CDCATEGORIA',
    pilot_license_type: 'CDTIPO',
    model: 'DSMODELO',
    mfg: 'NMFABRICANTE',
    icao_type_desc: 'CDCLS',
    max_takeoff_wgt: 'NRPMD',
    icao_type_code: 'CDTIPOICAO',
    min_crew_size: 'NRTRIPULACAOMIN',
    max_passengers: 'NRPASSAGEIROSMAX',
    seats: 'NRASSENTOS',
    year_mfg: 'NRANOFABRICACAO',
    exp_date_iam: 'DTVALIDADEIAM',
    exp_date_ca: 'DTVALIDADECA',
    cancellation_date: 'DTCANC',
    cancellation_reason: 'DSMOTIVOCANC',
    interdiction_code: 'CDINTERDICAO',
    national_mark_1: 'CDMARCANAC1',
    national_mark_2: 'CDMARCANAC2',
    national_mark_3: 'CDMARCANAC3',
    foreign_tail_number: 'CDMARCAESTRANGEIRA',
    lien_description: 'DSGRAVAME',
  },
} as const satisfies Record<VocabularyName, HeaderVocabulary>;

const VOCABULARY_NAMES: readonly VocabularyName[] = ['csv', 'json'];

const buildReverseMap = (name: VocabularyName): ReadonlyMap<string, CanonicalField> => {
  const vocabulary: HeaderVocabulary = HEADER_VOCABULARIES[name];
  const reverse = new Map<string, CanonicalField>();

  for (const field of CANONICAL_FIELDS) {
    const header = vocabulary[field];
    const existing = reverse.get(header);
    if (existing) {
      throw new Error(
        `Header "${header}" of the ${name} vocabulary maps to both ${existing} and ${field}`,
      );
    }

    reverse.set(header, field);
  }

  return reverse;
};

const REVERSE_VOCABULARIES: Readonly<Record<VocabularyName, ReadonlyMap<string, CanonicalField>>> = {
  csv: buildReverseMap('csv'),
  json: buildReverseMap('json'),
};

export const expectedHeaders = (name: VocabularyName): string[] =>
  CANONICAL_FIELDS.map((field) => HEADER_VOCABULARIES[name][field]);

export const toCanonicalField = (
  name: VocabularyName,
  header: string,
): CanonicalField | undefined => REVERSE_VOCABULARIES[name].get(header);

const countNames = (names: readonly string[]): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  return counts;
};

/** Order-independent, duplicate-sensitive comparison of the column names. */
export const checkSchema = (
  table: Pick<RawTable, 'columns'>,
  expected: readonly string[],
): boolean => {
  if (table.columns.length !== expected.length) {
    return false;
  }

  const actualCounts = countNames(table.columns);
  const expectedCounts = countNames(expected);

  if (actualCounts.size !== expectedCounts.size) {
    return false;
  }

  for (const [name, count] of expectedCounts) {
    if (actualCounts.get(name) !== count) {
      return false;
    }
  }

  return true;
};

export const detectVocabulary = (table: Pick<RawTable, 'columns'>): VocabularyName | null =>
  VOCABULARY_NAMES.find((name) => checkSchema(table, expectedHeaders(name))) ?? null;

export const renameColumns = (table: Table, vocabulary: VocabularyName): Table => {
  const rename = (column: string): string => toCanonicalField(vocabulary, column) ?? column;

  return {
    columns: table.columns.map(rename),
    rows: table.rows.map((row) => {
      const renamed: Row = {};
      for (const [column, value] of Object.entries(row)) {
        renamed[rename(column)] = value;
      }

      return renamed;
    }),
  };
};
