export type RawRecord = Record<string, string | null>;

/**
 * Table as read from an ANAC export. `columns` keeps the header row exactly as
 * received, duplicates included, so the schema check can compare multisets.
 */
export type RawTable = {
  columns: string[];
  rows: RawRecord[];
};

export type Cell = string | number | boolean | null;

export type Row = Record<string, Cell>;

export type Table<R extends Row = Row> = {
  columns: string[];
  rows: R[];
};

export type TaxIdType = 'EMPTY' | 'INVALID' | 'CNPJ' | 'CPF';

export type CustomerType = 'owner' | 'operator';

export type StageReport = {
  stage: string;
  durationMs: number;
  rows: number;
};

export type PipelineOptions = {
  referenceYear?: number;
  onStage?: (report: StageReport) => void;
};

export type CleaningStats = {
  rawRows: number;
  aircraft: number;
  duplicatesDropped: number;
  agricultural: number;
  ownedOperated: number;
  invalidOwnerTaxIds: number;
  invalidOperatorTaxIds: number;
};
