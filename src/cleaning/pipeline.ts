import { performance } from 'perf_hooks';

import { classifyAndNormalize, deriveEngineType } from './classifier';
import { detectVocabulary, expectedHeaders, renameColumns } from './columns';
import { coerceNullableInt, coerceWeight, deriveAge, reformatDates } from './coercers';
import { SchemaMismatchError } from './errors';
import { cleanAircraftRecordSchema, type CleanAircraftRecord } from './record';
import { assertColumns } from './table';
import { enrichTaxIds, markOwnedOperated } from './taxIdEnrichment';
import type { Cell, CleaningStats, PipelineOptions, RawTable, Table } from './types';

export type CleanTable = Table<CleanAircraftRecord>;

export const DATE_COLUMNS = ['exp_date_ca', 'exp_date_iam'] as const;
export const INTEGER_COLUMNS = ['year_mfg', 'min_crew_size', 'max_passengers', 'seats'] as const;
export const WEIGHT_COLUMNS = ['max_takeoff_wgt'] as const;

type Stage = {
  name: string;
  run: (table: Table, options: PipelineOptions) => Table;
};

export const dropDuplicateTailNumbers = (table: Table): Table => {
  assertColumns(table, ['tail_number']);

  const seen = new Set<Cell>();
  const rows = table.rows.filter((row) => {
    const tailNumber = row['tail_number'];
    if (seen.has(tailNumber)) {
      return false;
    }

    seen.add(tailNumber);
    return true;
  });

  return { columns: [...table.columns], rows };
};

// Later stages read fields written by earlier ones; the order is fixed.
export const PIPELINE_STAGES: readonly Stage[] = [
  { name: 'dedupe', run: dropDuplicateTailNumbers },
  { name: 'dates', run: (table) => reformatDates(table, DATE_COLUMNS) },
  { name: 'integers', run: (table) => coerceNullableInt(table, INTEGER_COLUMNS) },
  { name: 'weights', run: (table) => coerceWeight(table, WEIGHT_COLUMNS) },
  { name: 'age', run: (table, options) => deriveAge(table, options.referenceYear) },
  { name: 'taxIds', run: enrichTaxIds },
  { name: 'ownedOperated', run: markOwnedOperated },
  { name: 'classification', run: (table) => classifyAndNormalize(table) },
  { name: 'engineType', run: deriveEngineType },
];

/**
 * Cleans a raw RAB export. Throws SchemaMismatchError before any stage runs
 * when the columns match neither the CSV nor the JSON header vocabulary.
 */
export const runPipeline = (
  rawTable: RawTable,
  options: PipelineOptions = {},
): CleanTable => {
  const vocabulary = detectVocabulary(rawTable);
  if (!vocabulary) {
    throw new SchemaMismatchError(
      { csv: expectedHeaders('csv'), json: expectedHeaders('json') },
      rawTable.columns,
    );
  }

  let table = renameColumns(rawTable, vocabulary);

  for (const stage of PIPELINE_STAGES) {
    const startedAt = performance.now();
    table = stage.run(table, options);
    options.onStage?.({
      stage: stage.name,
      durationMs: performance.now() - startedAt,
      rows: table.rows.length,
    });
  }

  return {
    columns: table.columns,
    rows: table.rows.map((row) => cleanAircraftRecordSchema.parse(row)),
  };
};

export const summarizeCleanTable = (
  records: readonly CleanAircraftRecord[],
  rawRows: number,
): CleaningStats => ({
  rawRows,
  aircraft: records.length,
  duplicatesDropped: rawRows - records.length,
  agricultural: records.filter((record) => record.agaircraft).length,
  ownedOperated: records.filter((record) => record.owned_operated).length,
  invalidOwnerTaxIds: records.filter((record) => record.owner_tax_id_type === 'INVALID').length,
  invalidOperatorTaxIds: records.filter((record) => record.operator_tax_id_type === 'INVALID')
    .length,
});
