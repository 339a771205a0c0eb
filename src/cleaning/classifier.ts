import { assertColumns, mapRows } from './table';
import type { Row, Table } from './types';

export type RuleCombinator = 'all' | 'any';

export type ClassificationRule = {
  name: string;
  normalize: boolean;
  combinator: RuleCombinator;
  predicates: ReadonlyArray<{ field: string; pattern: string }>;
};

export type CompiledRule = Omit<ClassificationRule, 'predicates'> & {
  predicates: ReadonlyArray<{ field: string; pattern: RegExp }>;
};

export const TURBINE_ENGINE_CODE = 'L1T';
export const PISTON_ENGINE_CODE = 'L1P';

/**
 * Agricultural aircraft, in evaluation order. Rules are not exclusive: a row
 * selected by several normalising rules keeps the name of the last one.
 */
export const AGRICULTURAL_AIRCRAFT_RULES: readonly ClassificationRule[] = [
  {
    name: 'AG-CAT',
    normalize: true,
    combinator: 'any',
    predicates: [
      { field: 'mfg', pattern: '(AG){1}[-_\\s]*(CAT){1}' },
      { field: 'model', pattern: 'G{1}[-_\\s]*(164){1}A?' },
    ],
  },
  {
    name: 'THRUSH AIRCRAFT',
    normalize: true,
    combinator: 'any',
    predicates: [
      { field: 'mfg', pattern: '(THRUSH)' },
      { field: 'model', pattern: '(S2R-)' },
    ],
  },
  {
    name: 'CESSNA AIRCRAFT',
    normalize: true,
    combinator: 'all',
    predicates: [
      { field: 'mfg', pattern: '(CESSNA)' },
      { field: 'model', pattern: '(188){1}' },
    ],
  },
  {
    name: 'PIPER AIRCRAFT',
    normalize: false,
    combinator: 'any',
    predicates: [{ field: 'model', pattern: '(PA){1}[-_\\s]*(25){1}' }],
  },
  {
    name: 'EMBRAER',
    normalize: true,
    combinator: 'any',
    predicates: [{ field: 'model', pattern: '(EMB){1}[-_\\s]*(2){1}' }],
  },
  {
    name: 'AIR TRACTOR',
    normalize: true,
    combinator: 'any',
    predicates: [
      { field: 'mfg', pattern: 'AIR TRACTOR' },
      { field: 'model', pattern: '(AT){1}[-_\\s](40|50|60|80){1}' },
    ],
  },
];

export const compileRules = (rules: readonly ClassificationRule[]): CompiledRule[] =>
  rules.map((rule) => ({
    ...rule,
    predicates: rule.predicates.map(({ field, pattern }) => ({
      field,
      pattern: new RegExp(pattern, 'i'),
    })),
  }));

const COMPILED_AGRICULTURAL_RULES = compileRules(AGRICULTURAL_AIRCRAFT_RULES);

const matchesPattern = (row: Row, field: string, pattern: RegExp): boolean => {
  const value = row[field];

  return typeof value === 'string' && pattern.test(value);
};

export const matchesRule = (row: Row, rule: CompiledRule): boolean => {
  const matches = (predicate: CompiledRule['predicates'][number]) =>
    matchesPattern(row, predicate.field, predicate.pattern);

  return rule.combinator === 'all'
    ? rule.predicates.every(matches)
    : rule.predicates.some(matches);
};

const ruleFields = (rules: readonly CompiledRule[]): string[] => [
  ...new Set(rules.flatMap((rule) => rule.predicates.map((predicate) => predicate.field))),
];

/**
 * Applies the rules in order. Each rule sees `mfg` as left by the rules before
 * it; `agaircraft` is true for rows selected by any rule.
 */
export const classifyAndNormalize = (
  table: Table,
  rules: readonly CompiledRule[] = COMPILED_AGRICULTURAL_RULES,
): Table => {
  assertColumns(table, ['mfg', ...ruleFields(rules)]);

  return mapRows(table, ['agaircraft'], (row) => {
    const current: Row = { ...row };
    let selected = false;

    for (const rule of rules) {
      if (!matchesRule(current, rule)) {
        continue;
      }

      selected = true;
      if (rule.normalize) {
        current['mfg'] = rule.name;
      }
    }

    return { mfg: current['mfg'], agaircraft: selected };
  });
};

const RADIAL_AIR_TRACTOR: CompiledRule = compileRules([
  {
    name: 'AIR TRACTOR 401',
    normalize: false,
    combinator: 'all',
    predicates: [
      { field: 'mfg', pattern: 'AIR TRACTOR' },
      { field: 'model', pattern: '(401){1}' },
    ],
  },
])[0];

/**
 * ICAO engine type for agricultural aircraft, from the normalised `mfg`:
 * L1T (single turboprop) for Thrush and every Air Tractor except the radial
 * 401, L1P (single piston) for the other agricultural aircraft.
 */
export const deriveEngineType = (table: Table): Table => {
  assertColumns(table, ['mfg', 'model', 'agaircraft', 'icao_type_desc']);

  return mapRows(table, [], (row): Row => {
    const mfg = row['mfg'];
    const turbine =
      (mfg === 'AIR TRACTOR' && !matchesRule(row, RADIAL_AIR_TRACTOR)) ||
      mfg === 'THRUSH AIRCRAFT';

    if (turbine) {
      return { icao_type_desc: TURBINE_ENGINE_CODE };
    }

    if (row['agaircraft'] === true) {
      return { icao_type_desc: PISTON_ENGINE_CODE };
    }

    return {};
  });
};
