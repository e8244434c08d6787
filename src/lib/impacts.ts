import { UnknownCategoryError, type ErrorContext } from '../errors.js';
import {
  IMPACT_CATEGORY_KEYS,
  LIFE_CYCLE_STAGES,
  type ImpactCategoryKey,
  type ImpactResults,
  type LifeCycleStage
} from '../types/index.js';
import type { RowReader } from './fields.js';

export interface ImpactContribution {
  category: ImpactCategoryKey;
  stage: LifeCycleStage;
  value: number | null;
}

/** Adds `value` to the (category, stage) cell, creating it on first contribution. */
export function accumulate(
  aggregate: ImpactResults,
  category: ImpactCategoryKey,
  stage: LifeCycleStage,
  value: number | null
): void {
  if (value === null) return;
  const stages = aggregate[category] ?? {};
  const current = stages[stage];
  stages[stage] = current === undefined ? value : current + value;
  aggregate[category] = stages;
}

export function accumulateAll(aggregate: ImpactResults, contributions: readonly ImpactContribution[]): ImpactResults {
  for (const { category, stage, value } of contributions) {
    accumulate(aggregate, category, stage, value);
  }
  return aggregate;
}

export function isImpactCategory(value: string): value is ImpactCategoryKey {
  return IMPACT_CATEGORY_KEYS.some((candidate) => candidate === value);
}

export function isLifeCycleStage(value: string): value is LifeCycleStage {
  return LIFE_CYCLE_STAGES.some((candidate) => candidate === value);
}

/** Maps source stage labels such as `A1-3`, `A1-A3` or `c4` to canonical stages. */
export function parseLifeCycleStage(raw: string, context: ErrorContext = {}): LifeCycleStage {
  const compact = raw.trim().toLowerCase().replace(/\s+/g, '');
  const normalized = compact === 'a1-3' || compact === 'a1-a3' ? 'a1a3' : compact;
  if (isLifeCycleStage(normalized)) return normalized;
  throw new UnknownCategoryError('life_cycle_stage', raw, context);
}

export interface ResultCell {
  key: string;
  category: ImpactCategoryKey;
  stage: LifeCycleStage;
}

/**
 * Splits `<prefix>.<category>.<stage>` keys declared in the mapping. Keys whose
 * category or stage segment is not canonical are skipped.
 */
export function resultCells(row: RowReader, prefix: string): ResultCell[] {
  const depth = prefix.split('.').length;
  const cells: ResultCell[] = [];
  for (const key of row.table.keys(prefix)) {
    const segments = key.split('.');
    const category = segments[depth];
    const stage = segments[depth + 1];
    if (segments.length !== depth + 2 || !isImpactCategory(category) || !isLifeCycleStage(stage)) continue;
    cells.push({ key, category, stage });
  }
  return cells;
}

export interface ReadResultsOptions {
  scale?: number;
}

/**
 * Reads pre-aggregated totals. Each cell is written once per call (no summing
 * across rows); multi-column cells add their columns with absent as zero.
 */
export function readResults(row: RowReader, prefix: string, options: ReadResultsOptions = {}): ImpactResults | null {
  const scale = options.scale ?? 1;
  const results: ImpactResults = {};
  let populated = false;
  for (const { key, category, stage } of resultCells(row, prefix)) {
    const value = row.sum(key);
    if (value === null) continue;
    const stages = results[category] ?? {};
    stages[stage] = value * scale;
    results[category] = stages;
    populated = true;
  }
  return populated ? results : null;
}

/** Contributions of one row for every `<prefix>.<category>.<stage>` key. */
export function readContributions(row: RowReader, prefix: string): ImpactContribution[] {
  return resultCells(row, prefix).map(({ key, category, stage }) => ({ category, stage, value: row.sum(key) }));
}

export function categoriesOf(results: ImpactResults | null): ImpactCategoryKey[] {
  if (!results) return [];
  return Object.keys(results).filter(isImpactCategory);
}

export function stagesOf(results: ImpactResults | null, category: ImpactCategoryKey = 'gwp'): LifeCycleStage[] {
  const stages = results?.[category];
  if (!stages) return [];
  return Object.keys(stages).filter(isLifeCycleStage);
}
