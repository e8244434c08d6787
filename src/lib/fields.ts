import { ConfigurationError, MalformedValueError, type ErrorContext } from '../errors.js';
import type { RawRecord, RawValue } from '../types/index.js';
import { contentKey } from './identity.js';
import type { MappingTable } from './mapping.js';

const NUMBER_PATTERN = /^[-+]?(\d+([.,]\d*)?|[.,]\d+)([eE][-+]?\d+)?$/;
const DATE_TIME_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+\d{1,2}:\d{2}(?::\d{2})?)?$/;
const YEAR_PATTERN = /^\d{4}$/;

/**
 * Normalizes a raw cell: trims strings and maps empty cells and placeholder
 * tokens (compared case-insensitively) to `null`.
 */
export function normalizeCell(value: RawValue, absentTokens: ReadonlySet<string>): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (absentTokens.has(trimmed.toLowerCase())) return null;
  return trimmed;
}

export function parseNumber(text: string): number | undefined {
  const compact = text.replace(/\s+/g, '');
  if (!NUMBER_PATTERN.test(compact)) return undefined;
  const parsed = Number(compact.replace(',', '.'));
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseYear(text: string): number | undefined {
  if (YEAR_PATTERN.test(text)) return Number(text);
  const match = DATE_TIME_PATTERN.exec(text);
  if (!match) return undefined;
  const [, day, month, year] = match;
  if (Number(day) < 1 || Number(day) > 31 || Number(month) < 1 || Number(month) > 12) return undefined;
  return Number(year);
}

/**
 * Resolves logical keys against one record. Every failure carries the dataset,
 * row index, logical key and raw value.
 */
export class RowReader {
  private readonly absentTokens: ReadonlySet<string>;

  constructor(
    readonly table: MappingTable,
    readonly record: RawRecord,
    readonly index: number,
    absentTokens: Iterable<string> = []
  ) {
    this.absentTokens = new Set([...absentTokens].map((token) => token.trim().toLowerCase()));
  }

  get dataset(): string {
    return this.table.dataset;
  }

  context(key?: string, extra: ErrorContext = {}): ErrorContext {
    return { dataset: this.dataset, rowIndex: this.index, key, ...extra };
  }

  private cell(column: string, key: string): RawValue {
    if (!Object.prototype.hasOwnProperty.call(this.record, column)) {
      throw new ConfigurationError('Mapped source column is not present in the record', this.context(key, { column }));
    }
    return this.record[column];
  }

  /** Raw value of a single-column key, `undefined` when the key is declared empty. */
  raw(key: string): RawValue {
    const column = this.table.column(key);
    if (column === null) return undefined;
    return this.cell(column, key);
  }

  text(key: string): string | null {
    return normalizeCell(this.raw(key), this.absentTokens);
  }

  values(key: string): (string | null)[] {
    return this.table.columns(key).map((column) => normalizeCell(this.cell(column, key), this.absentTokens));
  }

  firstText(key: string): string | null {
    for (const value of this.values(key)) {
      if (value !== null) return value;
    }
    return null;
  }

  /** Content key built from the key's present columns, or `null` when none is. */
  concat(key: string): string | null {
    return contentKey(...this.values(key)) || null;
  }

  number(key: string): number | null {
    const text = this.text(key);
    if (text === null) return null;
    return this.toNumber(text, key);
  }

  integer(key: string): number | null {
    const value = this.number(key);
    if (value === null) return null;
    return Math.trunc(value);
  }

  /** Additive semantics: absent columns count as zero, all-absent yields `null`. */
  sum(key: string): number | null {
    let total = 0;
    let seen = false;
    for (const value of this.values(key)) {
      if (value === null) continue;
      total += this.toNumber(value, key);
      seen = true;
    }
    return seen ? total : null;
  }

  year(key: string): number | null {
    const text = this.text(key);
    if (text === null) return null;
    const year = parseYear(text);
    if (year === undefined) {
      throw new MalformedValueError('a year or a dd/mm/yyyy date', text, this.context(key));
    }
    return year;
  }

  /** Lenient year: returns `null` instead of failing on unparsable text. */
  optionalYear(key: string): number | null {
    const text = this.text(key);
    if (text === null) return null;
    return parseYear(text) ?? null;
  }

  flag(key: string, truthy: string): boolean {
    const text = this.text(key);
    return text !== null && text.toLowerCase() === truthy.toLowerCase();
  }

  private toNumber(text: string, key: string): number {
    const parsed = parseNumber(text);
    if (parsed === undefined) {
      throw new MalformedValueError('a number', text, this.context(key));
    }
    return parsed;
  }
}
