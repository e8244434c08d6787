import { join } from 'node:path';
import { ConfigurationError } from '../errors.js';
import { readJson } from '../utils/fs.js';

/**
 * A mapping value is one source column, an ordered list of columns (or of
 * synonyms for `<family>.<variant>` keys), or `null`/`""` for a key the
 * dataset declares but does not provide.
 */
export type MappingEntry = string | string[] | null;
export type MappingDocument = Record<string, MappingEntry>;

export interface MappingVariant {
  variant: string;
  synonyms: string[];
  /** Single-string synonyms match by substring, lists by exact membership. */
  substring: boolean;
}

function isMappingEntry(value: unknown): value is MappingEntry {
  if (value === null || typeof value === 'string') return true;
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function isDeclaredEmpty(entry: MappingEntry): boolean {
  if (entry === null) return true;
  if (typeof entry === 'string') return entry.trim() === '';
  return entry.length === 0;
}

export class MappingTable {
  private readonly entries: Map<string, MappingEntry>;

  constructor(readonly dataset: string, document: MappingDocument) {
    this.entries = new Map(Object.entries(document));
  }

  static fromUnknown(dataset: string, document: unknown): MappingTable {
    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
      throw new ConfigurationError('Mapping document must be a JSON object', { dataset });
    }
    const entries: MappingDocument = {};
    for (const [key, value] of Object.entries(document)) {
      if (!isMappingEntry(value)) {
        throw new ConfigurationError('Mapping entries must be a column name, a list of strings or null', {
          dataset,
          key
        });
      }
      entries[key] = value;
    }
    return new MappingTable(dataset, entries);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  entry(key: string): MappingEntry {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      throw new ConfigurationError('Logical key has no mapping entry', { dataset: this.dataset, key });
    }
    return entry;
  }

  /** Single source column for `key`, `null` when declared but not provided. */
  column(key: string): string | null {
    const entry = this.entry(key);
    if (isDeclaredEmpty(entry)) return null;
    if (Array.isArray(entry)) {
      throw new ConfigurationError('Logical key maps to several columns where one was expected', {
        dataset: this.dataset,
        key,
        value: entry
      });
    }
    return entry;
  }

  /** Ordered source columns for `key`; a single-column entry yields one element. */
  columns(key: string): string[] {
    const entry = this.entry(key);
    if (entry === null) return [];
    if (typeof entry === 'string') return entry.trim() ? [entry] : [];
    return [...entry];
  }

  /** Declared, non-empty keys under `prefix` in table order. */
  keys(prefix: string): string[] {
    const normalizedPrefix = prefix.endsWith('.') ? prefix : `${prefix}.`;
    const result: string[] = [];
    for (const [key, entry] of this.entries) {
      if (key.startsWith(normalizedPrefix) && !isDeclaredEmpty(entry)) {
        result.push(key);
      }
    }
    return result;
  }

  variants(family: string): MappingVariant[] {
    return this.keys(family).map((key) => {
      const entry = this.entry(key);
      const substring = typeof entry === 'string';
      const synonyms = (typeof entry === 'string' ? [entry] : entry ?? []).map((synonym) =>
        synonym.trim().toLowerCase()
      );
      return { variant: key.slice(family.length + 1), synonyms, substring };
    });
  }

  /** Fails fast when any of `keys` is missing, listing every missing key at once. */
  require(keys: readonly string[]): void {
    const missing = keys.filter((key) => !this.entries.has(key));
    if (missing.length) {
      throw new ConfigurationError(`Mapping is missing ${missing.length} required key(s)`, {
        dataset: this.dataset,
        missing
      });
    }
  }
}

const defaultMappingDir = join(process.cwd(), 'mappings');

const tableCache = new Map<string, MappingTable>();

export async function loadMappingTable(
  dataset: string,
  mappingDir: string = defaultMappingDir
): Promise<MappingTable> {
  const file = join(mappingDir, `${dataset}.json`);
  const cached = tableCache.get(file);
  if (cached) return cached;

  let document: unknown;
  try {
    document = await readJson<unknown>(file);
  } catch (error) {
    throw new ConfigurationError('Unable to read mapping file', {
      dataset,
      file,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
  const table = MappingTable.fromUnknown(dataset, document);
  tableCache.set(file, table);
  return table;
}
