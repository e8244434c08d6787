import { join } from 'node:path';
import { log } from '../utils/log.js';

export interface PipelineConfig {
  dataRoot: string;
  datasets: string[];
  mappingDir: string;
  schemaDir: string;
  /** Projects per output file; 0 writes a single file. */
  chunkSize: number;
  skipValidation: boolean;
}

export const DEFAULT_DATASETS = ['becd', 'carbenmats', 'slice', 'structural_panda'];

function normalizeToken(value: string): string | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  return trimmed.toLowerCase();
}

export function parseList(raw: string | undefined): string[] {
  if (!raw) return [];

  const candidates: string[] = [];
  const trimmed = raw.trim();

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        for (const entry of parsed) {
          if (typeof entry === 'string') {
            candidates.push(entry);
          } else if (entry !== null && entry !== undefined) {
            log.warn('Ignoring non-string list entry from JSON payload', { entry });
          }
        }
      }
    } catch (error) {
      log.warn('Failed to parse list as JSON array, falling back to CSV parsing', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  if (!candidates.length) {
    candidates.push(
      ...trimmed
        .split(/[,\s]+/)
        .map((token) => token.trim())
        .filter(Boolean)
    );
  }

  const normalized = new Set<string>();
  for (const token of candidates) {
    const value = normalizeToken(token);
    if (value) normalized.add(value);
  }
  return [...normalized];
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', {
    value: raw
  });
  return defaultValue;
}

export function parseChunkSize(raw: string | undefined): number {
  if (!raw) return 0;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    log.warn('Ignoring invalid CHUNK_SIZE, writing a single file per dataset', { value: raw });
    return 0;
  }
  return parsed;
}

export function loadPipelineConfig(
  overrides: Partial<PipelineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const datasets = overrides.datasets ?? parseList(env.DATASETS);
  return {
    dataRoot: overrides.dataRoot ?? env.DATA_ROOT ?? './data',
    datasets: datasets.length ? datasets : [...DEFAULT_DATASETS],
    mappingDir: overrides.mappingDir ?? env.MAPPING_DIR ?? join(process.cwd(), 'mappings'),
    schemaDir: overrides.schemaDir ?? env.SCHEMA_DIR ?? join(process.cwd(), 'schemas'),
    chunkSize: overrides.chunkSize ?? parseChunkSize(env.CHUNK_SIZE),
    skipValidation: overrides.skipValidation ?? parseBoolean(env.SKIP_VALIDATION, false)
  };
}
