import { basename, join } from 'node:path';
import fg from 'fast-glob';
import type { DatasetProfile } from './datasets/profile.js';
import { parseCsv } from './lib/csv.js';
import type { RawRecord } from './types/index.js';
import { pathExists, readText } from './utils/fs.js';
import { log } from './utils/log.js';

export interface ExtractOptions {
  dataRoot: string;
  /** Explicit input files; when empty, files are discovered under `<dataRoot>/raw`. */
  inputs?: string[];
}

export interface SourceFile {
  path: string;
  name: string;
}

export async function discoverInputs(profile: DatasetProfile, opts: ExtractOptions): Promise<SourceFile[]> {
  if (opts.inputs?.length) {
    const missing: string[] = [];
    for (const input of opts.inputs) {
      if (!(await pathExists(input))) missing.push(input);
    }
    if (missing.length) {
      throw new Error(`Missing input files: ${missing.join(', ')}`);
    }
    return opts.inputs.map((path) => ({ path, name: basename(path) }));
  }

  const rawDir = join(opts.dataRoot, 'raw');
  if (!(await pathExists(rawDir))) {
    throw new Error(`Raw data directory missing: ${rawDir}`);
  }

  const discovered = await fg([profile.input.pattern], { cwd: rawDir, caseSensitiveMatch: false, onlyFiles: true });
  discovered.sort();
  if (!discovered.length) {
    log.warn('No input files found for dataset', { dataset: profile.name, rawDir, pattern: profile.input.pattern });
  }
  return discovered.map((file) => ({ path: join(rawDir, file), name: basename(file) }));
}

export async function readRecords(profile: DatasetProfile, file: SourceFile): Promise<RawRecord[]> {
  const content = await readText(file.path);
  const records = parseCsv(content, { delimiter: profile.input.delimiter });
  log.info('Loaded source file', { dataset: profile.name, file: file.path, rows: records.length });
  return records;
}
