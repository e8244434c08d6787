import { join, parse } from 'node:path';
import type { ProjectRecord } from './types/index.js';
import { writeJson } from './utils/fs.js';
import { log } from './utils/log.js';

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new Error('chunk size must be greater than zero');
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/** `<dir>/<name>_<index>.json`, index starting at 0. */
export function chunkFileName(file: string, index: number): string {
  const { dir, name } = parse(file);
  return join(dir, `${name}_${index}.json`);
}

export function outputPath(dataRoot: string, dataset: string): string {
  return join(dataRoot, 'normalized', `${dataset}.json`);
}

export async function writeChunks<T>(file: string, items: readonly T[], size: number): Promise<string[]> {
  const written: string[] = [];
  for (const [index, part] of chunk(items, size).entries()) {
    const target = chunkFileName(file, index);
    await writeJson(target, part);
    written.push(target);
  }
  return written;
}

/**
 * Writes a dataset's projects to `<dataRoot>/normalized/<dataset>.json`, or
 * to numbered chunk files of `chunkSize` projects when it is positive.
 */
export async function writeProjects(
  dataRoot: string,
  dataset: string,
  projects: readonly ProjectRecord[],
  chunkSize = 0
): Promise<string[]> {
  const file = outputPath(dataRoot, dataset);
  if (chunkSize > 0) {
    const written = await writeChunks(file, projects, chunkSize);
    log.info('Wrote chunked output', { dataset, files: written.length, projects: projects.length });
    return written;
  }
  await writeJson(file, projects);
  log.info('Wrote output', { dataset, file, projects: projects.length });
  return [file];
}
