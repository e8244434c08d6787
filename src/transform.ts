import { assembleProjects } from './assemble.js';
import type { DatasetProfile } from './datasets/profile.js';
import type { MappingTable } from './lib/mapping.js';
import { EntityMerger, type MergeStats } from './merge.js';
import type { ProjectRecord, RawRecord } from './types/index.js';
import { log } from './utils/log.js';

export interface TransformResult {
  dataset: string;
  projects: ProjectRecord[];
  stats: MergeStats;
}

/**
 * Runs one dataset through the merger. Each call owns its merge state, so
 * datasets never share projects even when identifiers collide.
 */
export function transformDataset(
  profile: DatasetProfile,
  table: MappingTable,
  sources: Iterable<readonly RawRecord[]>
): TransformResult {
  const merger = new EntityMerger(profile, table);
  let index = 0;
  for (const records of sources) {
    for (const record of records) {
      merger.add(record, index++);
    }
  }

  const stats = merger.stats();
  log.info('Transformed dataset', { dataset: profile.name, ...stats });
  return { dataset: profile.name, projects: assembleProjects(merger.projects()), stats };
}
