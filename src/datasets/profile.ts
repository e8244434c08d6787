import type { RowReader } from '../lib/fields.js';
import type { ImpactContribution } from '../lib/impacts.js';
import type { AssemblyEntity, ProductEntity, ProjectEntity } from '../types/index.js';

export interface InputFormat {
  /** fast-glob pattern, relative to `<dataRoot>/raw`. */
  pattern: string;
  delimiter: ',' | ';';
}

export type AssemblyPatch = Partial<Pick<AssemblyEntity, 'results' | 'quantity' | 'metaData'>>;

export interface AssemblyPolicy {
  /** Stable across rows describing the same assembly. */
  contentKey(row: RowReader): string;
  build(row: RowReader, id: string): AssemblyEntity;
  /** Overwrite-policy fields re-read on every repeat row (pre-aggregated totals). */
  refresh?(row: RowReader): AssemblyPatch;
}

export interface ProductPolicy {
  contentKey(row: RowReader): string;
  /** Builds the product shell; its technical flow starts with empty impacts. */
  build(row: RowReader, id: string): ProductEntity;
  contributions(row: RowReader): ImpactContribution[];
}

/**
 * Everything dataset-specific about a source: where its rows come from, how
 * its mapping is read, and how rows fold into projects. The merge engine is
 * shared by every profile.
 */
export interface DatasetProfile {
  name: string;
  label: string;
  input: InputFormat;
  absentTokens: readonly string[];
  requiredKeys: readonly string[];
  projectId(row: RowReader): string;
  buildProject(row: RowReader, id: string): ProjectEntity;
  isExcluded?(row: RowReader): boolean;
  assembly?: AssemblyPolicy;
  product?: ProductPolicy;
}
