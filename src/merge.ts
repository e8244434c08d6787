import type { AssemblyPatch, DatasetProfile } from './datasets/profile.js';
import { RowReader } from './lib/fields.js';
import { deriveId } from './lib/identity.js';
import { accumulateAll, type ImpactContribution } from './lib/impacts.js';
import type { MappingTable } from './lib/mapping.js';
import type { AssemblyEntity, ProductEntity, ProjectEntity, RawRecord } from './types/index.js';
import { log } from './utils/log.js';

export interface MergeStats {
  rows: number;
  excludedRows: number;
  projects: number;
  assemblies: number;
  products: number;
  mergedRows: number;
}

interface AssemblyStep {
  id: string;
  created?: AssemblyEntity;
  patch?: AssemblyPatch;
}

interface ProductStep {
  id: string;
  created?: ProductEntity;
  contributions: ImpactContribution[];
}

interface RowPlan {
  key: string;
  project: ProjectEntity;
  isNewProject: boolean;
  excluded: boolean;
  assembly?: AssemblyStep;
  product?: ProductStep;
}

/**
 * Folds rows into Project → Assembly → Product. Each entity is created on the
 * first row that derives its identifier; later rows only refresh assembly
 * totals and accumulate product impacts. A row is fully resolved before any
 * state changes, so a failing row leaves the merge state untouched.
 */
export class EntityMerger {
  private readonly entities = new Map<string, ProjectEntity>();
  private readonly counters: MergeStats = {
    rows: 0,
    excludedRows: 0,
    projects: 0,
    assemblies: 0,
    products: 0,
    mergedRows: 0
  };
  private lastProjectId?: string;

  constructor(
    private readonly profile: DatasetProfile,
    private readonly table: MappingTable
  ) {
    table.require(profile.requiredKeys);
  }

  add(record: RawRecord, index: number = this.counters.rows): void {
    const row = new RowReader(this.table, record, index, this.profile.absentTokens);
    const plan = this.plan(row);
    this.commit(plan);
  }

  addAll(records: Iterable<RawRecord>): this {
    let index = 0;
    for (const record of records) {
      this.add(record, index++);
    }
    return this;
  }

  projects(): ProjectEntity[] {
    return [...this.entities.values()];
  }

  stats(): MergeStats {
    return { ...this.counters };
  }

  private plan(row: RowReader): RowPlan {
    const projectId = this.profile.projectId(row);
    const existing = this.entities.get(projectId);
    const project = existing ?? this.profile.buildProject(row, projectId);
    const plan: RowPlan = { key: projectId, project, isNewProject: !existing, excluded: false };

    if (this.profile.isExcluded?.(row)) {
      plan.excluded = true;
      log.debug('Row excluded from assembly content', { dataset: this.profile.name, rowIndex: row.index, projectId });
      return plan;
    }

    const assemblyPolicy = this.profile.assembly;
    if (!assemblyPolicy) return plan;

    const assemblyId = deriveId(assemblyPolicy.contentKey(row));
    const knownAssembly = project.assemblies.get(assemblyId);
    plan.assembly = knownAssembly
      ? { id: assemblyId, patch: assemblyPolicy.refresh?.(row) }
      : { id: assemblyId, created: assemblyPolicy.build(row, assemblyId) };

    const productPolicy = this.profile.product;
    if (!productPolicy) return plan;

    const productId = deriveId(productPolicy.contentKey(row));
    const knownProduct = knownAssembly?.products.get(productId);
    plan.product = {
      id: productId,
      created: knownProduct ? undefined : productPolicy.build(row, productId),
      contributions: productPolicy.contributions(row)
    };
    return plan;
  }

  private commit(plan: RowPlan): void {
    const { key, project } = plan;
    this.counters.rows++;

    if (plan.isNewProject) {
      this.entities.set(key, project);
      this.counters.projects++;
    } else if (this.lastProjectId !== key) {
      log.warn('Rows for project are not contiguous; merging into the existing project', {
        dataset: this.profile.name,
        projectId: key
      });
    }
    this.lastProjectId = key;

    if (plan.excluded) this.counters.excludedRows++;

    const step = plan.assembly;
    if (!step) return;

    let assembly = project.assemblies.get(step.id);
    if (!assembly) {
      assembly = step.created;
      if (!assembly) return;
      project.assemblies.set(step.id, assembly);
      this.counters.assemblies++;
    } else if (step.patch) {
      Object.assign(assembly, step.patch);
    }

    const productStep = plan.product;
    if (!productStep) return;

    const existing = assembly.products.get(productStep.id);
    if (existing) {
      accumulateAll(existing.impactData.impacts, productStep.contributions);
      this.counters.mergedRows++;
      return;
    }
    if (!productStep.created) return;
    accumulateAll(productStep.created.impactData.impacts, productStep.contributions);
    assembly.products.set(productStep.id, productStep.created);
    this.counters.products++;
  }
}
