import type {
  AssemblyEntity,
  AssemblyRecord,
  ProductEntity,
  ProductRecord,
  ProjectEntity,
  ProjectRecord
} from './types/index.js';

function assembleProduct(product: ProductEntity): ProductRecord {
  const { impactData, ...fields } = structuredClone(product);
  return {
    type: 'actual',
    ...fields,
    transport: null,
    impactData: { type: 'actual', ...impactData }
  };
}

function assembleAssembly(assembly: AssemblyEntity): AssemblyRecord {
  const { products: productMap, ...fields } = assembly;
  const products: Record<string, ProductRecord> = {};
  for (const [id, product] of productMap) {
    products[id] = assembleProduct(product);
  }
  return { type: 'actual', ...structuredClone(fields), products };
}

/**
 * Flattens the in-memory graph to the serializable project record. Assemblies
 * and products keep the order in which they were first created; every nested
 * value is copied, so the record shares nothing with the merge state.
 */
export function assembleProject(project: ProjectEntity): ProjectRecord {
  const { assemblies: assemblyMap, ...fields } = project;
  const assemblies: Record<string, AssemblyRecord> = {};
  for (const [id, assembly] of assemblyMap) {
    assemblies[id] = assembleAssembly(assembly);
  }
  return { ...structuredClone(fields), assemblies };
}

export function assembleProjects(projects: Iterable<ProjectEntity>): ProjectRecord[] {
  return [...projects].map(assembleProject);
}
