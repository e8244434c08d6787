import { BUILDING_TYPE, classify, resolveCountry } from '../src/lib/categories.js';
import { contentKey, deriveId } from '../src/lib/identity.js';
import { readContributions } from '../src/lib/impacts.js';
import { MappingTable } from '../src/lib/mapping.js';
import { area, buildingInfo, location, softwareInfo, sourceMeta, techFlow } from '../src/datasets/common.js';
import type { DatasetProfile } from '../src/datasets/profile.js';
import { MalformedValueError } from '../src/errors.js';
import { FORMAT_VERSION, type RawRecord } from '../src/types/index.js';

export function sampleTable(): MappingTable {
  return new MappingTable('sample', {
    id: 'ProjectId',
    name: 'ProjectName',
    'location.country': 'Country',
    'project_info.building_type': 'Type',
    'building_type.new_construction_works': ['new build', 'new construction'],
    'building_type.retrofit_works': ['retrofit'],
    included: 'Included',
    'assemblies.id': 'Element',
    'assemblies.products.id': 'Material',
    'assemblies.products.impact_data.id': 'Flow',
    'assemblies.results.gwp.a1a3': 'A1A3',
    'assemblies.results.gwp.a4': 'A4'
  });
}

/** Row-per-material profile used to exercise the merge engine without a shipped mapping. */
export const sampleProfile: DatasetProfile = {
  name: 'sample',
  label: 'Sample',
  input: { pattern: 'sample*.csv', delimiter: ',' },
  absentTokens: ['no data'],
  requiredKeys: ['id', 'project_info.building_type'],
  projectId(row) {
    const id = row.text('id');
    if (id === null) throw new MalformedValueError('a project id', row.raw('id'), row.context('id'));
    return id;
  },
  buildProject(row, id) {
    return {
      id,
      name: row.text('name') ?? 'Undefined',
      description: '',
      comment: null,
      location: location(resolveCountry(row.text('location.country'))),
      owner: null,
      formatVersion: FORMAT_VERSION,
      classificationSystem: null,
      referenceStudyPeriod: 60,
      lifeCycleStages: ['a1a3', 'a4'],
      impactCategories: ['gwp'],
      results: null,
      projectInfo: buildingInfo({
        buildingType: classify(row, BUILDING_TYPE, 'project_info.building_type'),
        buildingTypology: ['office'],
        grossFloorArea: area(100, 'gross internal area')
      }),
      projectPhase: 'other',
      softwareInfo: softwareInfo('Sample tool'),
      metaData: { source: sourceMeta('Sample') },
      assemblies: new Map()
    };
  },
  isExcluded: (row) => row.flag('included', 'no'),
  assembly: {
    contentKey: (row) => contentKey(row.text('id'), row.text('assemblies.id')),
    build(row, id) {
      return {
        id,
        name: row.text('assemblies.id') ?? '',
        description: '',
        comment: null,
        classification: null,
        quantity: 1,
        unit: 'm2',
        results: null,
        metaData: null,
        products: new Map()
      };
    }
  },
  product: {
    contentKey: (row) => contentKey(row.text('id'), row.text('assemblies.id'), row.text('assemblies.products.id')),
    build(row, id) {
      return {
        id,
        name: row.text('assemblies.products.id') ?? '',
        description: '',
        referenceServiceLife: null,
        quantity: 1,
        unit: 'kg',
        results: null,
        impactData: techFlow(deriveId(row.text('assemblies.products.impact_data.id') ?? ''), 'flow'),
        metaData: null
      };
    },
    contributions: (row) => readContributions(row, 'assemblies.results')
  }
};

export function sampleRow(overrides: Partial<Record<string, string>> = {}): RawRecord {
  return {
    ProjectId: 'P1',
    ProjectName: 'Tower',
    Country: 'DK',
    Type: 'New build',
    Included: 'Yes',
    Element: 'Wall',
    Material: 'steel',
    Flow: 'flow-1',
    A1A3: '10',
    A4: '',
    ...overrides
  };
}
