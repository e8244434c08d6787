import {
  BUILDING_TYPE,
  BUILDING_TYPOLOGY,
  GENERAL_ENERGY_CLASS,
  classify,
  classifyOpen
} from '../lib/categories.js';
import type { RowReader } from '../lib/fields.js';
import { deriveId } from '../lib/identity.js';
import { isImpactCategory, parseLifeCycleStage, type ImpactContribution } from '../lib/impacts.js';
import { FORMAT_VERSION, type ImpactCategoryKey, type LifeCycleStage, type ProjectEntity } from '../types/index.js';
import { area, buildingInfo, location, softwareInfo, sourceMeta, techFlow } from './common.js';
import type { DatasetProfile } from './profile.js';

// Regions outside the configured climate zones fall back to the continental reference country.
const DEFAULT_REGION_COUNTRY = 'deu';
const CLASSIFICATION_SYSTEM = 'SfB';
const REFERENCE_SERVICE_LIFE = 50;

const PROJECT_CATEGORIES: ImpactCategoryKey[] = [
  'gwp',
  'gwp_bio',
  'gwp_lul',
  'odp',
  'ap',
  'ep_fw',
  'ep_mar',
  'ep_ter',
  'pocp',
  'wdp',
  'pm',
  'irp',
  'etp_fw',
  'htp_c',
  'htp_nc',
  'sqp'
];

const PROJECT_STAGES: LifeCycleStage[] = ['a1a3', 'a4', 'a5', 'b2', 'b4', 'b5', 'b6', 'c1', 'c2', 'c3', 'c4'];

const REQUIRED_KEYS = [
  'id',
  'location.country',
  'project_info.building_type',
  'project_info.building_typology',
  'project_info.general_energy_class',
  'life_cycle_stage',
  'assemblies.id',
  'assemblies.name',
  'assemblies.classification.code',
  'assemblies.classification.name',
  'assemblies.products.id',
  'assemblies.products.name',
  'assemblies.products.impact_data.id',
  'assemblies.products.impact_data.name'
] as const;

function buildProject(row: RowReader, id: string): ProjectEntity {
  const country = classifyOpen(row, 'stock_region', 'location.country', DEFAULT_REGION_COUNTRY);
  return {
    id,
    name: row.text('id') ?? 'Undefined',
    description: '',
    comment: null,
    location: location(country),
    owner: null,
    formatVersion: FORMAT_VERSION,
    classificationSystem: CLASSIFICATION_SYSTEM,
    referenceStudyPeriod: null,
    lifeCycleStages: [...PROJECT_STAGES],
    impactCategories: [...PROJECT_CATEGORIES],
    results: null,
    projectInfo: buildingInfo({
      buildingType: classify(row, BUILDING_TYPE, 'project_info.building_type'),
      buildingTypology: [classify(row, BUILDING_TYPOLOGY, 'project_info.building_typology')],
      grossFloorArea: area(1, ''),
      floorsAboveGround: 1,
      generalEnergyClass: classify(row, GENERAL_ENERGY_CLASS, 'project_info.general_energy_class')
    }),
    projectPhase: 'other',
    softwareInfo: softwareInfo('SLiCE'),
    metaData: { source: sourceMeta('SLiCE') },
    assemblies: new Map()
  };
}

function contributions(row: RowReader): ImpactContribution[] {
  const stage = parseLifeCycleStage(row.text('life_cycle_stage') ?? '', row.context('life_cycle_stage'));
  const result: ImpactContribution[] = [];
  for (const key of row.table.keys('impact_category_key')) {
    const category = key.slice('impact_category_key.'.length);
    if (!isImpactCategory(category)) continue;
    result.push({ category, stage, value: row.number(key) });
  }
  return result;
}

export const sliceProfile: DatasetProfile = {
  name: 'slice',
  label: 'SLiCE',
  input: { pattern: 'slice*.csv', delimiter: ',' },
  absentTokens: [],
  requiredKeys: REQUIRED_KEYS,
  projectId: (row) => deriveId(row.text('id') ?? ''),
  buildProject,
  assembly: {
    contentKey: (row) => row.text('assemblies.id') ?? '',
    build(row, id) {
      return {
        id,
        name: row.text('assemblies.name') ?? '',
        description: '',
        comment: null,
        classification: [
          {
            system: CLASSIFICATION_SYSTEM,
            code: row.text('assemblies.classification.code') ?? '',
            name: row.text('assemblies.classification.name') ?? ''
          }
        ],
        quantity: 1,
        unit: 'kg',
        results: null,
        metaData: null,
        products: new Map()
      };
    }
  },
  product: {
    contentKey: (row) => row.concat('assemblies.products.id') ?? '',
    build(row, id) {
      return {
        id,
        name: row.firstText('assemblies.products.name') ?? '',
        description: '',
        referenceServiceLife: REFERENCE_SERVICE_LIFE,
        quantity: 1,
        unit: 'kg',
        results: null,
        impactData: techFlow(
          deriveId(row.text('assemblies.products.impact_data.id') ?? ''),
          row.text('assemblies.products.impact_data.name') ?? ''
        ),
        metaData: null
      };
    },
    contributions
  }
};
