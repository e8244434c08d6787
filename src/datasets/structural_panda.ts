import { BUILDING_TYPE, BUILDING_TYPOLOGY, classify, classifyMany } from '../lib/categories.js';
import type { RowReader } from '../lib/fields.js';
import { deriveId, recordContentKey } from '../lib/identity.js';
import { categoriesOf, readResults, stagesOf } from '../lib/impacts.js';
import { FORMAT_VERSION, type ProjectEntity } from '../types/index.js';
import { area, buildingInfo, location, softwareInfo, sourceMeta } from './common.js';
import type { DatasetProfile } from './profile.js';

const REQUIRED_KEYS = [
  'project_info.gross_floor_area.value',
  'project_info.building_type',
  'project_info.building_typology',
  'project_info.floors_above_ground',
  'project_info.frame_type',
  'meta_data.assessment.year',
  'software_info.used_panda'
] as const;

function buildProject(row: RowReader, id: string): ProjectEntity {
  const results = readResults(row, 'results');
  return {
    id,
    name: 'Undefined',
    description: '',
    comment: null,
    location: location('gbr'),
    owner: null,
    formatVersion: FORMAT_VERSION,
    classificationSystem: null,
    referenceStudyPeriod: null,
    lifeCycleStages: stagesOf(results),
    impactCategories: categoriesOf(results),
    results,
    projectInfo: buildingInfo({
      buildingType: classify(row, BUILDING_TYPE, 'project_info.building_type'),
      buildingTypology: classifyMany(row, BUILDING_TYPOLOGY, 'project_info.building_typology'),
      grossFloorArea: area(row.number('project_info.gross_floor_area.value'), 'GIFA'),
      floorsAboveGround: row.integer('project_info.floors_above_ground') ?? 0,
      frameType: row.text('project_info.frame_type'),
      roofType: 'other'
    }),
    projectPhase: 'other',
    softwareInfo: softwareInfo(row.flag('software_info.used_panda', 'Yes') ? 'Structural Panda' : ''),
    metaData: {
      assessment: { year: row.optionalYear('meta_data.assessment.year') },
      source: sourceMeta('StructuralPanda')
    },
    assemblies: new Map()
  };
}

export const structuralPandaProfile: DatasetProfile = {
  name: 'structural_panda',
  label: 'Structural Panda',
  input: { pattern: 'structural_panda*.csv', delimiter: ',' },
  absentTokens: [],
  requiredKeys: REQUIRED_KEYS,
  projectId: (row) => deriveId(recordContentKey(row.record)),
  buildProject
};
