import {
  BUILDING_TYPE,
  BUILDING_TYPOLOGY,
  GENERAL_ENERGY_CLASS,
  ROOF_TYPE,
  classify
} from '../lib/categories.js';
import type { RowReader } from '../lib/fields.js';
import { deriveId, recordContentKey } from '../lib/identity.js';
import { readResults, stagesOf } from '../lib/impacts.js';
import { FORMAT_VERSION, type ProjectEntity } from '../types/index.js';
import { area, buildingInfo, displayName, locationFromRow, softwareInfo, sourceMeta, valueUnit } from './common.js';
import type { DatasetProfile } from './profile.js';

// Results are reported per m² and year over the reference period.
const RESULT_SCALE = 50;

const REQUIRED_KEYS = [
  'name',
  'reference_study_period',
  'location.country',
  'location.city',
  'software_info.lca_software',
  'software_info.goal_and_scope_definition',
  'project_info.building_type',
  'project_info.building_typology',
  'project_info.general_energy_class',
  'project_info.roof_type',
  'project_info.gross_floor_area.value',
  'project_info.gross_floor_area.definition',
  'project_info.building_footprint.value',
  'project_info.building_completion_year',
  'project_info.building_users',
  'project_info.floors_above_ground',
  'project_info.floors_below_ground',
  'project_info.frame_type',
  'meta_data.assessment.year'
] as const;

function buildProject(row: RowReader, id: string): ProjectEntity {
  const results = readResults(row, 'results', { scale: RESULT_SCALE });
  const footprint = row.number('project_info.building_footprint.value');

  return {
    id,
    name: displayName(row.text('name')),
    description: '',
    comment: null,
    location: locationFromRow(row, 'location.country', 'location.city'),
    owner: null,
    formatVersion: FORMAT_VERSION,
    classificationSystem: null,
    referenceStudyPeriod: row.integer('reference_study_period'),
    lifeCycleStages: stagesOf(results),
    impactCategories: results ? ['gwp'] : [],
    results,
    projectInfo: buildingInfo({
      buildingType: classify(row, BUILDING_TYPE, 'project_info.building_type'),
      buildingTypology: [classify(row, BUILDING_TYPOLOGY, 'project_info.building_typology')],
      grossFloorArea: area(
        row.number('project_info.gross_floor_area.value'),
        row.text('project_info.gross_floor_area.definition') ?? ''
      ),
      buildingFootprint: footprint ? valueUnit(footprint, 'm2') : null,
      buildingCompletionYear: row.optionalYear('project_info.building_completion_year'),
      buildingUsers: row.integer('project_info.building_users'),
      floorsAboveGround: row.integer('project_info.floors_above_ground') ?? 0,
      floorsBelowGround: row.integer('project_info.floors_below_ground') || null,
      frameType: row.text('project_info.frame_type'),
      generalEnergyClass: classify(row, GENERAL_ENERGY_CLASS, 'project_info.general_energy_class'),
      roofType: classify(row, ROOF_TYPE, 'project_info.roof_type')
    }),
    projectPhase: 'other',
    softwareInfo: softwareInfo(
      row.text('software_info.lca_software'),
      row.text('software_info.goal_and_scope_definition')
    ),
    metaData: {
      assessment: { year: row.optionalYear('meta_data.assessment.year') },
      source: sourceMeta('CarbEnMats')
    },
    assemblies: new Map()
  };
}

export const carbenmatsProfile: DatasetProfile = {
  name: 'carbenmats',
  label: 'CarbEnMats',
  input: { pattern: 'carbenmats*.csv', delimiter: ';' },
  absentTokens: ['no data'],
  requiredKeys: REQUIRED_KEYS,
  projectId: (row) => deriveId(recordContentKey(row.record)),
  buildProject
};
