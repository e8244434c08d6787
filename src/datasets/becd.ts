import { MalformedValueError } from '../errors.js';
import { BUILDING_TYPE, classify } from '../lib/categories.js';
import type { RowReader } from '../lib/fields.js';
import { deriveId } from '../lib/identity.js';
import { categoriesOf, readContributions, readResults, stagesOf } from '../lib/impacts.js';
import { FORMAT_VERSION, type ProjectEntity } from '../types/index.js';
import {
  area,
  buildingInfo,
  displayName,
  locationFromRow,
  softwareInfo,
  sourceMeta,
  techFlow,
  valueUnit
} from './common.js';
import type { DatasetProfile } from './profile.js';

const ID_PREFIX = 'BECD-';

// ASSUMPTION: BECD exports one row per building element, grouped by project id.
const REQUIRED_KEYS = [
  'id',
  'name',
  'description',
  'reference_study_period',
  'emissions_included',
  'location.city',
  'location.country',
  'software_info.lca_software',
  'software_info.goal_and_scope_definition',
  'project_info.building_type',
  'project_info.building_completion_year',
  'project_info.building_height.value',
  'project_info.building_footprint.value',
  'project_info.gross_floor_area.value',
  'project_info.floors_above_ground',
  'project_info.floors_below_ground',
  'meta_data.construction_start',
  'meta_data.construction_year_existing_building',
  'meta_data.assessment.year',
  'meta_data.assessment.date',
  'meta_data.assessment.en15978_compliance',
  'meta_data.assessment.rics_2017_compliance',
  'meta_data.assessment.verified',
  'meta_data.assessment.verified_info',
  'meta_data.assessment.assessor.name',
  'meta_data.assessment.assessor.email',
  'meta_data.assessment.assessor.organization',
  'meta_data.assessment.quantity_source',
  'meta_data.cost.total_cost',
  'meta_data.demolished_area.value',
  'meta_data.newly_built_area.value',
  'meta_data.retrofitted_area.value',
  'meta_data.project_site_area.value',
  'meta_data.thermal_envelope_area.value',
  'meta_data.structural.column_grid_long.value',
  'meta_data.structural.foundation_type',
  'meta_data.structural.vertical_gravity_system',
  'meta_data.structural.secondary_vertical_gravity_system',
  'meta_data.structural.horizontal_gravity_system',
  'meta_data.structural.secondary_horizontal_gravity_system',
  'assemblies.id',
  'assemblies.name',
  'assemblies.products.id',
  'assemblies.products.name',
  'assemblies.products.impact_data.id',
  'assemblies.products.reference_service_life'
] as const;

function optionalArea(row: RowReader, key: string) {
  return valueUnit(row.number(key), 'm2');
}

function buildMetaData(row: RowReader): Record<string, unknown> {
  const totalCost = row.number('meta_data.cost.total_cost');
  return {
    source: sourceMeta('BECD'),
    construction_start: row.text('meta_data.construction_start'),
    construction_year_existing_building: row.year('meta_data.construction_year_existing_building'),
    assessment: {
      year: row.year('meta_data.assessment.year'),
      date: row.text('meta_data.assessment.date'),
      en15978_compliance: row.flag('meta_data.assessment.en15978_compliance', 'Fully compliant'),
      rics_2017_compliance: row.flag(
        'meta_data.assessment.rics_2017_compliance',
        'Fully compliant with 2017 version'
      ),
      verified: row.flag('meta_data.assessment.verified', 'Yes'),
      verified_info: row.text('meta_data.assessment.verified_info'),
      assessor: {
        name: row.text('meta_data.assessment.assessor.name'),
        email: row.text('meta_data.assessment.assessor.email'),
        organization: row.text('meta_data.assessment.assessor.organization')
      },
      quantity_source: row.text('meta_data.assessment.quantity_source')
    },
    cost: totalCost === null ? null : { total_cost: totalCost, currency: 'gbp' },
    demolished_area: optionalArea(row, 'meta_data.demolished_area.value'),
    newly_built_area: optionalArea(row, 'meta_data.newly_built_area.value'),
    retrofitted_area: optionalArea(row, 'meta_data.retrofitted_area.value'),
    project_site_area: optionalArea(row, 'meta_data.project_site_area.value'),
    thermal_envelope_area: { value: row.sum('meta_data.thermal_envelope_area.value') ?? 0, unit: 'm2' },
    structural: {
      column_grid_long: valueUnit(row.number('meta_data.structural.column_grid_long.value'), 'm'),
      foundation_type: row.text('meta_data.structural.foundation_type'),
      vertical_gravity_system: row.text('meta_data.structural.vertical_gravity_system'),
      secondary_vertical_gravity_system: row.text('meta_data.structural.secondary_vertical_gravity_system'),
      horizontal_gravity_system: row.text('meta_data.structural.horizontal_gravity_system'),
      secondary_horizontal_gravity_system: row.text('meta_data.structural.secondary_horizontal_gravity_system')
    }
  };
}

function buildProject(row: RowReader, id: string): ProjectEntity {
  const results = readResults(row, 'results');
  return {
    id,
    name: displayName(row.text('name')),
    description: row.text('description') ?? '',
    comment: null,
    location: locationFromRow(row, 'location.country', 'location.city'),
    owner: null,
    formatVersion: FORMAT_VERSION,
    classificationSystem: null,
    referenceStudyPeriod: row.integer('reference_study_period'),
    lifeCycleStages: stagesOf(results),
    impactCategories: categoriesOf(results),
    results,
    projectInfo: buildingInfo({
      buildingType: classify(row, BUILDING_TYPE, 'project_info.building_type'),
      buildingTypology: ['unknown'],
      grossFloorArea: area(row.number('project_info.gross_floor_area.value'), 'GIA'),
      buildingCompletionYear: row.year('project_info.building_completion_year'),
      buildingHeight: valueUnit(row.number('project_info.building_height.value'), 'm'),
      buildingFootprint: valueUnit(row.number('project_info.building_footprint.value'), 'm2'),
      floorsAboveGround: row.integer('project_info.floors_above_ground') ?? 0,
      floorsBelowGround: row.integer('project_info.floors_below_ground')
    }),
    projectPhase: 'other',
    softwareInfo: softwareInfo(
      row.text('software_info.lca_software'),
      row.text('software_info.goal_and_scope_definition')
    ),
    metaData: buildMetaData(row),
    assemblies: new Map()
  };
}

export const becdProfile: DatasetProfile = {
  name: 'becd',
  label: 'BECD',
  input: { pattern: 'becd*.csv', delimiter: ',' },
  absentTokens: ['no data'],
  requiredKeys: REQUIRED_KEYS,
  projectId(row) {
    const raw = row.text('id');
    if (raw === null) {
      throw new MalformedValueError('a project id', row.raw('id') ?? '', row.context('id'));
    }
    return raw.replace(ID_PREFIX, '');
  },
  buildProject,
  isExcluded(row) {
    return row.text('emissions_included')?.toLowerCase() === 'no';
  },
  assembly: {
    contentKey: (row) => row.text('assemblies.id') ?? '',
    build(row, id) {
      return {
        id,
        name: displayName(row.text('assemblies.name')),
        description: '',
        comment: null,
        classification: null,
        quantity: 1,
        unit: 'kg',
        results: readResults(row, 'assemblies.results'),
        metaData: null,
        products: new Map()
      };
    },
    refresh: (row) => ({ results: readResults(row, 'assemblies.results') })
  },
  product: {
    contentKey: (row) => row.text('assemblies.products.id') ?? '',
    build(row, id) {
      const flowName = row.text('assemblies.products.impact_data.id') ?? '';
      return {
        id,
        name: displayName(row.text('assemblies.products.name')),
        description: '',
        referenceServiceLife: row.integer('assemblies.products.reference_service_life'),
        quantity: 1,
        unit: 'kg',
        results: null,
        impactData: techFlow(deriveId(flowName), flowName),
        metaData: null
      };
    },
    contributions: (row) => readContributions(row, 'assemblies.results')
  }
};
