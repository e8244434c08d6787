import { resolveCountry } from '../lib/categories.js';
import type { RowReader } from '../lib/fields.js';
import {
  FORMAT_VERSION,
  type AreaType,
  type BuildingInfo,
  type Country,
  type Location,
  type SoftwareInfo,
  type TechFlow,
  type Unit,
  type ValueUnit
} from '../types/index.js';

export function location(country: Country, city: string | null = null): Location {
  return { country, city, address: null };
}

export function locationFromRow(row: RowReader, countryKey: string, cityKey: string): Location {
  return location(resolveCountry(row.text(countryKey)), row.text(cityKey));
}

export function valueUnit(value: number | null, unit: Unit): ValueUnit | null {
  return value === null ? null : { value, unit };
}

export function area(value: number | null, definition: string): AreaType {
  return { value: value ?? 0, unit: 'm2', definition };
}

export function softwareInfo(lcaSoftware: string | null, goalAndScopeDefinition: string | null = null): SoftwareInfo {
  return {
    lcaSoftware: lcaSoftware ?? '',
    lcaSoftwareVersion: null,
    goalAndScopeDefinition,
    calculationType: null
  };
}

export function buildingInfo(
  fields: Pick<BuildingInfo, 'buildingType' | 'buildingTypology' | 'grossFloorArea'> & Partial<BuildingInfo>
): BuildingInfo {
  return {
    type: 'buildingInfo',
    buildingFootprint: null,
    buildingHeight: null,
    buildingCompletionYear: null,
    buildingUsers: null,
    floorsAboveGround: 0,
    floorsBelowGround: null,
    frameType: null,
    generalEnergyClass: 'unknown',
    roofType: 'unknown',
    ...fields
  };
}

export function techFlow(id: string, name: string, declaredUnit: Unit = 'kg'): TechFlow {
  return {
    id,
    name,
    declaredUnit,
    formatVersion: FORMAT_VERSION,
    source: null,
    comment: null,
    location: 'unknown',
    conversions: null,
    impacts: {},
    metaData: null
  };
}

export function sourceMeta(name: string, url: string | null = null) {
  return { name, url };
}

/** Display name for free-text name columns; blank and placeholder values become `Undefined`. */
export function displayName(value: string | null): string {
  return value ?? 'Undefined';
}
