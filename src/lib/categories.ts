import { createRequire } from 'node:module';
import countries from 'i18n-iso-countries';
import { ConfigurationError, UnknownCategoryError } from '../errors.js';
import {
  BUILDING_TYPES,
  BUILDING_TYPOLOGIES,
  GENERAL_ENERGY_CLASSES,
  LIFE_CYCLE_STAGES,
  ROOF_TYPES,
  type BuildingType,
  type BuildingTypology,
  type Country,
  type GeneralEnergyClass,
  type LifeCycleStage,
  type RoofType
} from '../types/index.js';
import type { RowReader } from './fields.js';
import type { MappingTable } from './mapping.js';

const require = createRequire(import.meta.url);
countries.registerLocale(require('i18n-iso-countries/langs/en.json'));

export interface CategoryFamily<T extends string> {
  name: string;
  /** Canonical variants; `null` for dataset-defined families with open variant names. */
  variants: readonly T[] | null;
}

export const BUILDING_TYPE: CategoryFamily<BuildingType> = { name: 'building_type', variants: BUILDING_TYPES };
export const BUILDING_TYPOLOGY: CategoryFamily<BuildingTypology> = {
  name: 'building_typology',
  variants: BUILDING_TYPOLOGIES
};
export const ROOF_TYPE: CategoryFamily<RoofType> = { name: 'roof_type', variants: ROOF_TYPES };
export const GENERAL_ENERGY_CLASS: CategoryFamily<GeneralEnergyClass> = {
  name: 'general_energy_class',
  variants: GENERAL_ENERGY_CLASSES
};
export const LIFE_CYCLE_STAGE: CategoryFamily<LifeCycleStage> = {
  name: 'life_cycle_stage',
  variants: LIFE_CYCLE_STAGES
};

export const SINGLE_VALUED_FAMILIES: readonly CategoryFamily<string>[] = [
  BUILDING_TYPE,
  ROOF_TYPE,
  GENERAL_ENERGY_CLASS,
  LIFE_CYCLE_STAGE
];

export const UNKNOWN_COUNTRY: Country = 'unknown';

function toCanonical<T extends string>(table: MappingTable, family: CategoryFamily<T>, variant: string): T {
  const match = family.variants?.find((candidate) => candidate === variant);
  if (match === undefined) {
    if (family.variants === null) {
      throw new ConfigurationError('Open category families must be classified with classifyOpen', {
        dataset: table.dataset,
        family: family.name
      });
    }
    throw new ConfigurationError('Mapping declares a variant outside the canonical enumeration', {
      dataset: table.dataset,
      family: family.name,
      key: `${family.name}.${variant}`
    });
  }
  return match;
}

/**
 * Variant names whose synonyms match `value`, in table order. Lists match by
 * exact membership; a single-string entry matches when it contains the value.
 */
export function matchVariants(table: MappingTable, family: string, value: string | null): string[] {
  const needle = (value ?? '').trim().toLowerCase();
  const matches: string[] = [];
  for (const { variant, synonyms, substring } of table.variants(family)) {
    const hit = substring
      ? needle !== '' && synonyms.some((synonym) => synonym.includes(needle))
      : synonyms.includes(needle);
    if (hit) matches.push(variant);
  }
  return matches;
}

function classifyVariants(row: RowReader, familyName: string, sourceKey: string): { value: string; matches: string[] } {
  const value = row.text(sourceKey);
  const matches = matchVariants(row.table, familyName, value);
  if (!matches.length) {
    throw new UnknownCategoryError(familyName, value ?? '', row.context(sourceKey));
  }
  return { value: value ?? '', matches };
}

/** Single-valued family: the first matching variant in table order wins. */
export function classify<T extends string>(row: RowReader, family: CategoryFamily<T>, sourceKey: string): T {
  const { matches } = classifyVariants(row, family.name, sourceKey);
  return toCanonical(row.table, family, matches[0]);
}

export function classifyMany<T extends string>(row: RowReader, family: CategoryFamily<T>, sourceKey: string): T[] {
  const { matches } = classifyVariants(row, family.name, sourceKey);
  return matches.map((variant) => toCanonical(row.table, family, variant));
}

/** Dataset-defined family whose variant names are not a closed enumeration. */
export function classifyOpen(row: RowReader, family: string, sourceKey: string, fallback?: string): string {
  const value = row.text(sourceKey);
  const [first] = matchVariants(row.table, family, value);
  if (first !== undefined) return first;
  if (fallback !== undefined) return fallback;
  throw new UnknownCategoryError(family, value ?? '', row.context(sourceKey));
}

/**
 * Country codes, names and numeric codes resolve through ISO 3166 to a
 * lowercase alpha-3 code. Anything else resolves to `unknown`.
 */
export function resolveCountry(value: string | null | undefined): Country {
  const trimmed = value?.trim();
  if (!trimmed) return UNKNOWN_COUNTRY;

  let alpha3: string | undefined;
  if (/^[a-z]{2,3}$/i.test(trimmed) || /^\d{1,3}$/.test(trimmed)) {
    const code = /^\d+$/.test(trimmed) ? trimmed.padStart(3, '0') : trimmed.toUpperCase();
    if (countries.isValid(code)) {
      alpha3 = countries.toAlpha3(code);
    }
  }
  alpha3 ??= countries.getAlpha3Code(trimmed, 'en');

  return alpha3 ? alpha3.toLowerCase() : UNKNOWN_COUNTRY;
}

export interface MappingIssue {
  family: string;
  synonym: string;
  variants: string[];
}

/** Synonyms claimed by more than one variant of a single-valued family. */
export function auditMapping(
  table: MappingTable,
  families: readonly CategoryFamily<string>[] = SINGLE_VALUED_FAMILIES
): MappingIssue[] {
  const issues: MappingIssue[] = [];
  for (const family of families) {
    const owners = new Map<string, string[]>();
    for (const { variant, synonyms } of table.variants(family.name)) {
      for (const synonym of synonyms) {
        const bucket = owners.get(synonym) ?? [];
        if (!bucket.includes(variant)) bucket.push(variant);
        owners.set(synonym, bucket);
      }
    }
    for (const [synonym, variants] of owners) {
      if (variants.length > 1) issues.push({ family: family.name, synonym, variants });
    }
  }
  return issues;
}

/** Variants the mapping declares that are not part of the canonical enumeration. */
export function findUnknownVariants(table: MappingTable, family: CategoryFamily<string>): string[] {
  const canonical = family.variants;
  if (!canonical) return [];
  return table
    .variants(family.name)
    .map(({ variant }) => variant)
    .filter((variant) => !canonical.includes(variant));
}
