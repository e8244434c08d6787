import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { DATASET_PROFILES } from '../src/datasets/index.js';
import { ConfigurationError, UnknownCategoryError } from '../src/errors.js';
import {
  BUILDING_TYPE,
  BUILDING_TYPOLOGY,
  GENERAL_ENERGY_CLASS,
  LIFE_CYCLE_STAGE,
  ROOF_TYPE,
  auditMapping,
  classify,
  classifyMany,
  classifyOpen,
  findUnknownVariants,
  matchVariants,
  resolveCountry
} from '../src/lib/categories.js';
import { RowReader } from '../src/lib/fields.js';
import { MappingTable, loadMappingTable } from '../src/lib/mapping.js';

const table = new MappingTable('test', {
  type: 'Type',
  use: 'Use',
  region: 'Region',
  'building_type.new_construction_works': ['new build', 'new construction'],
  'building_type.retrofit_works': ['retrofit', 'refurbishment'],
  'building_type.other': 'other works, unspecified',
  'building_typology.office': ['office', 'mixed use'],
  'building_typology.residential': ['residential', 'mixed use'],
  'building_typology.castle': ['keep'],
  'stock_region.ita': ['mediterranean'],
  'stock_region.swe': ['nordic']
});

function row(Type: string, Use = 'office', Region = 'nordic') {
  return new RowReader(table, { Type, Use, Region }, 0, ['no data']);
}

describe('classify', () => {
  it('matches list synonyms case-insensitively after trimming', () => {
    expect(classify(row(' New Build '), BUILDING_TYPE, 'type')).toBe('new_construction_works');
    expect(classify(row('REFURBISHMENT'), BUILDING_TYPE, 'type')).toBe('retrofit_works');
  });

  it('matches single-string synonyms by containment', () => {
    expect(classify(row('Other works'), BUILDING_TYPE, 'type')).toBe('other');
    expect(classify(row('unspecified'), BUILDING_TYPE, 'type')).toBe('other');
  });

  it('raises UnknownCategoryError with the family and row context', () => {
    expect(() => classify(row('castle'), BUILDING_TYPE, 'type')).toThrow(
      'Unknown building type: "castle" (dataset="test", rowIndex=0, key="type", family="building_type")'
    );
    expect(() => classify(row(''), BUILDING_TYPE, 'type')).toThrow(UnknownCategoryError);
    expect(() => classify(row('no data'), BUILDING_TYPE, 'type')).toThrow(UnknownCategoryError);
  });

  it('rejects variants outside the canonical enumeration', () => {
    expect(() => classify(row('x', 'keep'), BUILDING_TYPOLOGY, 'use')).toThrow(ConfigurationError);
  });

  it('returns every matching variant for many-valued families', () => {
    expect(classifyMany(row('x', 'Mixed Use'), BUILDING_TYPOLOGY, 'use')).toEqual(['office', 'residential']);
    expect(classifyMany(row('x', 'residential'), BUILDING_TYPOLOGY, 'use')).toEqual(['residential']);
  });

  it('takes the first variant in table order for single-valued families', () => {
    expect(classify(row('x', 'mixed use'), BUILDING_TYPOLOGY, 'use')).toBe('office');
  });

  it('resolves open families with an optional fallback', () => {
    expect(classifyOpen(row('x', 'office', 'Nordic'), 'stock_region', 'region')).toBe('swe');
    expect(classifyOpen(row('x', 'office', 'atlantic'), 'stock_region', 'region', 'deu')).toBe('deu');
    expect(() => classifyOpen(row('x', 'office', 'atlantic'), 'stock_region', 'region')).toThrow(
      UnknownCategoryError
    );
  });

  it('matches nothing for an absent value', () => {
    expect(matchVariants(table, 'building_type', null)).toEqual([]);
  });
});

describe('resolveCountry', () => {
  it('resolves codes and English names to lowercase alpha-3', () => {
    expect(resolveCountry('DK')).toBe('dnk');
    expect(resolveCountry('dnk')).toBe('dnk');
    expect(resolveCountry('Denmark')).toBe('dnk');
    expect(resolveCountry(' Germany ')).toBe('deu');
  });

  it('degrades to unknown instead of failing', () => {
    expect(resolveCountry('Atlantis')).toBe('unknown');
    expect(resolveCountry('')).toBe('unknown');
    expect(resolveCountry(null)).toBe('unknown');
  });
});

describe('auditMapping', () => {
  it('reports synonyms shared between variants', () => {
    expect(auditMapping(table, [BUILDING_TYPE])).toEqual([]);
    expect(auditMapping(table, [BUILDING_TYPOLOGY])).toEqual([
      { family: 'building_typology', synonym: 'mixed use', variants: ['office', 'residential'] }
    ]);
    expect(findUnknownVariants(table, BUILDING_TYPOLOGY)).toEqual(['castle']);
  });

  describe.each(DATASET_PROFILES.map((profile) => profile.name))('shipped mapping %s', (dataset) => {
    it('has no ambiguous synonyms in single-valued families', async () => {
      const shipped = await loadMappingTable(dataset, join(process.cwd(), 'mappings'));
      expect(auditMapping(shipped)).toEqual([]);
    });

    it('declares only canonical variants', async () => {
      const shipped = await loadMappingTable(dataset, join(process.cwd(), 'mappings'));
      for (const family of [BUILDING_TYPE, BUILDING_TYPOLOGY, ROOF_TYPE, GENERAL_ENERGY_CLASS, LIFE_CYCLE_STAGE]) {
        expect(findUnknownVariants(shipped, family)).toEqual([]);
      }
    });

    it('declares every key its profile requires', async () => {
      const shipped = await loadMappingTable(dataset, join(process.cwd(), 'mappings'));
      const profile = DATASET_PROFILES.find((candidate) => candidate.name === dataset);
      expect(() => shipped.require(profile?.requiredKeys ?? [])).not.toThrow();
    });
  });
});
