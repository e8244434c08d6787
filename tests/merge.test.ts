import { afterEach, describe, expect, it, vi } from 'vitest';
import { assembleProjects } from '../src/assemble.js';
import { ConfigurationError, MalformedValueError, UnknownCategoryError } from '../src/errors.js';
import { contentKey, deriveId } from '../src/lib/identity.js';
import { MappingTable } from '../src/lib/mapping.js';
import { EntityMerger } from '../src/merge.js';
import { sampleProfile, sampleRow, sampleTable } from './helpers.js';

const wallId = deriveId(contentKey('P1', 'Wall'));
const steelId = deriveId(contentKey('P1', 'Wall', 'steel'));
const concreteId = deriveId(contentKey('P1', 'Wall', 'concrete'));

function merger() {
  return new EntityMerger(sampleProfile, sampleTable());
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('EntityMerger', () => {
  it('accumulates repeated rows of the same product into its technical flow', () => {
    const m = merger().addAll([sampleRow({ A1A3: '10' }), sampleRow({ A1A3: '5' })]);

    const [project] = m.projects();
    expect(m.projects()).toHaveLength(1);
    expect(project.id).toBe('P1');
    expect(project.location.country).toBe('dnk');
    expect(project.projectInfo.buildingType).toBe('new_construction_works');

    const assembly = project.assemblies.get(wallId);
    expect(project.assemblies.size).toBe(1);
    expect(assembly?.products.size).toBe(1);
    expect(assembly?.products.get(steelId)?.impactData.impacts).toEqual({ gwp: { a1a3: 15 } });
    expect(m.stats()).toEqual({
      rows: 2,
      excludedRows: 0,
      projects: 1,
      assemblies: 1,
      products: 1,
      mergedRows: 1
    });
  });

  it('keeps distinct products of one assembly apart', () => {
    const m = merger().addAll([
      sampleRow({ Material: 'steel', A1A3: '10', A4: '1' }),
      sampleRow({ Material: 'concrete', A1A3: '4' })
    ]);

    const products = m.projects()[0].assemblies.get(wallId)?.products;
    expect([...(products?.keys() ?? [])]).toEqual([steelId, concreteId]);
    expect(products?.get(steelId)?.impactData.impacts).toEqual({ gwp: { a1a3: 10, a4: 1 } });
    expect(products?.get(concreteId)?.impactData.impacts).toEqual({ gwp: { a1a3: 4 } });
  });

  it('folds two rows of project P1 into one product with gwp.a1a3 = 15', () => {
    const m = merger().addAll([
      sampleRow({ Element: 'steel', Material: 'flow-1', A1A3: '10.0' }),
      sampleRow({ Element: 'steel', Material: 'flow-1', A1A3: '5.0' })
    ]);
    const [project] = assembleProjects(m.projects());
    const assemblyIds = Object.keys(project.assemblies);
    expect(assemblyIds).toEqual([deriveId(contentKey('P1', 'steel'))]);
    const products = Object.values(project.assemblies[assemblyIds[0]].products);
    expect(products).toHaveLength(1);
    expect(products[0].impactData.impacts).toEqual({ gwp: { a1a3: 15 } });
  });

  it('keeps flow-1 and flow-2 as separate products of one assembly', () => {
    const m = merger().addAll([
      sampleRow({ Element: 'steel', Material: 'flow-1', A1A3: '10.0' }),
      sampleRow({ Element: 'steel', Material: 'flow-2', A1A3: '5.0' })
    ]);
    const [project] = assembleProjects(m.projects());
    const assemblies = Object.values(project.assemblies);
    expect(assemblies).toHaveLength(1);
    expect(Object.values(assemblies[0].products).map((product) => product.impactData.impacts)).toEqual([
      { gwp: { a1a3: 10 } },
      { gwp: { a1a3: 5 } }
    ]);
  });

  it('produces the same output regardless of row order', () => {
    const rows = [
      sampleRow({ Material: 'steel', A1A3: '10' }),
      sampleRow({ Material: 'concrete', A1A3: '4' }),
      sampleRow({ Material: 'steel', A1A3: '5', A4: '2' })
    ];
    const forward = assembleProjects(merger().addAll(rows).projects());
    const backward = assembleProjects(merger().addAll([...rows].reverse()).projects());

    expect(backward).toEqual(forward);
    expect(forward[0].assemblies[wallId].products[steelId].impactData.impacts).toEqual({ gwp: { a1a3: 15, a4: 2 } });
  });

  it('derives the same identifiers across independent runs', () => {
    const first = merger().addAll([sampleRow()]).projects()[0];
    const second = merger().addAll([sampleRow()]).projects()[0];

    expect([...first.assemblies.keys()]).toEqual([...second.assemblies.keys()]);
    expect(first.assemblies.get(wallId)?.products.get(steelId)?.impactData.id).toBe(deriveId('flow-1'));
  });

  it('rejects an unknown building type without registering the project', () => {
    const m = merger();
    m.add(sampleRow(), 0);

    expect(() => m.add(sampleRow({ ProjectId: 'P2', Type: 'castle' }), 1)).toThrow(UnknownCategoryError);
    expect(m.projects().map((project) => project.id)).toEqual(['P1']);
    expect(m.stats().rows).toBe(1);
  });

  it('leaves accumulated impacts untouched when a repeat row is malformed', () => {
    const m = merger();
    m.add(sampleRow({ A1A3: '10' }), 0);

    expect(() => m.add(sampleRow({ A1A3: 'ten' }), 1)).toThrow(MalformedValueError);
    const product = m.projects()[0].assemblies.get(wallId)?.products.get(steelId);
    expect(product?.impactData.impacts).toEqual({ gwp: { a1a3: 10 } });
    expect(m.stats().mergedRows).toBe(0);
  });

  it('treats placeholder cells as absent contributions', () => {
    const m = merger().addAll([sampleRow({ A1A3: 'No Data', A4: '3' })]);
    const product = m.projects()[0].assemblies.get(wallId)?.products.get(steelId);
    expect(product?.impactData.impacts).toEqual({ gwp: { a4: 3 } });
  });

  it('registers the project shell for an excluded row without assemblies', () => {
    const m = merger().addAll([sampleRow({ ProjectId: 'P3', Included: 'No' })]);

    const [project] = m.projects();
    expect(project.id).toBe('P3');
    expect(project.assemblies.size).toBe(0);
    expect(m.stats()).toEqual({
      rows: 1,
      excludedRows: 1,
      projects: 1,
      assemblies: 0,
      products: 0,
      mergedRows: 0
    });
  });

  it('merges non-contiguous rows into the existing project and warns', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const m = merger().addAll([
      sampleRow({ A1A3: '1' }),
      sampleRow({ ProjectId: 'P2' }),
      sampleRow({ A1A3: '2' })
    ]);

    expect(m.projects().map((project) => project.id)).toEqual(['P1', 'P2']);
    expect(m.projects()[0].assemblies.get(wallId)?.products.get(steelId)?.impactData.impacts).toEqual({
      gwp: { a1a3: 3 }
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Rows for project are not contiguous'));
  });

  it('fails at construction when the mapping lacks required keys', () => {
    const table = new MappingTable('sample', { id: 'ProjectId' });
    expect(() => new EntityMerger(sampleProfile, table)).toThrow(
      new ConfigurationError('Mapping is missing 1 required key(s)', {
        dataset: 'sample',
        missing: ['project_info.building_type']
      })
    );
  });
});
