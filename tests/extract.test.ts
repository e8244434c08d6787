import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { carbenmatsProfile } from '../src/datasets/carbenmats.js';
import { becdProfile } from '../src/datasets/becd.js';
import { discoverInputs, readRecords } from '../src/extract.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'lca-extract-'));
  await mkdir(join(root, 'raw'));
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(root, { recursive: true, force: true });
});

describe('discoverInputs', () => {
  it('finds the files matching the dataset pattern under raw/', async () => {
    await writeFile(join(root, 'raw', 'becd_b.csv'), 'a\n1\n');
    await writeFile(join(root, 'raw', 'becd_a.csv'), 'a\n1\n');
    await writeFile(join(root, 'raw', 'slice.csv'), 'a\n1\n');

    const files = await discoverInputs(becdProfile, { dataRoot: root });
    expect(files).toEqual([
      { path: join(root, 'raw', 'becd_a.csv'), name: 'becd_a.csv' },
      { path: join(root, 'raw', 'becd_b.csv'), name: 'becd_b.csv' }
    ]);
  });

  it('returns nothing when no file matches', async () => {
    expect(await discoverInputs(becdProfile, { dataRoot: root })).toEqual([]);
  });

  it('uses explicit inputs and reports missing ones', async () => {
    const input = join(root, 'export.csv');
    await writeFile(input, 'a\n1\n');
    expect(await discoverInputs(becdProfile, { dataRoot: root, inputs: [input] })).toEqual([
      { path: input, name: 'export.csv' }
    ]);
    await expect(
      discoverInputs(becdProfile, { dataRoot: root, inputs: [join(root, 'missing.csv')] })
    ).rejects.toThrow('Missing input files');
  });

  it('fails when the raw directory is absent', async () => {
    await expect(discoverInputs(becdProfile, { dataRoot: join(root, 'elsewhere') })).rejects.toThrow(
      'Raw data directory missing'
    );
  });
});

describe('readRecords', () => {
  it('parses with the dataset delimiter', async () => {
    const path = join(root, 'raw', 'carbenmats_2023.csv');
    await writeFile(path, 'bldg_name;bldg_area_gfa\nHarbour Flats;2400,5\n');
    expect(await readRecords(carbenmatsProfile, { path, name: 'carbenmats_2023.csv' })).toEqual([
      { bldg_name: 'Harbour Flats', bldg_area_gfa: '2400,5' }
    ]);
  });
});
