#!/usr/bin/env node
import 'dotenv/config';
import { loadPipelineConfig, parseChunkSize, parseList, type PipelineConfig } from './config/pipeline.js';
import { getProfile } from './datasets/index.js';
import { ConfigurationError } from './errors.js';
import { discoverInputs, readRecords } from './extract.js';
import { loadMappingTable } from './lib/mapping.js';
import { writeProjects } from './load.js';
import { transformDataset } from './transform.js';
import type { RawRecord } from './types/index.js';
import { validateProjects } from './validate.js';
import { log } from './utils/log.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

type CliArgs = Record<string, string | boolean | string[]>;

function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    let token = tokens[i];
    if (token === '--') continue;
    if (!token.startsWith('--')) continue;

    token = token.slice(2);
    if (!token) continue;

    let value: string | boolean = true;
    let key = token;

    if (token.includes('=')) {
      const [k, v] = token.split(/=(.*)/s, 2);
      key = k;
      value = v ?? true;
    } else {
      const next = tokens[i + 1];
      if (next && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    const existing = result[key];
    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(String(value));
    } else {
      result[key] = [String(existing), String(value)];
    }
  }

  return result;
}

function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value[value.length - 1];
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

function getStringArrayArg(args: CliArgs, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined || typeof value === 'boolean') return undefined;
  return Array.isArray(value) ? value : [value];
}

function normalizeBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function resolveBooleanFlag(cliValue: unknown): boolean | undefined {
  if (Array.isArray(cliValue)) {
    cliValue = cliValue[cliValue.length - 1];
  }
  if (typeof cliValue === 'boolean') return cliValue;
  if (typeof cliValue === 'string') return normalizeBoolean(cliValue);
  return undefined;
}

function resolveConfig(args: CliArgs): PipelineConfig {
  const datasets = (getStringArrayArg(args, 'dataset') ?? []).flatMap((entry) => parseList(entry));
  const chunkSize = getStringArg(args, 'chunk-size');
  return loadPipelineConfig({
    dataRoot: getStringArg(args, 'data-root'),
    datasets: datasets.length ? datasets : undefined,
    mappingDir: getStringArg(args, 'mapping-dir'),
    schemaDir: getStringArg(args, 'schema-dir'),
    chunkSize: chunkSize === undefined ? undefined : parseChunkSize(chunkSize),
    skipValidation: resolveBooleanFlag(args['skip-validation'])
  });
}

async function runDataset(config: PipelineConfig, dataset: string, inputs: string[]) {
  const profile = getProfile(dataset);
  const table = await loadMappingTable(profile.name, config.mappingDir);

  const files = await discoverInputs(profile, { dataRoot: config.dataRoot, inputs });
  const sources: RawRecord[][] = [];
  for (const file of files) {
    sources.push(await readRecords(profile, file));
  }

  const { projects } = transformDataset(profile, table, sources);
  if (config.skipValidation) {
    log.info('Output validation skipped by request', { dataset: profile.name });
  } else {
    await validateProjects(profile.name, projects, config.schemaDir);
  }
  await writeProjects(config.dataRoot, profile.name, projects, config.chunkSize);
}

async function main() {
  const rawArgs = parseCliArgs(process.argv.slice(2));
  const config = resolveConfig(rawArgs);
  const inputs = getStringArrayArg(rawArgs, 'input') ?? [];

  if (inputs.length && config.datasets.length !== 1) {
    throw new ConfigurationError('--input requires exactly one --dataset', { datasets: config.datasets });
  }

  log.info('ETL started', { dataRoot: config.dataRoot, datasets: config.datasets });
  for (const dataset of config.datasets) {
    await runDataset(config, dataset, inputs);
  }
  log.info('ETL finished', { datasets: config.datasets.length });
}

main().catch((error) => {
  log.error('ETL failed', error);
  process.exitCode = 1;
});
