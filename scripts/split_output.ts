#!/usr/bin/env tsx
import 'dotenv/config';
import { ConfigurationError } from '../src/errors.js';
import { writeChunks } from '../src/load.js';
import { readJson } from '../src/utils/fs.js';
import { log } from '../src/utils/log.js';

const DEFAULT_CHUNK_SIZE = 50;

function parseArg(flag: string, args: string[]): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  return args[index + 1];
}

async function main() {
  const args = process.argv.slice(2);
  const file = parseArg('--file', args) ?? args.find((arg) => !arg.startsWith('--'));
  if (!file) {
    throw new ConfigurationError('Usage: split_output --file <output.json> [--size <projects>]');
  }

  const rawSize = parseArg('--size', args);
  const size = rawSize === undefined ? DEFAULT_CHUNK_SIZE : Number.parseInt(rawSize, 10);
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigurationError('Chunk size must be a positive integer', { value: rawSize });
  }

  const projects = await readJson<unknown>(file);
  if (!Array.isArray(projects)) {
    throw new ConfigurationError('Output file does not contain a JSON array', { file });
  }

  const written = await writeChunks(file, projects, size);
  log.info('Split output', { file, projects: projects.length, files: written.length, size });
}

main().catch((error) => {
  log.error('Split failed', error);
  process.exitCode = 1;
});
