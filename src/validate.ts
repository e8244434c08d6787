import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import addMetaSchema2020Import from 'ajv/dist/refs/json-schema-2020-12/index.js';
import addFormatsPlugin, { type FormatsPluginOptions } from 'ajv-formats';
import { createRequire } from 'node:module';
import { OutputValidationError } from './errors.js';
import type { ProjectRecord } from './types/index.js';

const require = createRequire(import.meta.url);
const ajv = new Ajv({ allErrors: true, strict: false });
if (typeof addMetaSchema2020Import === 'function') {
  (addMetaSchema2020Import as unknown as (this: Ajv, $data?: boolean) => Ajv).call(ajv);
} else {
  const metaSchemaFn = (addMetaSchema2020Import as {
    default?: (this: Ajv, $data?: boolean) => Ajv;
  }).default;
  if (typeof metaSchemaFn === 'function') {
    metaSchemaFn.call(ajv);
  }
}
const metaSchema202012 = require('ajv/dist/refs/json-schema-2020-12/schema.json');
if (!ajv.getSchema('https://json-schema.org/draft/2020-12/schema')) {
  ajv.addMetaSchema(metaSchema202012);
}
const addFormats = addFormatsPlugin as unknown as (
  ajv: Ajv,
  options?: FormatsPluginOptions
) => Ajv;
addFormats(ajv);

const validatorCache = new Map<string, ValidateFunction>();

async function loadValidator (schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema = JSON.parse(await readFile(schemaPath, 'utf8'));
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

export async function validateArray (schemaPath: string, data: readonly unknown[], label: string) {
  const validator = await loadValidator(schemaPath);
  for (const [index, entry] of data.entries()) {
    if (!validator(entry)) {
      const message = ajv.errorsText(validator.errors, { dataVar: `${label}[${index}]` });
      throw new OutputValidationError(message, { dataset: label, index });
    }
  }
}

const defaultSchemaDir = join(process.cwd(), 'schemas');

export async function validateProjects (
  dataset: string,
  projects: readonly ProjectRecord[],
  schemaDir: string = defaultSchemaDir
) {
  await validateArray(join(schemaDir, 'project.json'), projects, dataset);
}
