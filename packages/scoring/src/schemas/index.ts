/**
 * Built-in schema registry
 */

import { BenchmarkError, formatZodError, schemaDescriptorSchema } from '@annobench/core';
import type { SchemaDescriptor } from '@annobench/core';
import { PHENOTYPE_SCHEMA } from './phenotype.js';
import { DRUG_SCHEMA } from './drug.js';
import { FUNCTIONAL_SCHEMA } from './functional.js';
import { STUDY_PARAMETERS_SCHEMA } from './study-parameters.js';

export { PHENOTYPE_SCHEMA, DRUG_SCHEMA, FUNCTIONAL_SCHEMA, STUDY_PARAMETERS_SCHEMA };

const BUILT_IN_SCHEMAS: ReadonlyMap<string, SchemaDescriptor> = new Map(
  [PHENOTYPE_SCHEMA, DRUG_SCHEMA, FUNCTIONAL_SCHEMA, STUDY_PARAMETERS_SCHEMA].map((s) => [
    s.name,
    s,
  ])
);

export function listSchemas(): string[] {
  return [...BUILT_IN_SCHEMAS.keys()];
}

export function getSchema(name: string): SchemaDescriptor {
  const schema = BUILT_IN_SCHEMAS.get(name);
  if (!schema) {
    throw new BenchmarkError({
      code: 'UNKNOWN_SCHEMA',
      message: `Unknown schema: ${name}`,
      suggestion: `Use one of: ${listSchemas().join(', ')}`,
    });
  }
  return schema;
}

/**
 * Accept a built-in schema name or an inline descriptor. Inline
 * descriptors are validated.
 */
export function resolveSchema(schema: string | SchemaDescriptor): SchemaDescriptor {
  if (typeof schema === 'string') {
    return getSchema(schema);
  }

  const parsed = schemaDescriptorSchema.safeParse(schema);
  if (!parsed.success) {
    throw new BenchmarkError({
      code: 'INVALID_SCHEMA',
      message: formatZodError(parsed.error, `Invalid schema '${schema.name}'`),
    });
  }
  return parsed.data;
}
