/**
 * Engine configuration file
 *
 * JSON with `${VAR}` / `${VAR:-default}` placeholders, validated with zod.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  BenchmarkError,
  fieldWeightsSchema,
  formatZodError,
  schemaDescriptorSchema,
} from '@annobench/core';
import type { AnnotationBenchmarkOptions } from '../engine/index.js';

export type Environment = Readonly<Record<string, string | undefined>>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function expandEnvInString(input: string, env: Environment): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    throw new BenchmarkError({
      code: 'CONFIGURATION_ERROR',
      message: `Missing required environment variable: ${name}`,
      suggestion: `Set ${name} or give a default with \${${name}:-value}`,
    });
  });
}

/**
 * Replace placeholders in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, env: Environment = process.env): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, env));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, env);
    }
    return out;
  }
  return value;
}

// Placeholders always expand to strings
function coerceNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isNaN(n) ? value : n;
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

const fraction = z.preprocess(coerceNumber, z.number().min(0).max(1));

export const engineConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    schema: z.union([z.string().min(1), schemaDescriptorSchema]),
    matchingThreshold: fraction.optional(),
    fieldWeights: z
      .record(z.string(), z.preprocess(coerceNumber, z.number()))
      .pipe(fieldWeightsSchema)
      .optional(),
    matchingStrategy: z.enum(['greedy', 'key']).optional(),
    keyField: z.string().min(1).optional(),
    consistency: z
      .object({
        enabled: z.preprocess(coerceBoolean, z.boolean()).optional(),
        penaltyPerIssue: fraction.optional(),
        maxPenalty: fraction.optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type EngineConfig = z.infer<typeof engineConfigSchema>;

/**
 * Validate an already-parsed config object and turn it into engine options
 */
export function parseEngineConfig(
  raw: unknown,
  env: Environment = process.env
): AnnotationBenchmarkOptions {
  const parsed = engineConfigSchema.safeParse(expandEnvVars(raw, env));
  if (!parsed.success) {
    throw new BenchmarkError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodError(parsed.error, 'Invalid engine config'),
    });
  }

  const { $schema: _ignored, ...options } = parsed.data;
  return options;
}

/**
 * Read, expand and validate a JSON config file
 */
export async function loadEngineConfig(
  path: string,
  env: Environment = process.env
): Promise<AnnotationBenchmarkOptions> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new BenchmarkError({
      code: 'CONFIGURATION_ERROR',
      message: `Cannot read config file: ${path}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new BenchmarkError({
      code: 'CONFIGURATION_ERROR',
      message: `Config file is not valid JSON: ${path}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  return parseEngineConfig(raw, env);
}
