/**
 * Zod schemas for validating engine inputs
 */

import { z } from 'zod';
import type { AnnotationInstance, FieldSpec, SchemaDescriptor } from '../types/index.js';

/**
 * Field value; booleans and scalar lists are folded into strings.
 * Anything else inside a record (objects, nested lists) counts as absent.
 */
export const annotationValueSchema = z.union([
  z.string(),
  z.number(),
  z.nan(),
  z.null(),
  z.undefined(),
  z.boolean().transform((value) => String(value)),
  z
    .array(z.union([z.string(), z.number()]))
    .transform((values) => values.join(', ')),
  z.unknown().transform((): undefined => undefined),
]);

export const annotationInstanceSchema: z.ZodType<AnnotationInstance, z.ZodTypeDef, unknown> =
  z.record(z.string(), annotationValueSchema);

export const annotationListSchema = z.array(annotationInstanceSchema);

const scoreSchema = z.number().min(0).max(1);

export const evaluatorOptionsSchema = z
  .object({
    exactWeight: scoreSchema.optional(),
    tolerance5pct: scoreSchema.optional(),
    tolerance10pct: scoreSchema.optional(),
    similarityAlgorithm: z.enum(['sequence_ratio', 'levenshtein', 'jaro_winkler']).optional(),
    stripPrefixes: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const fieldSpecSchema: z.ZodType<FieldSpec, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string().min(1),
    evaluator: z.string().min(1),
    weight: z.number().min(0).finite().optional(),
    options: evaluatorOptionsSchema.optional(),
  })
  .strict();

export const consistencyFieldsSchema = z
  .object({
    crossReference: z
      .object({
        field: z.string().min(1),
        relatedField: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    pValue: z.string().min(1).optional(),
    ratioStat: z.string().min(1).optional(),
    ratioStatType: z.string().min(1).optional(),
    ciStart: z.string().min(1).optional(),
    ciStop: z.string().min(1).optional(),
    frequencies: z.array(z.string().min(1)).optional(),
    sampleSizes: z.array(z.string().min(1)).optional(),
  })
  .strict();

/** Schema descriptor; field names must be unique */
export const schemaDescriptorSchema: z.ZodType<SchemaDescriptor, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    fields: z.array(fieldSpecSchema).min(1),
    consistency: consistencyFieldsSchema.optional(),
    keyField: z.string().min(1).optional(),
    displayExcluded: z.array(z.string()).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const names = new Set<string>();
    value.fields.forEach((field, i) => {
      if (names.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate field name: ${field.name}`,
          path: ['fields', i, 'name'],
        });
      }
      names.add(field.name);
    });
  });

/** Field name → non-negative weight */
export const fieldWeightsSchema = z.record(z.string(), z.number().min(0).finite());

export const matchingThresholdSchema = z.number().min(0).max(1);

/**
 * Render zod issues one per line
 */
export function formatZodError(err: z.ZodError, heading = 'Invalid input'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${heading}:\n${issues}`;
}

/** Export types from schemas */
export type FieldWeightsInput = z.infer<typeof fieldWeightsSchema>;
