/**
 * Variant-phenotype annotations
 */

import type { SchemaDescriptor } from '@annobench/core';

export const PHENOTYPE_SCHEMA: SchemaDescriptor = {
  name: 'phenotype',
  description: 'Associations between a variant and a phenotype, optionally under a drug exposure',
  fields: [
    { name: 'Variant/Haplotypes', evaluator: 'variant_identity_match', weight: 1.0 },
    { name: 'Gene', evaluator: 'semantic_set_match', weight: 1.0 },
    { name: 'Drug(s)', evaluator: 'semantic_set_match', weight: 1.5 },
    { name: 'Phenotype Category', evaluator: 'category_equal', weight: 0.5 },
    { name: 'Alleles', evaluator: 'variant_identity_match', weight: 1.5 },
    { name: 'Is/Is Not associated', evaluator: 'category_equal', weight: 1.0 },
    { name: 'Direction of effect', evaluator: 'category_equal', weight: 2.0 },
    { name: 'Phenotype', evaluator: 'semantic_set_match', weight: 2.0 },
    {
      name: 'When treated with/exposed to/when assayed with',
      evaluator: 'semantic_set_match',
      weight: 0.5,
    },
    { name: 'Comparison Allele(s) or Genotype(s)', evaluator: 'variant_identity_match', weight: 1.0 },
  ],
};
