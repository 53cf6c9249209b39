/**
 * Variant-drug annotations
 */

import type { SchemaDescriptor } from '@annobench/core';

export const DRUG_SCHEMA: SchemaDescriptor = {
  name: 'drug',
  description: 'Associations between a variant and drug response (PD/PK)',
  fields: [
    { name: 'Variant/Haplotypes', evaluator: 'variant_identity_match', weight: 1.0 },
    { name: 'Gene', evaluator: 'semantic_set_match', weight: 1.0 },
    { name: 'Drug(s)', evaluator: 'semantic_set_match', weight: 2.0 },
    { name: 'Phenotype Category', evaluator: 'category_equal', weight: 0.5 },
    { name: 'Significance', evaluator: 'category_equal', weight: 1.0 },
    { name: 'Alleles', evaluator: 'variant_identity_match', weight: 1.5 },
    { name: 'Specialty Population', evaluator: 'semantic_set_match', weight: 0.5 },
    { name: 'Metabolizer types', evaluator: 'category_equal', weight: 0.5 },
    { name: 'Is/Is Not associated', evaluator: 'category_equal', weight: 1.0 },
    { name: 'Direction of effect', evaluator: 'category_equal', weight: 2.0 },
    { name: 'PD/PK terms', evaluator: 'semantic_set_match', weight: 1.5 },
    { name: 'Population types', evaluator: 'category_equal', weight: 0.5 },
    { name: 'Comparison Allele(s) or Genotype(s)', evaluator: 'variant_identity_match', weight: 1.0 },
    { name: 'Comparison Metabolizer types', evaluator: 'category_equal', weight: 0.5 },
  ],
};
