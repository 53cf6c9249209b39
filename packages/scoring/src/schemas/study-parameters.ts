/**
 * Study parameters: cohort sizes, allele frequencies and association statistics
 * reported for one variant annotation
 */

import type { SchemaDescriptor } from '@annobench/core';

const VARIANT_ANNOTATION_ID = 'Variant Annotation ID';

export const STUDY_PARAMETERS_SCHEMA: SchemaDescriptor = {
  name: 'study_parameters',
  description: 'Study design and statistics backing a variant annotation',
  fields: [
    { name: 'Study Parameters ID', evaluator: 'exact_match' },
    { name: VARIANT_ANNOTATION_ID, evaluator: 'exact_match' },
    { name: 'Study Type', evaluator: 'category_equal' },
    { name: 'Study Cases', evaluator: 'numeric_tolerance_match' },
    { name: 'Study Controls', evaluator: 'numeric_tolerance_match' },
    { name: 'Characteristics', evaluator: 'semantic_set_match' },
    { name: 'Characteristics Type', evaluator: 'category_equal' },
    { name: 'Frequency in Cases', evaluator: 'numeric_tolerance_match' },
    { name: 'Allele of Frequency in Cases', evaluator: 'variant_identity_match' },
    { name: 'Frequency in Controls', evaluator: 'numeric_tolerance_match' },
    { name: 'Allele of Frequency in Controls', evaluator: 'variant_identity_match' },
    { name: 'P Value', evaluator: 'compound_statistic_match' },
    { name: 'Ratio Stat Type', evaluator: 'category_equal' },
    { name: 'Ratio Stat', evaluator: 'numeric_tolerance_match' },
    { name: 'Confidence Interval Start', evaluator: 'numeric_tolerance_match' },
    { name: 'Confidence Interval Stop', evaluator: 'numeric_tolerance_match' },
    { name: 'Biogeographical Groups', evaluator: 'category_equal' },
  ],
  consistency: {
    crossReference: { field: VARIANT_ANNOTATION_ID },
    pValue: 'P Value',
    ratioStat: 'Ratio Stat',
    ratioStatType: 'Ratio Stat Type',
    ciStart: 'Confidence Interval Start',
    ciStop: 'Confidence Interval Stop',
    frequencies: ['Frequency in Cases', 'Frequency in Controls'],
    sampleSizes: ['Study Cases', 'Study Controls'],
  },
  keyField: VARIANT_ANNOTATION_ID,
  displayExcluded: ['Study Parameters ID', VARIANT_ANNOTATION_ID],
};
