/**
 * FieldEvaluatorLibrary
 *
 * Resolves evaluator names to similarity functions, with support for
 * custom evaluators.
 */

import { BenchmarkError } from '@annobench/core';
import type {
  AnnotationValue,
  EvaluatorKind,
  EvaluatorName,
  EvaluatorOptions,
} from '@annobench/core';
import { categoryEqual, exactMatch, fuzzyEntityMatch, semanticSetMatch } from './text.js';
import { compoundStatisticMatch, numericToleranceMatch } from './numeric.js';
import { variantIdentityMatch } from './variant-identity.js';

/** Similarity function: (predicted, expected) → score in [0, 1] */
export type FieldEvaluator = (
  predicted: AnnotationValue,
  expected: AnnotationValue,
  options?: EvaluatorOptions
) => number;

/** Built-in evaluators */
const BUILT_IN_EVALUATORS: Record<EvaluatorKind, FieldEvaluator> = {
  exact_match: exactMatch,
  category_equal: categoryEqual,
  fuzzy_entity_match: fuzzyEntityMatch,
  semantic_set_match: semanticSetMatch,
  numeric_tolerance_match: numericToleranceMatch,
  compound_statistic_match: compoundStatisticMatch,
  variant_identity_match: variantIdentityMatch,
};

function isBuiltIn(name: string): name is EvaluatorKind {
  return Object.prototype.hasOwnProperty.call(BUILT_IN_EVALUATORS, name);
}

export class FieldEvaluatorLibrary {
  private customEvaluators: Map<string, FieldEvaluator> = new Map();

  /**
   * Register a custom evaluator. Built-in names cannot be replaced.
   */
  register(name: string, fn: FieldEvaluator): this {
    if (isBuiltIn(name)) {
      throw new BenchmarkError({
        code: 'INVALID_OPTIONS',
        message: `Cannot replace built-in evaluator: ${name}`,
        suggestion: 'Register the custom evaluator under a different name',
      });
    }
    this.customEvaluators.set(name, fn);
    return this;
  }

  has(name: EvaluatorName): boolean {
    return isBuiltIn(name) || this.customEvaluators.has(name);
  }

  /**
   * Get evaluator function by name
   */
  get(name: EvaluatorName): FieldEvaluator {
    if (isBuiltIn(name)) {
      return BUILT_IN_EVALUATORS[name];
    }

    const custom = this.customEvaluators.get(name);
    if (custom) {
      return custom;
    }

    throw new BenchmarkError({
      code: 'UNKNOWN_EVALUATOR',
      message: `Unknown evaluator: ${name}`,
      suggestion: `Use one of ${this.names().join(', ')} or register it first`,
    });
  }

  names(): string[] {
    return [...Object.keys(BUILT_IN_EVALUATORS), ...this.customEvaluators.keys()];
  }
}
