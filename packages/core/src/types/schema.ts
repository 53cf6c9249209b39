/**
 * Schema descriptors: which fields an annotation family has and how each is scored
 */

/** Built-in evaluator kinds */
export type EvaluatorKind =
  | 'exact_match'
  | 'category_equal'
  | 'fuzzy_entity_match'
  | 'semantic_set_match'
  | 'numeric_tolerance_match'
  | 'compound_statistic_match'
  | 'variant_identity_match';

/** A built-in kind, or the name of an evaluator registered at runtime */
export type EvaluatorName = EvaluatorKind | (string & {});

/** Character-level algorithm used by the fuzzy entity evaluator */
export type EntitySimilarityAlgorithm = 'sequence_ratio' | 'levenshtein' | 'jaro_winkler';

/** Partial-credit bands for numeric comparisons */
export interface ToleranceBands {
  /** Score for identical numbers (default: 1.0) */
  exactWeight?: number;
  /** Score when within 5% relative difference (default: 0.9) */
  tolerance5pct?: number;
  /** Score when within 10% relative difference (default: 0.8, 0.7 inside statistics) */
  tolerance10pct?: number;
}

export interface EvaluatorOptions extends ToleranceBands {
  /** For fuzzy_entity_match: similarity algorithm (default: "sequence_ratio") */
  similarityAlgorithm?: EntitySimilarityAlgorithm;
  /** For fuzzy_entity_match: leading tokens stripped before comparison */
  stripPrefixes?: string[];
}

export interface FieldSpec {
  /** Field name as it appears in annotation records */
  name: string;
  /** Evaluator used to score this field */
  evaluator: EvaluatorName;
  /** Weight in the pair score (default: 1.0) */
  weight?: number;
  options?: EvaluatorOptions;
}

/**
 * Which fields the consistency checks read. Every entry is optional;
 * a check runs only when the fields it needs are mapped.
 */
export interface ConsistencyFields {
  /** Identifier that must appear among related records */
  crossReference?: {
    field: string;
    /** Field of the related records holding the identifier (default: same name) */
    relatedField?: string;
  };
  pValue?: string;
  ratioStat?: string;
  ratioStatType?: string;
  ciStart?: string;
  ciStop?: string;
  /** Fields that must lie in [0, 1] */
  frequencies?: string[];
  /** Sample-size fields penalized together with frequency problems */
  sampleSizes?: string[];
}

export interface SchemaDescriptor {
  /** Schema identifier (e.g. "phenotype") */
  name: string;
  description?: string;
  /** Ordered field specs */
  fields: FieldSpec[];
  consistency?: ConsistencyFields;
  /** Shared identifier used by key alignment */
  keyField?: string;
  /** Fields left out of human-facing summaries (IDs and the like) */
  displayExcluded?: string[];
}
