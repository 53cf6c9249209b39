export type {
  AnnotationValue,
  AnnotationInstance,
  AnnotationPair,
  AnnotationSets,
} from './annotation.js';
export type {
  EvaluatorKind,
  EvaluatorName,
  EntitySimilarityAlgorithm,
  ToleranceBands,
  EvaluatorOptions,
  FieldSpec,
  ConsistencyFields,
  SchemaDescriptor,
} from './schema.js';
