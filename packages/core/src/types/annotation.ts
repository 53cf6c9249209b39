/**
 * Annotation record types shared by ground truth and predictions
 */

/** A single field value. `null`, `undefined`, blank strings and NaN are "absent". */
export type AnnotationValue = string | number | null | undefined;

/**
 * One structured fact row (e.g. a gene–drug–phenotype assertion).
 * Has no identity beyond its content.
 */
export type AnnotationInstance = {
  [field: string]: AnnotationValue;
};

/** A ground-truth record and the prediction it is being compared with */
export type AnnotationPair = [groundTruth: AnnotationInstance, prediction: AnnotationInstance];

/** Ground-truth records and predicted records for one article */
export type AnnotationSets = [groundTruths: AnnotationInstance[], predictions: AnnotationInstance[]];
