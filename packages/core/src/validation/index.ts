export {
  annotationValueSchema,
  annotationInstanceSchema,
  annotationListSchema,
  evaluatorOptionsSchema,
  fieldSpecSchema,
  consistencyFieldsSchema,
  schemaDescriptorSchema,
  fieldWeightsSchema,
  matchingThresholdSchema,
  formatZodError,
} from './schemas.js';
export type { FieldWeightsInput } from './schemas.js';
