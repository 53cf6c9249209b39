export {
  ConsistencyValidator,
  DEFAULT_PENALTY_PER_ISSUE,
  DEFAULT_MAX_PENALTY,
} from './consistency-validator.js';
export type { ConsistencyValidatorOptions, PenaltyOutcome } from './consistency-validator.js';
export {
  checkReferentialIntegrity,
  checkStatisticalSign,
  checkIntervalOrder,
  checkIntervalContainment,
  checkFrequencyBounds,
  BUILT_IN_CHECKS,
  SIGNIFICANCE_LEVEL,
} from './checks.js';
