export { InstanceMatcher, DEFAULT_MATCHING_THRESHOLD } from './instance-matcher.js';
export { alignByKey } from './key-aligner.js';
