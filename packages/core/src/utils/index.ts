export { isAbsent, toText, normalizeText, parseNumeric, extractFieldNames } from './values.js';
