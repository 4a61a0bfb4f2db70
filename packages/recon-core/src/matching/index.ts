export { MatchingEngine } from './matching-engine.js';
export type { MatchingEngineOptions } from './matching-engine.js';
export { FieldComparator, COMMON_FIELDS, TYPE_SPECIFIC_FIELDS } from './field-comparator.js';
