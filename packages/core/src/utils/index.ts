export { extractFieldNames, hasField } from './records.js';
