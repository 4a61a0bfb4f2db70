/**
 * Utility functions for working with records
 */

import type { Record } from '../types/index.js';

/**
 * Extract all unique field names from an array of records, in first-seen order
 */
export function extractFieldNames(records: readonly Record[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * Own-property check that also works on null-prototype records
 */
export function hasField(record: object, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field);
}
