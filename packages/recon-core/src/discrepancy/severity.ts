/**
 * Severity ordering
 */

import type { Severity } from '../types/index.js';

/** Lower rank is more severe */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  CRITICAL: 0,
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
};

/**
 * Comparator placing the most severe first
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * The more severe of two severities
 */
export function escalate(current: Severity, floor: Severity): Severity {
  return SEVERITY_RANK[floor] < SEVERITY_RANK[current] ? floor : current;
}

/** Fields whose mismatch always makes a transaction HIGH severity */
export const CRITICAL_FIELDS: ReadonlySet<string> = new Set(['amount', 'currency']);
