/**
 * Formatter Utilities
 *
 * Shared helpers for report formatting.
 */

import type { AnyDiscrepancy } from '../types/index.js';

/**
 * One exception line: [SEVERITY] KIND | ID | TXN | description
 */
export function formatExceptionLine(exception: AnyDiscrepancy): string {
  return [
    `[${exception.severity}] ${exception.kind.toUpperCase()}`,
    exception.id,
    exception.transactionId ?? 'N/A',
    exception.description,
  ].join(' | ');
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}
