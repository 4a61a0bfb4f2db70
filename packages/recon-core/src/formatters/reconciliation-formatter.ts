/**
 * Reconciliation Result Formatter
 *
 * Formats a reconciliation result as plain text for terminal output.
 */

import type { ReconciliationResult, RunRecord } from '../types/index.js';
import { formatExceptionLine, formatPercent } from './utils.js';

/** Exceptions listed before the remainder is summarised */
export const MAX_LISTED_EXCEPTIONS = 20;

/**
 * Format a reconciliation result, optionally with its run record
 */
export function formatReconciliationResult(
  result: ReconciliationResult,
  runRecord?: RunRecord | null
): string {
  const lines: string[] = [];
  const { summary } = result;

  // Header
  lines.push(`## Reconciliation Report`);
  lines.push(`Run: ${summary.runId}`);
  lines.push(`Date: ${summary.reconciliationDate}`);
  if (runRecord) {
    lines.push(`Status: ${runRecord.status}`);
    if (runRecord.durationSeconds !== null) {
      lines.push(`Duration: ${runRecord.durationSeconds.toFixed(2)}s`);
    }
  }
  lines.push('');

  // Summary
  lines.push(`### Summary`);
  lines.push(`- Source Records: ${summary.totalSource}`);
  lines.push(`- Target Records: ${summary.totalTarget}`);
  lines.push(`- Matched: ${summary.matched}`);
  lines.push(`- Missing in Target: ${summary.missingCount}`);
  lines.push(`- Field Mismatches: ${summary.differencesCount}`);
  lines.push(`- Duplicates: ${summary.duplicatesCount}`);
  lines.push('');

  const volume = runRecord?.volumeComparison;
  if (volume) {
    lines.push(`### Volume Comparison`);
    lines.push(`- ${volume.sourceSystem}: ${volume.sourceTotal} records`);
    lines.push(`- ${volume.targetSystem}: ${volume.targetTotal} records`);
    lines.push(`- Volume Difference: ${volume.volumeDifference}`);
    lines.push(`- Unmatched: ${volume.unmatchedCount}`);
    lines.push(`- Match Rate: ${formatPercent(volume.matchRate)}`);
    lines.push('');
  }

  const { bySeverity, totalDiscrepancies } = summary.discrepancySummary;
  lines.push(`### Discrepancies (${totalDiscrepancies})`);
  lines.push(`- CRITICAL: ${bySeverity.critical}`);
  lines.push(`- HIGH: ${bySeverity.high}`);
  lines.push(`- MEDIUM: ${bySeverity.medium}`);
  lines.push(`- LOW: ${bySeverity.low}`);
  lines.push('');

  // Exceptions
  const exceptions = result.exceptionList;
  if (exceptions.length === 0) {
    lines.push(`### Exceptions`);
    lines.push(`No exceptions found. All records reconciled.`);
  } else {
    const shown = exceptions.slice(0, MAX_LISTED_EXCEPTIONS);
    lines.push(
      exceptions.length > shown.length
        ? `### Exceptions (showing first ${shown.length} of ${exceptions.length})`
        : `### Exceptions (${exceptions.length})`
    );
    for (const exception of shown) {
      lines.push(formatExceptionLine(exception));
    }
    if (exceptions.length > shown.length) {
      lines.push(`... and ${exceptions.length - shown.length} more`);
    }
  }

  if (runRecord?.errorMessage) {
    lines.push('');
    lines.push(`Error: ${runRecord.errorMessage}`);
  }

  return lines.join('\n');
}
