/**
 * Run History Formatter
 */

import type { RunRecord } from '../types/index.js';
import { formatPercent } from './utils.js';

/**
 * One line per run, newest first as given
 */
export function formatRunHistory(records: readonly RunRecord[]): string {
  if (records.length === 0) {
    return 'No reconciliation runs recorded.';
  }

  const lines: string[] = [`## Run History (${records.length})`];
  for (const record of records) {
    const discrepancies = record.discrepancySummary?.totalDiscrepancies ?? 0;
    const matchRate = record.volumeComparison
      ? formatPercent(record.volumeComparison.matchRate)
      : 'n/a';
    lines.push(
      `${record.runId} | ${record.status} | ${record.startTimestamp} | ` +
        `discrepancies: ${discrepancies} | match rate: ${matchRate}`
    );
  }
  return lines.join('\n');
}
