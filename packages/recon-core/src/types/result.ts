/**
 * Reconciliation Result
 *
 * Value returned by a completed run.
 */

import type { AnyDiscrepancy, DiscrepancySummary } from './discrepancy.js';
import type { DifferenceFinding, DuplicateFinding, MissingFinding } from './findings.js';

export interface ReconciliationResultSummary {
  runId: string;
  totalSource: number;
  totalTarget: number;
  /** totalSource - missingCount - differencesCount */
  matched: number;
  missingCount: number;
  differencesCount: number;
  duplicatesCount: number;
  /** ISO 8601 */
  reconciliationDate: string;
  discrepancySummary: DiscrepancySummary;
}

export interface ReconciliationResult {
  summary: ReconciliationResultSummary;
  missingTransactions: MissingFinding[];
  duplicateTransactions: DuplicateFinding[];
  transactionsWithDifferences: DifferenceFinding[];
  /** All discrepancies, most severe first */
  exceptionList: AnyDiscrepancy[];
}
