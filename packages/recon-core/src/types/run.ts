/**
 * Run Types
 *
 * Lifecycle and audit record of a single reconciliation run.
 */

import type { AnyDiscrepancy, DiscrepancySummary } from './discrepancy.js';

/**
 * Run status. STARTED -> IN_PROGRESS -> one terminal status.
 */
export type RunStatus =
  | 'STARTED'
  | 'IN_PROGRESS'
  | 'COMPLETED_SUCCESS'
  | 'COMPLETED_WITH_DISCREPANCIES'
  | 'FAILED';

export type TerminalRunStatus = Extract<
  RunStatus,
  'COMPLETED_SUCCESS' | 'COMPLETED_WITH_DISCREPANCIES' | 'FAILED'
>;

/**
 * Record volumes on both sides of a run
 */
export interface VolumeComparison {
  sourceSystem: string;
  targetSystem: string;
  sourceTotal: number;
  targetTotal: number;
  matchedCount: number;
  /** sourceTotal - matchedCount */
  unmatchedCount: number;
  /** |sourceTotal - targetTotal| */
  volumeDifference: number;
  /** Percentage of source records matched, rounded to 2 decimals */
  matchRate: number;
}

/**
 * Serialized run log entry
 */
export interface RunRecord {
  runId: string;
  status: RunStatus;
  /** ISO 8601 */
  startTimestamp: string;
  /** ISO 8601, null until finalized */
  endTimestamp: string | null;
  /** Null until finalized */
  durationSeconds: number | null;
  volumeComparison: VolumeComparison | null;
  /** Null when no tracker was attached */
  discrepancySummary: DiscrepancySummary | null;
  exceptionList: AnyDiscrepancy[];
  /** True for either completed status */
  success: boolean;
  errorMessage: string | null;
}

/** Time sources; injectable for tests */
export interface Clock {
  /** Wall-clock time used for timestamps */
  now(): Date;
  /** Monotonic milliseconds used for durations */
  monotonic(): number;
}
