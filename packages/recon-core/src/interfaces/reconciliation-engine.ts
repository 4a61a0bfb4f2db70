/**
 * Reconciliation Engine Interface
 */

import type { TransactionCollection } from '@txrecon/core';
import type { ReconciliationResult, RunRecord } from '../types/index.js';

/**
 * Reconciles two transaction collections in a single tracked run.
 */
export interface IReconciliationEngine {
  readonly sourceSystem: string;
  readonly targetSystem: string;

  /**
   * Run one reconciliation of the source collection against the target.
   *
   * A fault during the run marks it FAILED and is re-thrown; the failed
   * run stays available through `getRunRecord()`.
   */
  reconcile(source: TransactionCollection, target: TransactionCollection): ReconciliationResult;

  /** Snapshot of the most recent run, or null before the first call */
  getRunRecord(): RunRecord | null;
}
