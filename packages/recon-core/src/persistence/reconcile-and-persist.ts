/**
 * Run a reconciliation and persist its run log and discrepancy file.
 */

import type { TransactionCollection } from '@txrecon/core';
import type { ReconciliationResult } from '../types/index.js';
import type { ReconciliationEventSink } from '../interfaces/index.js';
import { noopEventSink } from '../interfaces/index.js';
import { ReconciliationError } from '../errors/index.js';
import type { ReconciliationEngine } from '../reconciliation/reconciliation-engine.js';
import type { DiscrepancyStore } from './discrepancy-store.js';
import type { RunLogStore } from './run-log-store.js';

export interface ReconciliationStores {
  runLogs: RunLogStore;
  discrepancies: DiscrepancyStore;
}

export interface PersistedReconciliation {
  result: ReconciliationResult;
  runLogPath: string;
  discrepancyPath: string;
}

/**
 * Reconcile and write both artifacts. When the run fails, the run log is
 * still written and the original fault is re-thrown; a failure to write
 * that log is reported to `events`.
 */
export async function reconcileAndPersist(
  engine: ReconciliationEngine,
  source: TransactionCollection,
  target: TransactionCollection,
  stores: ReconciliationStores,
  events: ReconciliationEventSink = noopEventSink
): Promise<PersistedReconciliation> {
  let result: ReconciliationResult;
  try {
    result = engine.reconcile(source, target);
  } catch (error) {
    const record = engine.getRunRecord();
    if (record) {
      try {
        await stores.runLogs.save(record);
      } catch (saveError) {
        events.error('Failed to write run log for failed run', {
          runId: record.runId,
          error: saveError instanceof Error ? saveError.message : String(saveError),
        });
      }
    }
    throw error;
  }

  const record = engine.getRunRecord();
  if (!record) {
    throw new ReconciliationError({
      code: 'RECONCILIATION_ERROR',
      message: 'Reconciliation finished without a run record',
    });
  }

  const runLogPath = await stores.runLogs.save(record);
  const discrepancyPath = await stores.discrepancies.save({
    runId: result.summary.runId,
    summary: result.summary.discrepancySummary,
    exceptionList: result.exceptionList,
  });

  return { result, runLogPath, discrepancyPath };
}
