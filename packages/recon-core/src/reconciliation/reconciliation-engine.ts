/**
 * Reconciliation Engine
 *
 * Reconciles a source transaction collection against a target collection
 * in one tracked run.
 */

import type { TransactionCollection } from '@txrecon/core';
import type { IReconciliationEngine, ReconciliationEventSink } from '../interfaces/index.js';
import { noopEventSink } from '../interfaces/index.js';
import type { Clock, ReconciliationResult, RunRecord } from '../types/index.js';
import { DiscrepancyTracker } from '../discrepancy/discrepancy-tracker.js';
import { MatchingEngine } from '../matching/matching-engine.js';
import { ReconciliationRun, isTerminalStatus } from '../run/reconciliation-run.js';
import { systemClock } from '../utils/clock.js';

export const DEFAULT_SOURCE_SYSTEM = 'Payment Platform';
export const DEFAULT_TARGET_SYSTEM = 'Compliance System';

export interface ReconciliationEngineOptions {
  /** Default: 'Payment Platform' */
  sourceSystem?: string;
  /** Default: 'Compliance System' */
  targetSystem?: string;
  /** Fixed run id; generated per run when omitted */
  runId?: string;
  events?: ReconciliationEventSink;
  clock?: Clock;
  /** Also flag duplicates of ids the source never had. Default: false */
  flagTargetOnlyDuplicates?: boolean;
}

/**
 * Reconciliation Engine Implementation
 *
 * Each call to `reconcile` starts a fresh run and tracker; nothing is
 * shared between runs.
 */
export class ReconciliationEngine implements IReconciliationEngine {
  readonly sourceSystem: string;
  readonly targetSystem: string;
  private readonly runId?: string;
  private readonly events: ReconciliationEventSink;
  private readonly clock: Clock;
  private readonly flagTargetOnlyDuplicates: boolean;
  private lastRun: ReconciliationRun | null = null;

  constructor(options: ReconciliationEngineOptions = {}) {
    this.sourceSystem = options.sourceSystem ?? DEFAULT_SOURCE_SYSTEM;
    this.targetSystem = options.targetSystem ?? DEFAULT_TARGET_SYSTEM;
    this.runId = options.runId;
    this.events = options.events ?? noopEventSink;
    this.clock = options.clock ?? systemClock;
    this.flagTargetOnlyDuplicates = options.flagTargetOnlyDuplicates ?? false;
  }

  /**
   * Reconcile the source collection against the target.
   */
  reconcile(source: TransactionCollection, target: TransactionCollection): ReconciliationResult {
    const run = ReconciliationRun.start({
      runId: this.runId,
      events: this.events,
      clock: this.clock,
    });
    this.lastRun = run;

    try {
      const tracker = new DiscrepancyTracker({
        runId: run.runId,
        events: this.events,
        clock: this.clock,
      });
      run.attachTracker(tracker);

      const matcher = new MatchingEngine(source, target, {
        targetSystem: this.targetSystem,
        flagTargetOnlyDuplicates: this.flagTargetOnlyDuplicates,
        events: this.events,
      });
      const missing = matcher.findMissing();
      const duplicates = matcher.findDuplicates();
      const differences = matcher.findDifferences();

      for (const finding of missing) {
        tracker.recordMissing(
          finding.transactionId,
          this.sourceSystem,
          this.targetSystem,
          finding.sourceRecord,
          finding.severity
        );
      }

      for (const finding of duplicates) {
        const primary = finding.sourceRecord ?? finding.targetOccurrences[0];
        if (!primary) continue;
        tracker.recordDuplicate(
          finding.transactionId,
          this.targetSystem,
          finding.occurrenceCount,
          primary,
          finding.targetOccurrences,
          finding.severity
        );
      }

      for (const finding of differences) {
        tracker.recordUnmatched(
          finding.transactionId,
          this.sourceSystem,
          this.targetSystem,
          finding.sourceRecord,
          finding.targetRecord,
          finding.differences,
          finding.severity
        );
      }

      const totalSource = source.length;
      const totalTarget = target.length;
      if (totalSource !== totalTarget) {
        tracker.recordCountDiscrepancy(
          this.sourceSystem,
          this.targetSystem,
          totalSource,
          totalTarget,
          'total_transactions'
        );
      }

      const matched = totalSource - missing.length - differences.length;
      run.recordVolumeComparison(
        this.sourceSystem,
        this.targetSystem,
        totalSource,
        totalTarget,
        matched
      );
      run.logDiscrepancySummary();
      run.logExceptionList();
      run.finalize(true);

      const discrepancySummary = tracker.getSummary();
      return {
        summary: {
          runId: run.runId,
          totalSource,
          totalTarget,
          matched,
          missingCount: missing.length,
          differencesCount: differences.length,
          duplicatesCount: duplicates.length,
          reconciliationDate: this.clock.now().toISOString(),
          discrepancySummary,
        },
        missingTransactions: missing,
        duplicateTransactions: duplicates,
        transactionsWithDifferences: differences,
        exceptionList: tracker.getExceptionList(),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (!isTerminalStatus(run.status)) {
        run.finalize(false, message);
      }
      throw error;
    }
  }

  /** The most recent run, or null before the first call */
  getRun(): ReconciliationRun | null {
    return this.lastRun;
  }

  getRunRecord(): RunRecord | null {
    return this.lastRun ? this.lastRun.toRecord() : null;
  }
}
