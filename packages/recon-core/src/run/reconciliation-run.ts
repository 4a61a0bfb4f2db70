/**
 * Reconciliation Run
 *
 * Lifecycle of a single run: status transitions, volume comparison,
 * timing and the final run record.
 */

import { randomBytes } from 'node:crypto';
import type {
  Clock,
  RunRecord,
  RunStatus,
  TerminalRunStatus,
  VolumeComparison,
} from '../types/index.js';
import type { ReconciliationEventSink } from '../interfaces/index.js';
import { noopEventSink } from '../interfaces/index.js';
import { ReconciliationError, validationError } from '../errors/index.js';
import type { DiscrepancyTracker } from '../discrepancy/discrepancy-tracker.js';
import { round2, systemClock } from '../utils/clock.js';

const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set<TerminalRunStatus>([
  'COMPLETED_SUCCESS',
  'COMPLETED_WITH_DISCREPANCIES',
  'FAILED',
]);

export interface RunStartOptions {
  /** Run identifier; RUN-<YYYYMMDDHHMMSS>-<hex> when omitted */
  runId?: string;
  events?: ReconciliationEventSink;
  clock?: Clock;
}

/**
 * Build a run id from the UTC start time, e.g. RUN-20240301120000-a1b2
 */
export function generateRunId(at: Date): string {
  const stamp = at.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `RUN-${stamp}-${randomBytes(2).toString('hex')}`;
}

export function isTerminalStatus(status: RunStatus): status is TerminalRunStatus {
  return TERMINAL_STATUSES.has(status);
}

export class ReconciliationRun {
  readonly runId: string;
  private readonly events: ReconciliationEventSink;
  private readonly clock: Clock;
  private readonly startedAt: Date;
  private readonly startMark: number;

  private currentStatus: RunStatus = 'STARTED';
  private endedAt: Date | null = null;
  private durationSeconds: number | null = null;
  private tracker: DiscrepancyTracker | null = null;
  private volumeComparison: VolumeComparison | null = null;
  private errorMessage: string | null = null;

  private constructor(runId: string, events: ReconciliationEventSink, clock: Clock) {
    this.runId = runId;
    this.events = events;
    this.clock = clock;
    this.startedAt = clock.now();
    this.startMark = clock.monotonic();
  }

  /**
   * Start a new run in status STARTED.
   */
  static start(options: RunStartOptions = {}): ReconciliationRun {
    const clock = options.clock ?? systemClock;
    const runId = options.runId ?? generateRunId(clock.now());
    if (runId.length === 0) {
      throw validationError('runId must be a non-empty string');
    }

    const run = new ReconciliationRun(runId, options.events ?? noopEventSink, clock);
    run.events.info('Reconciliation run started', {
      runId,
      timestamp: run.startedAt.toISOString(),
    });
    return run;
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  get discrepancyTracker(): DiscrepancyTracker | null {
    return this.tracker;
  }

  /**
   * Associate the run's tracker and move to IN_PROGRESS.
   */
  attachTracker(tracker: DiscrepancyTracker): void {
    if (this.currentStatus !== 'STARTED') {
      throw this.stateError(`Cannot attach a tracker to run ${this.runId} in status ${this.currentStatus}`);
    }
    this.tracker = tracker;
    this.currentStatus = 'IN_PROGRESS';
    this.events.debug('Discrepancy tracker attached', { runId: this.runId, trackerRunId: tracker.runId });
  }

  /**
   * Record the record volumes of both systems.
   */
  recordVolumeComparison(
    sourceSystem: string,
    targetSystem: string,
    sourceTotal: number,
    targetTotal: number,
    matchedCount: number
  ): VolumeComparison {
    this.assertNotTerminal('record a volume comparison');
    for (const [name, value] of [
      ['sourceTotal', sourceTotal],
      ['targetTotal', targetTotal],
      ['matchedCount', matchedCount],
    ] as const) {
      if (!Number.isInteger(value) || value < 0) {
        throw validationError(`${name} must be a non-negative integer (got ${value})`, { [name]: value });
      }
    }
    if (matchedCount > sourceTotal) {
      throw validationError(
        `matchedCount (${matchedCount}) cannot exceed sourceTotal (${sourceTotal})`,
        { matchedCount, sourceTotal }
      );
    }

    const comparison: VolumeComparison = {
      sourceSystem,
      targetSystem,
      sourceTotal,
      targetTotal,
      matchedCount,
      unmatchedCount: sourceTotal - matchedCount,
      volumeDifference: Math.abs(sourceTotal - targetTotal),
      matchRate: round2((matchedCount / Math.max(sourceTotal, 1)) * 100),
    };
    this.volumeComparison = comparison;

    this.events.info(
      `Volume comparison: ${sourceSystem} ${sourceTotal}, ${targetSystem} ${targetTotal}, ` +
        `matched ${matchedCount} (${comparison.matchRate}%)`,
      { runId: this.runId, ...comparison }
    );
    return comparison;
  }

  /**
   * Emit the tracker's summary as a single event
   */
  logDiscrepancySummary(): void {
    if (!this.tracker) {
      this.events.warn('No discrepancy tracker attached; cannot log discrepancy summary', {
        runId: this.runId,
      });
      return;
    }
    const summary = this.tracker.getSummary();
    this.events.info(`Record-level discrepancies: ${summary.totalDiscrepancies}`, { ...summary });
  }

  /**
   * Emit every exception, most severe first
   */
  logExceptionList(): void {
    if (!this.tracker) {
      this.events.warn('No discrepancy tracker attached; cannot log exception list', {
        runId: this.runId,
      });
      return;
    }

    const exceptions = this.tracker.getExceptionList();
    if (exceptions.length === 0) {
      this.events.info('No exceptions found; all records reconciled', { runId: this.runId });
      return;
    }

    exceptions.forEach((exception, i) => {
      this.events.info(
        `${i + 1}. [${exception.severity}] ${exception.kind.toUpperCase()} | ID: ${exception.id} | ` +
          `TXN: ${exception.transactionId ?? 'N/A'} | ${exception.description}`,
        { runId: this.runId, discrepancyId: exception.id }
      );
    });
  }

  /**
   * Close the run. Status becomes FAILED when `success` is false, otherwise
   * COMPLETED_WITH_DISCREPANCIES or COMPLETED_SUCCESS.
   */
  finalize(success: boolean, errorMessage?: string): TerminalRunStatus {
    this.assertNotTerminal('finalize');

    this.endedAt = this.clock.now();
    this.durationSeconds = Math.max(0, (this.clock.monotonic() - this.startMark) / 1000);
    this.errorMessage = errorMessage ?? null;

    let status: TerminalRunStatus;
    if (!success) {
      status = 'FAILED';
    } else if (this.tracker?.hasDiscrepancies()) {
      status = 'COMPLETED_WITH_DISCREPANCIES';
    } else {
      status = 'COMPLETED_SUCCESS';
    }
    this.currentStatus = status;

    const fields = {
      runId: this.runId,
      status,
      durationSeconds: this.durationSeconds,
      discrepancies: this.tracker?.count ?? 0,
    };
    switch (status) {
      case 'COMPLETED_SUCCESS':
        this.events.info('Reconciliation run completed: all records reconciled', fields);
        break;
      case 'COMPLETED_WITH_DISCREPANCIES':
        this.events.warn(
          `Reconciliation run completed with ${fields.discrepancies} discrepancies; review required`,
          fields
        );
        break;
      case 'FAILED':
        this.events.error(`Reconciliation run failed${errorMessage ? `: ${errorMessage}` : ''}`, fields);
        break;
    }

    return status;
  }

  /**
   * Snapshot of the run for persistence
   */
  toRecord(): RunRecord {
    return {
      runId: this.runId,
      status: this.currentStatus,
      startTimestamp: this.startedAt.toISOString(),
      endTimestamp: this.endedAt ? this.endedAt.toISOString() : null,
      durationSeconds: this.durationSeconds,
      volumeComparison: this.volumeComparison ? { ...this.volumeComparison } : null,
      discrepancySummary: this.tracker ? this.tracker.getSummary() : null,
      exceptionList: this.tracker ? this.tracker.getExceptionList() : [],
      success:
        this.currentStatus === 'COMPLETED_SUCCESS' ||
        this.currentStatus === 'COMPLETED_WITH_DISCREPANCIES',
      errorMessage: this.errorMessage,
    };
  }

  private assertNotTerminal(action: string): void {
    if (isTerminalStatus(this.currentStatus)) {
      throw this.stateError(`Cannot ${action} run ${this.runId}: already ${this.currentStatus}`);
    }
  }

  private stateError(message: string): ReconciliationError {
    return new ReconciliationError({
      code: 'INVALID_RUN_STATE',
      message,
      context: { runId: this.runId, status: this.currentStatus },
    });
  }
}
