/**
 * Discrepancy Tracker
 *
 * Accumulates the discrepancies found during one run, assigns their IDs
 * and produces the summary and the severity-ordered exception list.
 */

import { randomUUID } from 'node:crypto';
import type { TransactionRecord } from '@txrecon/core';
import type {
  AnyDiscrepancy,
  Clock,
  Discrepancy,
  DiscrepancySummary,
  FieldDifference,
  Severity,
} from '../types/index.js';
import type { ReconciliationEventSink } from '../interfaces/index.js';
import { noopEventSink } from '../interfaces/index.js';
import { validationError } from '../errors/index.js';
import { round2, systemClock } from '../utils/clock.js';
import { deepFreeze } from '../utils/freeze.js';
import { CRITICAL_FIELDS, compareSeverity, escalate } from './severity.js';

export interface DiscrepancyTrackerOptions {
  /** Run identifier; an 8-character id is generated when omitted */
  runId?: string;
  events?: ReconciliationEventSink;
  clock?: Clock;
}

export class DiscrepancyTracker {
  readonly runId: string;
  private readonly events: ReconciliationEventSink;
  private readonly clock: Clock;
  private readonly discrepancies: AnyDiscrepancy[] = [];
  private sequence = 0;

  constructor(options: DiscrepancyTrackerOptions = {}) {
    if (options.runId !== undefined) {
      assertNonEmpty(options.runId, 'runId');
    }
    this.runId = options.runId ?? randomUUID().slice(0, 8);
    this.events = options.events ?? noopEventSink;
    this.clock = options.clock ?? systemClock;
  }

  /** Number of discrepancies recorded so far */
  get count(): number {
    return this.discrepancies.length;
  }

  hasDiscrepancies(): boolean {
    return this.discrepancies.length > 0;
  }

  /** Discrepancies in insertion order */
  getDiscrepancies(): AnyDiscrepancy[] {
    return [...this.discrepancies];
  }

  /**
   * Record a transaction present in the source but absent from the target.
   */
  recordMissing(
    transactionId: string,
    sourceSystem: string,
    targetSystem: string,
    transactionDetails: TransactionRecord,
    severity: Severity = 'HIGH'
  ): Discrepancy<'missing_record'> {
    assertNonEmpty(transactionId, 'transactionId');
    assertSystems(sourceSystem, targetSystem);

    const discrepancy = this.store<Discrepancy<'missing_record'>>({
      id: this.nextId(),
      kind: 'missing_record',
      severity,
      transactionId,
      description: `Transaction ${transactionId} missing in ${targetSystem}`,
      sourceSystem,
      targetSystem,
      details: {
        transaction: { ...transactionDetails },
        expectedIn: targetSystem,
        presentIn: sourceSystem,
      },
      timestamp: this.clock.now().toISOString(),
    });

    this.events.warn(
      `Missing record: ${transactionId} present in ${sourceSystem}, missing in ${targetSystem} | ` +
        `Amount: ${transactionDetails.amount ?? 'N/A'} ${transactionDetails.currency ?? ''}`.trimEnd(),
      {
        discrepancyId: discrepancy.id,
        transactionId,
        sourceSystem,
        targetSystem,
        amount: transactionDetails.amount,
        currency: transactionDetails.currency,
      }
    );

    return discrepancy;
  }

  /**
   * Record a transaction present on both sides whose compared fields differ.
   * A difference on amount or currency forces HIGH severity.
   */
  recordUnmatched(
    transactionId: string,
    sourceSystem: string,
    targetSystem: string,
    sourceDetails: TransactionRecord,
    targetDetails: TransactionRecord,
    fieldDifferences: readonly FieldDifference[],
    severity: Severity = 'MEDIUM'
  ): Discrepancy<'unmatched_transaction'> {
    assertNonEmpty(transactionId, 'transactionId');
    assertSystems(sourceSystem, targetSystem);
    if (fieldDifferences.length === 0) {
      throw validationError(
        `Unmatched transaction ${transactionId} needs at least one field difference`,
        { transactionId }
      );
    }

    const mismatchedFields = fieldDifferences.map((d) => d.field);
    const effective = mismatchedFields.some((f) => CRITICAL_FIELDS.has(f)) ? 'HIGH' : severity;

    const discrepancy = this.store<Discrepancy<'unmatched_transaction'>>({
      id: this.nextId(),
      kind: 'unmatched_transaction',
      severity: effective,
      transactionId,
      description: `Transaction ${transactionId} has ${fieldDifferences.length} field mismatch(es)`,
      sourceSystem,
      targetSystem,
      details: {
        sourceTransaction: { ...sourceDetails },
        targetTransaction: { ...targetDetails },
        fieldDifferences: fieldDifferences.map((d) => ({ ...d })),
        mismatchedFields,
      },
      timestamp: this.clock.now().toISOString(),
    });

    this.events.warn(
      `Unmatched transaction: ${transactionId} | Mismatched fields: ${mismatchedFields.join(', ')} | Severity: ${effective}`,
      { discrepancyId: discrepancy.id, transactionId, mismatchedFields, severity: effective }
    );

    return discrepancy;
  }

  /**
   * Record a transaction that occurs more than once in one system.
   */
  recordDuplicate(
    transactionId: string,
    system: string,
    occurrenceCount: number,
    transactionDetails: TransactionRecord,
    allOccurrences: readonly TransactionRecord[],
    severity: Severity = 'HIGH'
  ): Discrepancy<'duplicate_record'> {
    assertNonEmpty(transactionId, 'transactionId');
    assertNonEmpty(system, 'system');
    if (!Number.isInteger(occurrenceCount) || occurrenceCount <= 1) {
      throw validationError(
        `Duplicate record ${transactionId} needs an occurrence count above 1 (got ${occurrenceCount})`,
        { transactionId, occurrenceCount }
      );
    }

    const discrepancy = this.store<Discrepancy<'duplicate_record'>>({
      id: this.nextId(),
      kind: 'duplicate_record',
      severity,
      transactionId,
      description: `Transaction ${transactionId} appears ${occurrenceCount} times in ${system}`,
      sourceSystem: system,
      targetSystem: system,
      details: {
        occurrenceCount,
        primaryTransaction: { ...transactionDetails },
        allOccurrences: allOccurrences.map((r) => ({ ...r })),
        duplicateCount: occurrenceCount - 1,
      },
      timestamp: this.clock.now().toISOString(),
    });

    this.events.warn(
      `Duplicate record: ${transactionId} appears ${occurrenceCount} times in ${system}`,
      {
        discrepancyId: discrepancy.id,
        transactionId,
        system,
        occurrenceCount,
        amount: transactionDetails.amount,
        currency: transactionDetails.currency,
      }
    );

    return discrepancy;
  }

  /**
   * Record a mismatch between the record counts of the two systems.
   * Above 10% the severity is at least HIGH; above 25% it is CRITICAL.
   */
  recordCountDiscrepancy(
    sourceSystem: string,
    targetSystem: string,
    sourceCount: number,
    targetCount: number,
    category = 'total',
    severity: Severity = 'MEDIUM'
  ): Discrepancy<'count_discrepancy'> {
    assertSystems(sourceSystem, targetSystem);
    assertCount(sourceCount, 'sourceCount');
    assertCount(targetCount, 'targetCount');

    const difference = Math.abs(sourceCount - targetCount);
    const percentage = (difference / Math.max(sourceCount, 1)) * 100;

    let effective = severity;
    if (percentage > 25) {
      effective = 'CRITICAL';
    } else if (percentage > 10) {
      effective = escalate(severity, 'HIGH');
    }

    const label = titleCase(category);
    const discrepancy = this.store<Discrepancy<'count_discrepancy'>>({
      id: this.nextId(),
      kind: 'count_discrepancy',
      severity: effective,
      transactionId: null,
      description: `${label} count mismatch: ${sourceCount} vs ${targetCount}`,
      sourceSystem,
      targetSystem,
      details: {
        category,
        sourceCount,
        targetCount,
        difference,
        percentageDifference: round2(percentage),
        moreIn: sourceCount > targetCount ? sourceSystem : targetSystem,
      },
      timestamp: this.clock.now().toISOString(),
    });

    this.events.warn(
      `Count discrepancy: ${label} | ${sourceSystem}: ${sourceCount}, ${targetSystem}: ${targetCount} | ` +
        `Difference: ${difference} (${percentage.toFixed(1)}%)`,
      { discrepancyId: discrepancy.id, category, sourceCount, targetCount, severity: effective }
    );

    return discrepancy;
  }

  /**
   * All discrepancies, most severe first, then oldest first.
   * Ties keep insertion order.
   */
  getExceptionList(): AnyDiscrepancy[] {
    return this.discrepancies
      .map((discrepancy, index) => ({ discrepancy, index }))
      .sort(
        (a, b) =>
          compareSeverity(a.discrepancy.severity, b.discrepancy.severity) ||
          compareTimestamps(a.discrepancy.timestamp, b.discrepancy.timestamp) ||
          a.index - b.index
      )
      .map((entry) => entry.discrepancy);
  }

  getSummary(): DiscrepancySummary {
    const summary: DiscrepancySummary = {
      runId: this.runId,
      totalDiscrepancies: this.discrepancies.length,
      byType: {
        missingRecords: 0,
        unmatchedTransactions: 0,
        duplicateRecords: 0,
        countDiscrepancies: 0,
      },
      bySeverity: { critical: 0, high: 0, medium: 0, low: 0 },
    };

    for (const d of this.discrepancies) {
      switch (d.kind) {
        case 'missing_record':
          summary.byType.missingRecords++;
          break;
        case 'unmatched_transaction':
          summary.byType.unmatchedTransactions++;
          break;
        case 'duplicate_record':
          summary.byType.duplicateRecords++;
          break;
        case 'count_discrepancy':
          summary.byType.countDiscrepancies++;
          break;
      }

      switch (d.severity) {
        case 'CRITICAL':
          summary.bySeverity.critical++;
          break;
        case 'HIGH':
          summary.bySeverity.high++;
          break;
        case 'MEDIUM':
          summary.bySeverity.medium++;
          break;
        case 'LOW':
          summary.bySeverity.low++;
          break;
      }
    }

    return summary;
  }

  private nextId(): string {
    this.sequence++;
    return `DISC-${this.runId}-${String(this.sequence).padStart(4, '0')}`;
  }

  private store<D extends AnyDiscrepancy>(discrepancy: D): D {
    this.discrepancies.push(deepFreeze(discrepancy));
    return discrepancy;
  }
}

function compareTimestamps(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Capitalise each run of letters: "total_transactions" -> "Total_Transactions" */
function titleCase(value: string): string {
  return value.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
  );
}

function assertNonEmpty(value: unknown, name: string): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw validationError(`${name} must be a non-empty string`, { [name]: value });
  }
}

function assertSystems(sourceSystem: unknown, targetSystem: unknown): void {
  assertNonEmpty(sourceSystem, 'sourceSystem');
  assertNonEmpty(targetSystem, 'targetSystem');
}

function assertCount(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw validationError(`${name} must be a non-negative integer (got ${value})`, {
      [name]: value,
    });
  }
}
