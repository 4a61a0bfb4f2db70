/**
 * Matching Engine
 *
 * Indexes two transaction collections by transaction_id and detects
 * missing, duplicated and mismatched records between them.
 */

import type { TransactionCollection, TransactionRecord } from '@txrecon/core';
import { formatValidationErrors, validateTransactionRecord } from '@txrecon/core';
import type {
  DifferenceFinding,
  DuplicateFinding,
  MatchingOptions,
  MissingFinding,
} from '../types/index.js';
import type { ReconciliationEventSink } from '../interfaces/index.js';
import { noopEventSink } from '../interfaces/index.js';
import { validationError } from '../errors/index.js';
import { FieldComparator } from './field-comparator.js';

export interface MatchingEngineOptions extends MatchingOptions {
  /** Target system name used in finding descriptions. Default: 'target system' */
  targetSystem?: string;
  events?: ReconciliationEventSink;
}

type Side = 'source' | 'target';

export class MatchingEngine {
  private readonly sourceIndex = new Map<string, TransactionRecord>();
  private readonly targetIndex = new Map<string, TransactionRecord[]>();
  private readonly sourceDuplicates = new Set<string>();
  private readonly comparator = new FieldComparator();
  private readonly targetSystem: string;
  private readonly flagTargetOnlyDuplicates: boolean;

  constructor(
    source: TransactionCollection,
    target: TransactionCollection,
    options: MatchingEngineOptions = {}
  ) {
    this.targetSystem = options.targetSystem ?? 'target system';
    this.flagTargetOnlyDuplicates = options.flagTargetOnlyDuplicates ?? false;
    const events = options.events ?? noopEventSink;

    source.forEach((record, position) => {
      assertValidRecord(record, 'source', position);
      const id = record.transaction_id;
      if (this.sourceIndex.has(id)) {
        this.sourceDuplicates.add(id);
      } else {
        this.sourceIndex.set(id, record);
      }
    });

    target.forEach((record, position) => {
      assertValidRecord(record, 'target', position);
      const bucket = this.targetIndex.get(record.transaction_id);
      if (bucket) bucket.push(record);
      else this.targetIndex.set(record.transaction_id, [record]);
    });

    if (this.sourceDuplicates.size > 0) {
      events.debug(
        `Source contains ${this.sourceDuplicates.size} repeated transaction id(s); first occurrence used`,
        { transactionIds: [...this.sourceDuplicates] }
      );
    }
  }

  /**
   * Ids repeated in the source collection. Only the first occurrence of
   * each takes part in matching.
   */
  sourceDuplicateIds(): string[] {
    return [...this.sourceDuplicates];
  }

  /**
   * Source transactions with no target record of the same id
   */
  findMissing(): MissingFinding[] {
    const missing: MissingFinding[] = [];

    for (const [id, record] of this.sourceIndex) {
      if (this.targetIndex.has(id)) continue;
      missing.push({
        transactionId: id,
        messageType: record.message_type,
        amount: record.amount,
        currency: record.currency,
        valueDate: record.value_date,
        sourceRecord: record,
        issue: `Missing in ${this.targetSystem}`,
        severity: 'HIGH',
      });
    }

    return missing;
  }

  /**
   * Target transaction ids occurring more than once, in target first-seen
   * order. Ids absent from the source are included only with
   * `flagTargetOnlyDuplicates`.
   */
  findDuplicates(): DuplicateFinding[] {
    const duplicates: DuplicateFinding[] = [];

    for (const [id, occurrences] of this.targetIndex) {
      const [first] = occurrences;
      if (occurrences.length <= 1 || !first) continue;

      const sourceRecord = this.sourceIndex.get(id);
      if (sourceRecord) {
        duplicates.push(this.duplicateFinding(id, sourceRecord, sourceRecord, occurrences));
      } else if (this.flagTargetOnlyDuplicates) {
        duplicates.push(this.duplicateFinding(id, first, null, occurrences));
      }
    }

    return duplicates;
  }

  /**
   * Transactions present on both sides whose compared fields differ.
   * Only the first target occurrence is compared.
   */
  findDifferences(): DifferenceFinding[] {
    const findings: DifferenceFinding[] = [];

    for (const [id, sourceRecord] of this.sourceIndex) {
      const targetRecord = this.targetIndex.get(id)?.[0];
      if (!targetRecord) continue;

      const differences = this.comparator.compareRecords(sourceRecord, targetRecord);
      if (differences.length === 0) continue;

      findings.push({
        transactionId: id,
        messageType: sourceRecord.message_type,
        amount: sourceRecord.amount,
        currency: sourceRecord.currency,
        valueDate: sourceRecord.value_date,
        differences,
        sourceRecord,
        targetRecord,
        issue: `${differences.length} field(s) mismatch`,
        severity: this.comparator.hasCriticalDifference(differences) ? 'HIGH' : 'MEDIUM',
      });
    }

    return findings;
  }

  private duplicateFinding(
    id: string,
    primary: TransactionRecord,
    sourceRecord: TransactionRecord | null,
    occurrences: TransactionRecord[]
  ): DuplicateFinding {
    return {
      transactionId: id,
      messageType: primary.message_type,
      amount: primary.amount,
      currency: primary.currency,
      valueDate: primary.value_date,
      occurrenceCount: occurrences.length,
      sourceRecord,
      targetOccurrences: [...occurrences],
      issue: `Appears ${occurrences.length} times in ${this.targetSystem}`,
      severity: 'HIGH',
    };
  }
}

function assertValidRecord(record: unknown, side: Side, position: number): void {
  const result = validateTransactionRecord(record);
  if (!result.valid) {
    throw validationError(
      `Invalid ${side} record at index ${position}: ${formatValidationErrors(result.errors)}`,
      { side, index: position, errors: result.errors }
    );
  }
}
