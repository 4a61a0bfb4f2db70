/**
 * Discrepancy Types
 *
 * Taxonomy and shape of the discrepancies recorded during a run.
 */

import type { TransactionRecord } from '@txrecon/core';

/** Kind of discrepancy */
export type DiscrepancyKind =
  | 'missing_record'        // Present in source, absent from target
  | 'unmatched_transaction' // Present in both, key fields differ
  | 'duplicate_record'      // Same transaction appears more than once
  | 'count_discrepancy';    // Record counts differ between systems

/** Severity, most severe first */
export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

/**
 * A single differing field between a source and a target record.
 * Values are the string forms that were compared.
 */
export interface FieldDifference {
  field: string;
  sourceValue: string;
  targetValue: string;
}

export interface MissingRecordDetails {
  /** Copy of the source record */
  transaction: TransactionRecord;
  /** System that lacks the record */
  expectedIn: string;
  /** System that holds the record */
  presentIn: string;
}

export interface UnmatchedTransactionDetails {
  sourceTransaction: TransactionRecord;
  targetTransaction: TransactionRecord;
  fieldDifferences: FieldDifference[];
  mismatchedFields: string[];
}

export interface DuplicateRecordDetails {
  occurrenceCount: number;
  primaryTransaction: TransactionRecord;
  allOccurrences: TransactionRecord[];
  /** occurrenceCount - 1 */
  duplicateCount: number;
}

export interface CountDiscrepancyDetails {
  category: string;
  sourceCount: number;
  targetCount: number;
  difference: number;
  /** Rounded to 2 decimals */
  percentageDifference: number;
  /** System holding more records */
  moreIn: string;
}

/** Maps each kind to its details payload */
export interface DiscrepancyDetailsByKind {
  missing_record: MissingRecordDetails;
  unmatched_transaction: UnmatchedTransactionDetails;
  duplicate_record: DuplicateRecordDetails;
  count_discrepancy: CountDiscrepancyDetails;
}

/**
 * A recorded discrepancy. Frozen once created; embeds copies of the
 * records involved so the audit trail survives later source changes.
 */
export interface Discrepancy<K extends DiscrepancyKind = DiscrepancyKind> {
  /** DISC-<runId>-<NNNN>, sequence in insertion order */
  readonly id: string;
  readonly kind: K;
  readonly severity: Severity;
  /** Null for count-level discrepancies */
  readonly transactionId: string | null;
  readonly description: string;
  readonly sourceSystem: string;
  readonly targetSystem: string;
  readonly details: DiscrepancyDetailsByKind[K];
  /** Creation time, ISO 8601 */
  readonly timestamp: string;
}

/** Any discrepancy, discriminated on `kind` */
export type AnyDiscrepancy = {
  [K in DiscrepancyKind]: Discrepancy<K>;
}[DiscrepancyKind];

/**
 * Aggregate counts for one tracker
 */
export interface DiscrepancySummary {
  runId: string;
  totalDiscrepancies: number;
  byType: {
    missingRecords: number;
    unmatchedTransactions: number;
    duplicateRecords: number;
    countDiscrepancies: number;
  };
  bySeverity: {
    critical: number;
    high: number;
    medium: number;
    low: number;
  };
}
