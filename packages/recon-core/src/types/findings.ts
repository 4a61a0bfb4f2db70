/**
 * Matching Findings
 *
 * Conditions detected by the matching engine before they are recorded as
 * discrepancies.
 */

import type { TransactionRecord } from '@txrecon/core';
import type { FieldDifference, Severity } from './discrepancy.js';

interface FindingBase {
  transactionId: string;
  messageType: string;
  amount: number | string;
  currency: string;
  valueDate: string;
  /** Human-readable description of the condition */
  issue: string;
  severity: Severity;
}

/** Source record with no counterpart in the target */
export interface MissingFinding extends FindingBase {
  sourceRecord: TransactionRecord;
}

/** Transaction id occurring more than once in the target */
export interface DuplicateFinding extends FindingBase {
  occurrenceCount: number;
  /** Source record, or null for a target-only duplicate */
  sourceRecord: TransactionRecord | null;
  /** Every target occurrence in feed order */
  targetOccurrences: TransactionRecord[];
}

/** Source record whose first target occurrence differs on compared fields */
export interface DifferenceFinding extends FindingBase {
  differences: FieldDifference[];
  sourceRecord: TransactionRecord;
  targetRecord: TransactionRecord;
}

export interface MatchingOptions {
  /**
   * Also flag target duplicates whose id never appears in the source.
   * Default: false
   */
  flagTargetOnlyDuplicates?: boolean;
}
