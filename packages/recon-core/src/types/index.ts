/**
 * Type exports for recon-core
 */

export type {
  DiscrepancyKind,
  Severity,
  FieldDifference,
  MissingRecordDetails,
  UnmatchedTransactionDetails,
  DuplicateRecordDetails,
  CountDiscrepancyDetails,
  DiscrepancyDetailsByKind,
  Discrepancy,
  AnyDiscrepancy,
  DiscrepancySummary,
} from './discrepancy.js';

export type {
  MissingFinding,
  DuplicateFinding,
  DifferenceFinding,
  MatchingOptions,
} from './findings.js';

export type {
  RunStatus,
  TerminalRunStatus,
  VolumeComparison,
  RunRecord,
  Clock,
} from './run.js';

export type { ReconciliationResultSummary, ReconciliationResult } from './result.js';
