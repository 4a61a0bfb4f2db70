/**
 * Schemas for run logs and discrepancy files read back from disk
 */

import { z } from 'zod';
import { transactionRecordSchema } from '@txrecon/core';

const severitySchema = z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW']);

const runStatusSchema = z.enum([
  'STARTED',
  'IN_PROGRESS',
  'COMPLETED_SUCCESS',
  'COMPLETED_WITH_DISCREPANCIES',
  'FAILED',
]);

const fieldDifferenceSchema = z.object({
  field: z.string(),
  sourceValue: z.string(),
  targetValue: z.string(),
});

const discrepancyBase = {
  id: z.string(),
  severity: severitySchema,
  transactionId: z.string().nullable(),
  description: z.string(),
  sourceSystem: z.string(),
  targetSystem: z.string(),
  timestamp: z.string(),
};

export const discrepancySchema = z.discriminatedUnion('kind', [
  z.object({
    ...discrepancyBase,
    kind: z.literal('missing_record'),
    details: z.object({
      transaction: transactionRecordSchema,
      expectedIn: z.string(),
      presentIn: z.string(),
    }),
  }),
  z.object({
    ...discrepancyBase,
    kind: z.literal('unmatched_transaction'),
    details: z.object({
      sourceTransaction: transactionRecordSchema,
      targetTransaction: transactionRecordSchema,
      fieldDifferences: z.array(fieldDifferenceSchema),
      mismatchedFields: z.array(z.string()),
    }),
  }),
  z.object({
    ...discrepancyBase,
    kind: z.literal('duplicate_record'),
    details: z.object({
      occurrenceCount: z.number().int(),
      primaryTransaction: transactionRecordSchema,
      allOccurrences: z.array(transactionRecordSchema),
      duplicateCount: z.number().int(),
    }),
  }),
  z.object({
    ...discrepancyBase,
    kind: z.literal('count_discrepancy'),
    details: z.object({
      category: z.string(),
      sourceCount: z.number().int(),
      targetCount: z.number().int(),
      difference: z.number().int(),
      percentageDifference: z.number(),
      moreIn: z.string(),
    }),
  }),
]);

const countSchema = z.number().int().nonnegative();

export const discrepancySummarySchema = z.object({
  runId: z.string(),
  totalDiscrepancies: countSchema,
  byType: z.object({
    missingRecords: countSchema,
    unmatchedTransactions: countSchema,
    duplicateRecords: countSchema,
    countDiscrepancies: countSchema,
  }),
  bySeverity: z.object({
    critical: countSchema,
    high: countSchema,
    medium: countSchema,
    low: countSchema,
  }),
});

export const volumeComparisonSchema = z.object({
  sourceSystem: z.string(),
  targetSystem: z.string(),
  sourceTotal: countSchema,
  targetTotal: countSchema,
  matchedCount: countSchema,
  unmatchedCount: countSchema,
  volumeDifference: countSchema,
  matchRate: z.number(),
});

export const runRecordSchema = z.object({
  runId: z.string().min(1),
  status: runStatusSchema,
  startTimestamp: z.string(),
  endTimestamp: z.string().nullable(),
  durationSeconds: z.number().nullable(),
  volumeComparison: volumeComparisonSchema.nullable(),
  discrepancySummary: discrepancySummarySchema.nullable(),
  exceptionList: z.array(discrepancySchema),
  success: z.boolean(),
  errorMessage: z.string().nullable(),
});
