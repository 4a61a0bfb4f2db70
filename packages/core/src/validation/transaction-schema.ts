/**
 * Zod schemas for validating transaction records at the ingestion boundary
 */

import { z } from 'zod';
import type { TransactionRecord, ValidationError } from '../types/index.js';

/** Any extra field carried by a record */
export const fieldValueSchema = z.union([z.string(), z.number(), z.null()]);

/** Common base every transaction record must satisfy */
export const transactionRecordSchema = z
  .object({
    transaction_id: z.string().min(1, 'Must be a non-empty string'),
    message_type: z.string().min(1, 'Must be a non-empty string'),
    amount: z.union([z.number().finite(), z.string().min(1)]),
    currency: z.string().min(1, 'Must be a non-empty string'),
    value_date: z.string().min(1, 'Must be a non-empty string'),
  })
  .catchall(fieldValueSchema);

export type TransactionValidation =
  | { valid: true; record: TransactionRecord }
  | { valid: false; errors: ValidationError[] };

/**
 * Validate a single raw record. Field errors carry the dotted path of the
 * offending value.
 */
export function validateTransactionRecord(value: unknown): TransactionValidation {
  const result = transactionRecordSchema.safeParse(value);
  if (result.success) {
    return { valid: true, record: result.data };
  }

  return {
    valid: false,
    errors: result.error.issues.map((issue) => ({
      field: issue.path.length ? issue.path.join('.') : '(record)',
      message: issue.message,
    })),
  };
}

/**
 * Render validation errors as a single line, e.g.
 * `currency: Required; amount: Expected number, received boolean`
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.field}: ${e.message}`).join('; ');
}
