/**
 * Exception list export
 *
 * Flattens an exception list into CSV for spreadsheet review.
 */

import { writeFile } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';

/** Fields of a discrepancy written to the export */
export interface ExceptionRow {
  id: string;
  kind: string;
  severity: string;
  transactionId: string | null;
  description: string;
  sourceSystem: string;
  targetSystem: string;
  timestamp: string;
}

export interface ExceptionCsvOptions {
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

export const EXCEPTION_CSV_COLUMNS = [
  { key: 'id', header: 'discrepancy_id' },
  { key: 'severity', header: 'severity' },
  { key: 'kind', header: 'discrepancy_type' },
  { key: 'transactionId', header: 'transaction_id' },
  { key: 'description', header: 'description' },
  { key: 'sourceSystem', header: 'source_system' },
  { key: 'targetSystem', header: 'target_system' },
  { key: 'timestamp', header: 'timestamp' },
] as const satisfies ReadonlyArray<{ key: keyof ExceptionRow; header: string }>;

function sanitizeFormulaValue(value: string, enabled: boolean, prefix: string): string {
  if (!enabled) return value;
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

/**
 * Render the exception list as CSV with a header row
 */
export function formatExceptionCsv(
  exceptions: readonly ExceptionRow[],
  options: ExceptionCsvOptions = {}
): string {
  const sanitize = options.sanitizeFormulas !== false;
  const prefix = options.formulaEscapePrefix ?? "'";

  const rows = exceptions.map((exception) =>
    EXCEPTION_CSV_COLUMNS.map(({ key }) =>
      sanitizeFormulaValue(exception[key] ?? '', sanitize, prefix)
    )
  );

  return stringify(rows, {
    header: true,
    columns: EXCEPTION_CSV_COLUMNS.map(({ header }) => header),
  });
}

/**
 * Write the exception list CSV and return the path
 */
export async function writeExceptionCsv(
  filePath: string,
  exceptions: readonly ExceptionRow[],
  options?: ExceptionCsvOptions
): Promise<string> {
  await writeFile(filePath, formatExceptionCsv(exceptions, options), 'utf-8');
  return filePath;
}
