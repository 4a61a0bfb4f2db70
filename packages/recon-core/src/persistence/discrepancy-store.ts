/**
 * Discrepancy Store
 *
 * Writes the exception list of a run to
 * {dir}/discrepancies_{runId}_{YYYYMMDD_HHMMSS}.json
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { AnyDiscrepancy, DiscrepancySummary } from '../types/index.js';
import { ReconciliationError } from '../errors/index.js';
import { sanitizeFileComponent } from './run-log-store.js';

export interface DiscrepancyReport {
  runId: string;
  summary: DiscrepancySummary;
  exceptionList: AnyDiscrepancy[];
}

/** Content of a discrepancy file */
export interface DiscrepancyFile extends DiscrepancyReport {
  /** ISO 8601 */
  generatedAt: string;
}

/**
 * UTC timestamp for file names, e.g. 20240301_120000
 */
export function fileTimestamp(at: Date): string {
  const iso = at.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export class DiscrepancyStore {
  constructor(private readonly dir: string) {}

  get directory(): string {
    return this.dir;
  }

  /**
   * Write the report and return the file path
   */
  async save(report: DiscrepancyReport, generatedAt: Date = new Date()): Promise<string> {
    const fileName = `discrepancies_${sanitizeFileComponent(report.runId)}_${fileTimestamp(generatedAt)}.json`;
    const filePath = path.join(this.dir, fileName);
    const content: DiscrepancyFile = {
      runId: report.runId,
      generatedAt: generatedAt.toISOString(),
      summary: report.summary,
      exceptionList: report.exceptionList,
    };

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(filePath, `${JSON.stringify(content, null, 2)}\n`, 'utf-8');
    } catch (err) {
      throw new ReconciliationError({
        code: 'DISCREPANCY_LOG_ERROR',
        message: `Failed to write discrepancy file: ${filePath}`,
        suggestion: 'Check that the discrepancies directory is writable',
        cause: err instanceof Error ? err : undefined,
        context: { runId: report.runId },
      });
    }
    return filePath;
  }
}
