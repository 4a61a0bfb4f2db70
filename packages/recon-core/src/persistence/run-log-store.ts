/**
 * Run Log Store
 *
 * One pretty-printed JSON file per run: {dir}/run_log_{runId}.json
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { RunRecord } from '../types/index.js';
import { ReconciliationError } from '../errors/index.js';
import { runRecordSchema } from './run-record-schema.js';

const FILE_PREFIX = 'run_log_';
const FILE_SUFFIX = '.json';

/**
 * Replace characters that are unsafe in file names
 */
export function sanitizeFileComponent(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, '_');
}

export class RunLogStore {
  constructor(private readonly dir: string) {}

  get directory(): string {
    return this.dir;
  }

  filePathFor(runId: string): string {
    return path.join(this.dir, `${FILE_PREFIX}${sanitizeFileComponent(runId)}${FILE_SUFFIX}`);
  }

  /**
   * Write the run record, replacing any earlier log of the same run.
   * Returns the file path.
   */
  async save(record: RunRecord): Promise<string> {
    const filePath = this.filePathFor(record.runId);
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    } catch (err) {
      throw new ReconciliationError({
        code: 'RUN_LOG_ERROR',
        message: `Failed to write run log: ${filePath}`,
        suggestion: 'Check that the run log directory is writable',
        cause: err instanceof Error ? err : undefined,
        context: { runId: record.runId },
      });
    }
    return filePath;
  }

  /**
   * Read one run log. Returns null when no log exists for the run.
   */
  async read(runId: string): Promise<RunRecord | null> {
    const filePath = this.filePathFor(runId);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new ReconciliationError({
        code: 'RUN_LOG_ERROR',
        message: `Failed to read run log: ${filePath}`,
        cause: err instanceof Error ? err : undefined,
        context: { runId },
      });
    }

    const record = parseRunRecord(content);
    if (!record) {
      throw new ReconciliationError({
        code: 'RUN_LOG_ERROR',
        message: `Run log is not a valid run record: ${filePath}`,
        suggestion: 'Remove or repair the file',
        context: { runId },
      });
    }
    return record;
  }

  /**
   * All readable run logs, newest first. Files that do not parse are skipped.
   */
  async list(): Promise<RunRecord[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new ReconciliationError({
        code: 'RUN_LOG_ERROR',
        message: `Failed to list run logs in ${this.dir}`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const records: RunRecord[] = [];
    for (const file of files) {
      if (!file.startsWith(FILE_PREFIX) || !file.endsWith(FILE_SUFFIX)) continue;
      const filePath = path.join(this.dir, file);
      let content: string;
      try {
        content = await fs.readFile(filePath, 'utf-8');
      } catch (err) {
        throw new ReconciliationError({
          code: 'RUN_LOG_ERROR',
          message: `Failed to read run log: ${filePath}`,
          cause: err instanceof Error ? err : undefined,
        });
      }
      const record = parseRunRecord(content);
      if (record) records.push(record);
    }

    return records.sort(
      (a, b) => Date.parse(b.startTimestamp) - Date.parse(a.startTimestamp)
    );
  }
}

function parseRunRecord(content: string): RunRecord | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  const result = runRecordSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
