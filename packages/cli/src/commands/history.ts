/**
 * `txrecon history`: list past runs from the run-log directory
 */

import { RunLogStore, formatRunHistory, type RunRecord } from '@txrecon/recon-core';
import { loadConfig } from '../config.js';
import { writeOut, type CommandIO, type CommandResult } from './io.js';

export const DEFAULT_HISTORY_LIMIT = 10;

export interface HistoryCommandOptions {
  configPath: string;
  limit?: number;
}

export interface HistoryCommandResult extends CommandResult {
  records: RunRecord[];
}

export async function historyCommand(
  options: HistoryCommandOptions,
  io: CommandIO = {}
): Promise<HistoryCommandResult> {
  const config = await loadConfig(options.configPath, { env: io.env });
  const store = new RunLogStore(config.output.runLogsDir);
  const records = (await store.list()).slice(0, options.limit ?? DEFAULT_HISTORY_LIMIT);

  writeOut(io, formatRunHistory(records));
  return { exitCode: 0, records };
}
