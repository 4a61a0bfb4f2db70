/**
 * `txrecon run`: read both feeds, reconcile, persist and report
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { ConnectorError, type TransactionRecord } from '@txrecon/core';
import { readTransactionFeed, writeExceptionCsv } from '@txrecon/connector-file';
import {
  DiscrepancyStore,
  ReconciliationEngine,
  RunLogStore,
  formatReconciliationResult,
  reconcileAndPersist,
  sanitizeFileComponent,
  type PersistedReconciliation,
  type ReconciliationResult,
  type RunStatus,
} from '@txrecon/recon-core';
import { loadConfig, type ResolvedConfig } from '../config.js';
import { createFeedConnector } from '../feeds.js';
import { Logger } from '../logger.js';
import { writeOut, type CommandIO, type CommandResult } from './io.js';

export interface RunCommandOptions {
  configPath: string;
  runId?: string;
}

export interface RunCommandResult extends CommandResult {
  /** null when the run never started (unreadable feed) */
  status: RunStatus | null;
  result?: ReconciliationResult;
  files: string[];
}

async function readSide(
  side: 'source' | 'target',
  config: ResolvedConfig['source'],
  logger: Logger
): Promise<TransactionRecord[]> {
  const connector = createFeedConnector(side, config.system, config.feed);
  const records = await readTransactionFeed(connector);
  logger.info(`Loaded ${records.length} ${side} transactions`, {
    system: config.system,
    file: config.feed.filePath,
  });
  return records;
}

export async function runCommand(
  options: RunCommandOptions,
  io: CommandIO = {}
): Promise<RunCommandResult> {
  const config = await loadConfig(options.configPath, { env: io.env });
  const baseLogger = io.logger ?? new Logger(config.logging);
  const logger = options.runId ? baseLogger.child({ runId: options.runId }) : baseLogger;

  let source: TransactionRecord[];
  let target: TransactionRecord[];
  try {
    source = await readSide('source', config.source, logger);
    target = await readSide('target', config.target, logger);
  } catch (error) {
    if (error instanceof ConnectorError) {
      logger.error(error.toActionableMessage(), { code: error.code, feed: error.location.feed });
      return { exitCode: 1, status: null, files: [] };
    }
    throw error;
  }

  const engine = new ReconciliationEngine({
    sourceSystem: config.source.system,
    targetSystem: config.target.system,
    runId: options.runId,
    flagTargetOnlyDuplicates: config.flagTargetOnlyDuplicates,
    events: logger,
  });
  const stores = {
    runLogs: new RunLogStore(config.output.runLogsDir),
    discrepancies: new DiscrepancyStore(config.output.discrepanciesDir),
  };

  let persisted: PersistedReconciliation;
  try {
    persisted = await reconcileAndPersist(engine, source, target, stores, logger);
  } catch (error) {
    const record = engine.getRunRecord();
    if (record?.status === 'FAILED') {
      return { exitCode: 1, status: 'FAILED', files: [stores.runLogs.filePathFor(record.runId)] };
    }
    throw error;
  }

  const { result, runLogPath, discrepancyPath } = persisted;
  const files = [runLogPath, discrepancyPath];

  await mkdir(dirname(config.output.resultsFile), { recursive: true });
  await writeFile(config.output.resultsFile, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
  files.push(config.output.resultsFile);

  if (config.output.exceptionsCsv) {
    const csvPath = join(config.output.dir, `exceptions_${sanitizeFileComponent(result.summary.runId)}.csv`);
    await mkdir(config.output.dir, { recursive: true });
    files.push(await writeExceptionCsv(csvPath, result.exceptionList));
  }

  const record = engine.getRunRecord();
  writeOut(io, formatReconciliationResult(result, record ?? undefined));
  writeOut(io, ['', '### Files', ...files.map((file) => `- ${file}`)].join('\n'));

  return { exitCode: 0, status: record?.status ?? null, result, files };
}
