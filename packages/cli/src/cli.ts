#!/usr/bin/env tsx
/**
 * CLI entry point
 *
 * Usage:
 *   txrecon run --config ./config.json
 */

import { ConnectorError } from '@txrecon/core';
import { ReconciliationError } from '@txrecon/recon-core';
import { USAGE, UsageError, parseCommandLine, type ParsedCommand } from './args.js';
import { ConfigError } from './config.js';
import { Logger } from './logger.js';
import { generateCommand } from './commands/generate.js';
import { historyCommand } from './commands/history.js';
import { runCommand } from './commands/run.js';
import type { CommandResult } from './commands/io.js';

function dispatch(parsed: ParsedCommand): Promise<CommandResult> {
  switch (parsed.command) {
    case 'run':
      return runCommand(parsed);
    case 'history':
      return historyCommand(parsed);
    case 'generate':
      return generateCommand(parsed);
  }
}

async function main(): Promise<number> {
  const logger = new Logger();

  try {
    const result = await dispatch(parseCommandLine(process.argv.slice(2)));
    return result.exitCode;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n`);
      console.error(USAGE);
      return 1;
    }
    if (error instanceof ConnectorError || error instanceof ReconciliationError) {
      logger.error(error.toActionableMessage(), { code: error.code });
      return 1;
    }
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    logger.error('Command failed', { error });
    return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  }
);
