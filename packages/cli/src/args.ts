/**
 * Command line parsing for `txrecon`
 */

export type ParsedCommand =
  | { command: 'run'; configPath: string; runId?: string }
  | { command: 'history'; configPath: string; limit?: number }
  | { command: 'generate'; outDir: string; count?: number; seed?: number };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = [
  'Usage:',
  '  txrecon run --config <config.json> [--run-id <id>]',
  '  txrecon history --config <config.json> [--limit <n>]',
  '  txrecon generate --out <dir> [--count <n>] [--seed <n>]',
  '',
  'Feed types: json, csv, excel',
  '',
  'Example config.json:',
  JSON.stringify(
    {
      source: {
        system: 'Payment Platform',
        feed: { type: 'json', filePath: './data/payment_platform_transactions.json' },
      },
      target: {
        system: 'Compliance System',
        feed: { type: 'json', filePath: './data/compliance_transactions.json' },
      },
      output: { dir: './data', exceptionsCsv: true },
      logging: { level: 'info', format: 'text', file: './logs/reconciliation.log' },
    },
    null,
    2
  ),
].join('\n');

function readOption(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Missing value for ${name}`);
  }
  return value;
}

function requireOption(args: readonly string[], name: string): string {
  const value = readOption(args, name);
  if (value === undefined) throw new UsageError(`Missing required option ${name}`);
  return value;
}

function readInteger(args: readonly string[], name: string, min: number): number | undefined {
  const raw = readOption(args, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw) || Number(raw) < min) {
    throw new UsageError(`${name} must be an integer of at least ${min}, got "${raw}"`);
  }
  return Number(raw);
}

export function parseCommandLine(args: readonly string[]): ParsedCommand {
  const [command, ...rest] = args;

  switch (command) {
    case 'run':
      return { command, configPath: requireOption(rest, '--config'), runId: readOption(rest, '--run-id') };
    case 'history':
      return { command, configPath: requireOption(rest, '--config'), limit: readInteger(rest, '--limit', 1) };
    case 'generate':
      return {
        command,
        outDir: requireOption(rest, '--out'),
        count: readInteger(rest, '--count', 1),
        seed: readInteger(rest, '--seed', 0),
      };
    case undefined:
      throw new UsageError('Missing command');
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
