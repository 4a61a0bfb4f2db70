import { describe, expect, it } from 'vitest';
import { UsageError, parseCommandLine } from '../src/args.js';

describe('parseCommandLine', () => {
  it('parses run', () => {
    expect(parseCommandLine(['run', '--config', 'config.json', '--run-id', 'RUN-1'])).toEqual({
      command: 'run',
      configPath: 'config.json',
      runId: 'RUN-1',
    });
  });

  it('parses history with a limit', () => {
    expect(parseCommandLine(['history', '--limit', '5', '--config', 'c.json'])).toEqual({
      command: 'history',
      configPath: 'c.json',
      limit: 5,
    });
  });

  it('parses generate', () => {
    expect(parseCommandLine(['generate', '--out', 'data', '--count', '20', '--seed', '0'])).toEqual({
      command: 'generate',
      outDir: 'data',
      count: 20,
      seed: 0,
    });
  });

  it('rejects missing and unknown commands', () => {
    expect(() => parseCommandLine([])).toThrow('Missing command');
    expect(() => parseCommandLine(['serve'])).toThrow('Unknown command: serve');
  });

  it('rejects missing options and bad numbers', () => {
    expect(() => parseCommandLine(['run'])).toThrow('Missing required option --config');
    expect(() => parseCommandLine(['run', '--config'])).toThrow('Missing value for --config');
    expect(() => parseCommandLine(['generate', '--out', 'd', '--count', '0'])).toThrow(
      '--count must be an integer of at least 1, got "0"'
    );
    expect(() => parseCommandLine(['history', '--config', 'c', '--limit', 'x'])).toThrow(UsageError);
  });
});
