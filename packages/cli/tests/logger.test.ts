import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger, maskAccount } from '../src/logger.js';

const NOW = new Date('2024-03-01T12:00:00Z');

function capture(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe('Logger', () => {
  it('writes text lines at or above the configured level', () => {
    const { lines, write } = capture();
    const logger = new Logger({ write, now: () => NOW });

    logger.debug('hidden');
    logger.info('Reconciliation run started', { runId: 'RUN-1' });
    logger.error('Reconciliation run failed: feed unreadable');

    expect(lines).toEqual([
      '[2024-03-01T12:00:00.000Z] INFO run=RUN-1 Reconciliation run started\n',
      '[2024-03-01T12:00:00.000Z] ERROR Reconciliation run failed: feed unreadable\n',
    ]);
  });

  it('masks account numbers and redacts secrets in JSON output', () => {
    const { lines, write } = capture();
    const logger = new Logger({ format: 'json', write, now: () => NOW });

    logger.warn('Missing record', {
      debtor_account: 'GB1234567890123456',
      iban: 'DE00123',
      amount: 5,
      password: 'test-secret',
    });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      ts: '2024-03-01T12:00:00.000Z',
      level: 'warn',
      msg: 'Missing record',
      debtor_account: '****3456',
      iban: '****0123',
      amount: 5,
      password: '[REDACTED]',
    });
  });

  it('binds fields on a child logger', () => {
    const { lines, write } = capture();
    const logger = new Logger({ write, now: () => NOW }).child({ runId: 'RUN-2' });

    logger.warn('Review required');

    expect(lines).toEqual(['[2024-03-01T12:00:00.000Z] WARN run=RUN-2 Review required\n']);
  });

  describe('log file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'txrecon-log-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('receives every level as JSON lines', () => {
      const { lines, write } = capture();
      const file = join(dir, 'logs', 'reconciliation.log');
      const logger = new Logger({ level: 'error', file, write, now: () => NOW });

      logger.debug('Comparing fields', { transactionId: 'T1' });
      logger.child({ runId: 'RUN-3' }).info('Volume compared');

      expect(lines).toEqual([]);
      const written = readFileSync(file, 'utf-8')
        .trim()
        .split('\n')
        .map((line): unknown => JSON.parse(line));
      expect(written).toEqual([
        { ts: '2024-03-01T12:00:00.000Z', level: 'debug', msg: 'Comparing fields', transactionId: 'T1' },
        { ts: '2024-03-01T12:00:00.000Z', level: 'info', msg: 'Volume compared', runId: 'RUN-3' },
      ]);
    });
  });
});

describe('maskAccount', () => {
  it('keeps the last four characters', () => {
    expect(maskAccount('GB29000000000000001234')).toBe('****1234');
    expect(maskAccount('123')).toBe('****');
    expect(maskAccount(null)).toBeNull();
  });
});
