import { describe, expect, it } from 'vitest';
import type { TransactionRecord } from '@txrecon/core';
import { ReconciliationEngine } from '../src/reconciliation/reconciliation-engine.js';
import type { ReconciliationEngineOptions } from '../src/reconciliation/reconciliation-engine.js';
import { ReconciliationError } from '../src/errors/index.js';
import { RecordingSink, fixedClock, mt202, pacs008 } from './fixtures.js';

function engine(options: ReconciliationEngineOptions = {}): ReconciliationEngine {
  return new ReconciliationEngine({ runId: 'RUN-TEST', clock: fixedClock(), ...options });
}

function many(prefix: string, count: number): TransactionRecord[] {
  return Array.from({ length: count }, (_, i) => pacs008(`${prefix}${String(i + 1).padStart(3, '0')}`));
}

describe('ReconciliationEngine', () => {
  it('reconciles identical collections without discrepancies', () => {
    const records = [pacs008('T1'), mt202('T2')];
    const recon = engine();
    const result = recon.reconcile(records, records.map((r) => ({ ...r })));

    expect(result.summary).toMatchObject({
      runId: 'RUN-TEST',
      totalSource: 2,
      totalTarget: 2,
      matched: 2,
      missingCount: 0,
      differencesCount: 0,
      duplicatesCount: 0,
      reconciliationDate: '2024-03-01T12:00:00.000Z',
    });
    expect(result.exceptionList).toEqual([]);
    expect(recon.getRunRecord()?.status).toBe('COMPLETED_SUCCESS');
  });

  it('numbers duplicate discrepancies in target order', () => {
    const result = engine().reconcile(
      [pacs008('A'), pacs008('B')],
      [pacs008('B'), pacs008('B'), pacs008('A'), pacs008('A')]
    );

    expect(result.duplicateTransactions.map((d) => d.transactionId)).toEqual(['B', 'A']);
    expect(
      result.exceptionList
        .filter((d) => d.kind === 'duplicate_record')
        .map((d) => [d.id, d.transactionId])
    ).toEqual([
      ['DISC-RUN-TEST-0001', 'B'],
      ['DISC-RUN-TEST-0002', 'A'],
    ]);
  });

  it('reports a transaction missing from the target', () => {
    const recon = engine();
    const result = recon.reconcile([pacs008('T1')], []);

    expect(result.missingTransactions.map((m) => m.transactionId)).toEqual(['T1']);
    expect(result.exceptionList.map((e) => [e.kind, e.severity, e.transactionId])).toEqual([
      ['count_discrepancy', 'CRITICAL', null],
      ['missing_record', 'HIGH', 'T1'],
    ]);
    expect(result.summary.matched).toBe(0);
    expect(recon.getRunRecord()?.status).toBe('COMPLETED_WITH_DISCREPANCIES');
  });

  it('reports a duplicated target transaction', () => {
    const result = engine().reconcile([pacs008('T2')], [pacs008('T2'), pacs008('T2')]);

    expect(result.duplicateTransactions).toHaveLength(1);
    expect(result.duplicateTransactions[0]?.occurrenceCount).toBe(2);
    expect(result.transactionsWithDifferences).toEqual([]);

    const duplicate = result.exceptionList.find((e) => e.kind === 'duplicate_record');
    expect(duplicate?.severity).toBe('HIGH');
    expect(duplicate?.description).toBe('Transaction T2 appears 2 times in Compliance System');
    expect(result.summary.matched).toBe(1);
  });

  it('reports an amount mismatch as HIGH', () => {
    const result = engine().reconcile(
      [pacs008('T3', { amount: 100 })],
      [pacs008('T3', { amount: 105 })]
    );

    expect(result.transactionsWithDifferences).toHaveLength(1);
    expect(result.transactionsWithDifferences[0]?.differences).toEqual([
      { field: 'amount', sourceValue: '100', targetValue: '105' },
    ]);
    const [exception] = result.exceptionList;
    expect(exception?.kind).toBe('unmatched_transaction');
    expect(exception?.severity).toBe('HIGH');
    expect(result.summary.matched).toBe(0);
  });

  it('records a HIGH count discrepancy for a 15% shortfall', () => {
    const source = many('S', 100);
    const target = source.slice(0, 85);
    const result = engine().reconcile(source, target);

    const counts = result.exceptionList.filter((e) => e.kind === 'count_discrepancy');
    expect(counts).toHaveLength(1);
    const [count] = counts;
    expect(count?.severity).toBe('HIGH');
    expect(count?.description).toBe('Total_Transactions count mismatch: 100 vs 85');
    expect(count?.kind === 'count_discrepancy' && count.details.percentageDifference).toBe(15);
    expect(result.summary.missingCount).toBe(15);
    expect(result.summary.matched).toBe(85);
  });

  it('records findings as missing, duplicate, unmatched, then count', () => {
    const source = [pacs008('A'), pacs008('B'), pacs008('C', { currency: 'GBP' })];
    const target = [pacs008('B'), pacs008('B'), pacs008('C')];
    const result = engine().reconcile(source, target);

    const inInsertionOrder = [...result.exceptionList].sort((a, b) => a.id.localeCompare(b.id));
    expect(inInsertionOrder.map((e) => [e.id, e.kind])).toEqual([
      ['DISC-RUN-TEST-0001', 'missing_record'],
      ['DISC-RUN-TEST-0002', 'duplicate_record'],
      ['DISC-RUN-TEST-0003', 'unmatched_transaction'],
    ]);
    expect(result.summary.discrepancySummary.totalDiscrepancies).toBe(3);
  });

  it('uses the configured system names', () => {
    const result = engine({ sourceSystem: 'Core Ledger', targetSystem: 'Sanctions Screening' }).reconcile(
      [pacs008('T1')],
      [pacs008('T9')]
    );
    const missing = result.exceptionList.find((e) => e.kind === 'missing_record');
    expect(missing?.description).toBe('Transaction T1 missing in Sanctions Screening');
    expect(missing?.sourceSystem).toBe('Core Ledger');
  });

  it('flags target-only duplicates when enabled', () => {
    const result = engine({ flagTargetOnlyDuplicates: true }).reconcile(
      [pacs008('T1')],
      [pacs008('T1'), pacs008('X1'), pacs008('X1')]
    );
    const duplicate = result.exceptionList.find((e) => e.kind === 'duplicate_record');
    expect(duplicate?.transactionId).toBe('X1');
  });

  it('marks the run FAILED and re-throws on a fault', () => {
    const events = new RecordingSink();
    const recon = engine({ events });
    const malformed: TransactionRecord = JSON.parse('{"transaction_id":"T1","message_type":"pacs.008"}');

    expect(() => recon.reconcile([malformed], [])).toThrow(ReconciliationError);

    const record = recon.getRunRecord();
    expect(record?.status).toBe('FAILED');
    expect(record?.success).toBe(false);
    expect(record?.errorMessage).toMatch(/^Invalid source record at index 0: /);
    expect(events.messages('error')).toHaveLength(1);
  });

  it('starts a fresh run for every call', () => {
    const recon = new ReconciliationEngine({ clock: fixedClock() });
    const first = recon.reconcile([pacs008('T1')], []);
    const second = recon.reconcile([pacs008('T1')], [pacs008('T1')]);

    expect(first.exceptionList).toHaveLength(2);
    expect(second.exceptionList).toEqual([]);
    expect(second.summary.runId).toMatch(/^RUN-20240301120000-[0-9a-f]{4}$/);
    expect(recon.getRun()?.runId).toBe(second.summary.runId);
  });
});
