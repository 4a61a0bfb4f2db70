import { describe, expect, it } from 'vitest';
import type { TransactionRecord } from '@txrecon/core';
import { MatchingEngine } from '../src/matching/matching-engine.js';
import { FieldComparator } from '../src/matching/field-comparator.js';
import { ReconciliationError } from '../src/errors/index.js';
import { RecordingSink, mt202, pacs008 } from './fixtures.js';

describe('FieldComparator', () => {
  const comparator = new FieldComparator();

  it('selects fields by the source message type', () => {
    expect(comparator.fieldsFor('pacs.009')).toEqual([
      'amount',
      'currency',
      'value_date',
      'instructing_agent',
      'instructed_agent',
      'end_to_end_id',
    ]);
    expect(comparator.fieldsFor('camt.053')).toEqual(['amount', 'currency', 'value_date']);
    expect(comparator.fieldsFor('toString')).toEqual(['amount', 'currency', 'value_date']);
  });

  it('compares by string form', () => {
    const source = pacs008('T1', { amount: 100 });
    const target = pacs008('T1', { amount: '100' });
    expect(comparator.compareRecords(source, target)).toEqual([]);
  });

  it('does not treat numerically equal strings as equal', () => {
    const source = pacs008('T1', { amount: '100.0' });
    const target = pacs008('T1', { amount: '100' });
    expect(comparator.compareRecords(source, target)).toEqual([
      { field: 'amount', sourceValue: '100.0', targetValue: '100' },
    ]);
  });

  it('skips fields missing on either side', () => {
    const source = pacs008('T1');
    const target: TransactionRecord = {
      transaction_id: 'T1',
      message_type: 'pacs.008',
      amount: 100,
      currency: 'EUR',
      value_date: '2024-03-01',
      creditor_name: 'Other',
    };
    expect(comparator.compareRecords(source, target)).toEqual([
      { field: 'creditor_name', sourceValue: 'Bob Example', targetValue: 'Other' },
    ]);
  });

  it('ignores fields outside the compared set', () => {
    const source = pacs008('T1', { remittance_info: 'invoice 1' });
    const target = pacs008('T1', { remittance_info: 'invoice 2' });
    expect(comparator.compareRecords(source, target)).toEqual([]);
  });
});

describe('MatchingEngine', () => {
  it('reports every source record as missing when the collections are disjoint', () => {
    const source = [pacs008('A1'), pacs008('A2')];
    const target = [pacs008('B1')];
    const engine = new MatchingEngine(source, target);

    expect(engine.findMissing().map((f) => f.transactionId)).toEqual(['A1', 'A2']);
    expect(engine.findDifferences()).toEqual([]);
    expect(engine.findDuplicates()).toEqual([]);
  });

  it('builds missing findings from the source record', () => {
    const record = mt202('M1');
    const engine = new MatchingEngine([record], [], { targetSystem: 'Compliance System' });

    expect(engine.findMissing()).toEqual([
      {
        transactionId: 'M1',
        messageType: 'MT202',
        amount: '2500.00',
        currency: 'USD',
        valueDate: '2024-03-02',
        sourceRecord: record,
        issue: 'Missing in Compliance System',
        severity: 'HIGH',
      },
    ]);
  });

  it('flags target duplicates of source transactions', () => {
    const source = [pacs008('T2')];
    const target = [pacs008('T2'), pacs008('T2')];
    const engine = new MatchingEngine(source, target);

    const [finding, ...rest] = engine.findDuplicates();
    expect(rest).toEqual([]);
    expect(finding?.transactionId).toBe('T2');
    expect(finding?.occurrenceCount).toBe(2);
    expect(finding?.severity).toBe('HIGH');
    expect(finding?.issue).toBe('Appears 2 times in target system');
    expect(finding?.targetOccurrences).toHaveLength(2);
    expect(engine.findDifferences()).toEqual([]);
  });

  it('lists duplicates in target order', () => {
    const source = [pacs008('A'), pacs008('B')];
    const target = [pacs008('B'), pacs008('B'), pacs008('A'), pacs008('A')];

    const duplicates = new MatchingEngine(source, target).findDuplicates();

    expect(duplicates.map((d) => d.transactionId)).toEqual(['B', 'A']);
    expect(duplicates[0]?.sourceRecord).toEqual(pacs008('B'));
  });

  it('keeps target-only duplicates in place when flagged', () => {
    const source = [pacs008('A')];
    const target = [pacs008('X1'), pacs008('X1'), pacs008('A'), pacs008('A')];

    const duplicates = new MatchingEngine(source, target, { flagTargetOnlyDuplicates: true }).findDuplicates();

    expect(duplicates.map((d) => [d.transactionId, d.sourceRecord === null])).toEqual([
      ['X1', true],
      ['A', false],
    ]);
  });

  it('ignores target-only duplicates unless asked', () => {
    const source = [pacs008('T1')];
    const target = [pacs008('T1'), pacs008('X9'), pacs008('X9'), pacs008('X9')];

    expect(new MatchingEngine(source, target).findDuplicates()).toEqual([]);

    const flagged = new MatchingEngine(source, target, { flagTargetOnlyDuplicates: true });
    const duplicates = flagged.findDuplicates();
    expect(duplicates).toHaveLength(1);
    expect(duplicates[0]?.transactionId).toBe('X9');
    expect(duplicates[0]?.occurrenceCount).toBe(3);
    expect(duplicates[0]?.sourceRecord).toBeNull();
  });

  it('compares only the first target occurrence', () => {
    const source = [pacs008('T1', { amount: 100 })];
    const target = [pacs008('T1', { amount: 100 }), pacs008('T1', { amount: 999 })];
    const engine = new MatchingEngine(source, target);

    expect(engine.findDifferences()).toEqual([]);
    expect(engine.findDuplicates()).toHaveLength(1);
  });

  it('classifies differences on amount or currency as HIGH', () => {
    const source = [pacs008('T1', { amount: 100 }), pacs008('T2')];
    const target = [pacs008('T1', { amount: 105 }), pacs008('T2', { creditor_account: 'DE00TEST0000000099' })];
    const engine = new MatchingEngine(source, target);

    const findings = engine.findDifferences();
    expect(findings.map((f) => [f.transactionId, f.severity, f.issue])).toEqual([
      ['T1', 'HIGH', '1 field(s) mismatch'],
      ['T2', 'MEDIUM', '1 field(s) mismatch'],
    ]);
    expect(findings[0]?.differences).toEqual([
      { field: 'amount', sourceValue: '100', targetValue: '105' },
    ]);
  });

  it('uses the first source occurrence and reports repeated source ids', () => {
    const events = new RecordingSink();
    const source = [pacs008('T1', { amount: 100 }), pacs008('T1', { amount: 200 })];
    const target = [pacs008('T1', { amount: 100 })];
    const engine = new MatchingEngine(source, target, { events });

    expect(engine.sourceDuplicateIds()).toEqual(['T1']);
    expect(engine.findDifferences()).toEqual([]);
    expect(engine.findDuplicates()).toEqual([]);
    expect(events.messages('debug')).toEqual([
      'Source contains 1 repeated transaction id(s); first occurrence used',
    ]);
  });

  it('rejects a malformed record naming its side and index', () => {
    const broken: Record<string, unknown> = { transaction_id: 'T9', message_type: 'pacs.008', amount: 5, value_date: '2024-03-01' };
    const target: TransactionRecord[] = [pacs008('T1')];

    expect(() => new MatchingEngine([pacs008('T1')], [...target, toRecordUnchecked(broken)])).toThrow(
      'Invalid target record at index 1: currency: Required'
    );
    expect(() => new MatchingEngine([toRecordUnchecked(broken)], target)).toThrow(ReconciliationError);
  });
});

/**
 * Smuggle a malformed value past the type system, as a JSON feed would
 */
function toRecordUnchecked(value: Record<string, unknown>): TransactionRecord {
  return JSON.parse(JSON.stringify(value));
}
