import { describe, expect, it } from 'vitest';
import { ReconciliationEngine } from '@txrecon/recon-core';
import { validateTransactionRecord } from '@txrecon/core';
import { SeededRandom, generateSampleData, toComplianceRecord } from '../src/sample-data.js';

const AS_OF = new Date('2024-03-01T12:00:00Z');

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const first = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(first);
    expect(first.every((n) => n >= 0 && n < 1)).toBe(true);
  });

  it('keeps integers within bounds', () => {
    const rng = new SeededRandom(3);
    for (let i = 0; i < 100; i++) {
      const n = rng.int(2, 4);
      expect(n >= 2 && n <= 4).toBe(true);
    }
  });
});

describe('generateSampleData', () => {
  it('is deterministic for a seed', () => {
    expect(generateSampleData({ count: 40, seed: 7, asOf: AS_OF })).toEqual(
      generateSampleData({ count: 40, seed: 7, asOf: AS_OF })
    );
  });

  it('spreads message types in equal blocks with valid records', () => {
    const { source, target, scenarios } = generateSampleData({ count: 40, seed: 7, asOf: AS_OF });

    expect(source).toHaveLength(40);
    expect(source[0]?.transaction_id).toBe('TXN000001');
    expect(source[0]?.message_type).toBe('pacs.008');
    expect(source[10]?.message_type).toBe('pacs.009');
    expect(source[20]?.message_type).toBe('MT103');
    expect(source[39]?.message_type).toBe('MT202');
    expect(source.every((r) => r.value_date === '2024-03-01')).toBe(true);
    expect(scenarios.match + scenarios.missing + scenarios.difference + scenarios.duplicate).toBe(40);
    expect([...source, ...target].every((r) => validateTransactionRecord(r).valid)).toBe(true);
  });

  it('injects exactly the discrepancies it reports', () => {
    const { source, target, scenarios } = generateSampleData({ count: 120, seed: 11, asOf: AS_OF });
    const result = new ReconciliationEngine({ runId: 'RUN-SAMPLE' }).reconcile(source, target);

    expect(result.summary.missingCount).toBe(scenarios.missing);
    expect(result.summary.differencesCount).toBe(scenarios.difference);
    expect(result.summary.duplicatesCount).toBe(scenarios.duplicate);
    expect(result.summary.matched).toBe(scenarios.match + scenarios.duplicate);
  });
});

describe('toComplianceRecord', () => {
  it('keeps the compliance fields and stores the amount as a string', () => {
    expect(
      toComplianceRecord(
        {
          transaction_id: 'T1',
          message_type: 'MT202',
          amount: 2500.5,
          currency: 'USD',
          value_date: '2024-03-01',
          ordering_institution: 'AAAAUS33XXX',
          beneficiary_institution: 'BBBBDEFFXXX',
          transaction_reference: 'REF1',
          related_reference: 'REL1',
        },
        'MT202'
      )
    ).toEqual({
      transaction_id: 'T1',
      message_type: 'MT202',
      amount: '2500.5',
      currency: 'USD',
      value_date: '2024-03-01',
      ordering_institution: 'AAAAUS33XXX',
      beneficiary_institution: 'BBBBDEFFXXX',
      transaction_reference: 'REF1',
    });
  });
});
