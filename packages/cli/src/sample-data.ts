/**
 * Sample feed generator
 *
 * Produces a payment platform feed and a compliance feed derived from it,
 * with a known share of missing, mismatched and duplicated transactions.
 */

import { round2 } from '@txrecon/recon-core';
import type { MessageType, TransactionRecord } from '@txrecon/core';

export type SampleScenario = 'match' | 'missing' | 'difference' | 'duplicate';

export interface SampleDataOptions {
  /** Source transactions to generate (default: 300) */
  count?: number;
  /** RNG seed; equal seeds give equal feeds (default: 1) */
  seed?: number;
  /** Value date of every transaction (default: today) */
  asOf?: Date;
}

export interface SampleData {
  source: TransactionRecord[];
  target: TransactionRecord[];
  scenarios: Record<SampleScenario, number>;
}

const CURRENCIES = ['USD', 'EUR', 'GBP', 'JPY', 'CHF'];
const BANKS = [
  'AAAAUS33XXX',
  'BBBBDEFFXXX',
  'CCCCGB2LXXX',
  'DDDDFRPPXXX',
  'EEEECHZHXXX',
  'FFFFUS33XXX',
];
const COMPANIES = [
  'Northwind Trading',
  'Example Industries',
  'Sample Logistics',
  'Placeholder Holdings',
  'Demo Exports',
  'Test Partners',
];

const MESSAGE_TYPES: readonly MessageType[] = ['pacs.008', 'pacs.009', 'MT103', 'MT202'];

const SCENARIO_WEIGHTS: ReadonlyArray<[SampleScenario, number]> = [
  ['match', 60],
  ['missing', 15],
  ['difference', 15],
  ['duplicate', 10],
];

/** Fields the compliance system keeps per message type */
const COMPLIANCE_FIELDS: Record<MessageType, readonly string[]> = {
  'pacs.008': ['debtor_name', 'debtor_account', 'creditor_name', 'creditor_account', 'end_to_end_id'],
  'pacs.009': ['instructing_agent', 'instructed_agent', 'end_to_end_id'],
  MT103: ['ordering_customer', 'beneficiary_customer', 'transaction_reference'],
  MT202: ['ordering_institution', 'beneficiary_institution', 'transaction_reference'],
};

/** Counterparty field altered by a "party" difference */
const PARTY_FIELD: Record<MessageType, string> = {
  'pacs.008': 'debtor_name',
  'pacs.009': 'instructed_agent',
  MT103: 'beneficiary_customer',
  MT202: 'beneficiary_institution',
};

/**
 * Small seeded PRNG (mulberry32)
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    const item = items[Math.floor(this.next() * items.length)];
    if (item === undefined) throw new Error('Cannot pick from an empty list');
    return item;
  }

  weighted<T>(entries: ReadonlyArray<[T, number]>): T {
    const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
    let roll = this.next() * total;
    for (const [value, weight] of entries) {
      roll -= weight;
      if (roll < 0) return value;
    }
    const last = entries[entries.length - 1];
    if (!last) throw new Error('Cannot pick from an empty list');
    return last[0];
  }
}

function digits(rng: SeededRandom, length: number): string {
  return Array.from({ length }, () => String(rng.int(0, 9))).join('');
}

function reference(rng: SeededRandom, prefix: string, counter: number): string {
  return `${prefix}${String(counter).padStart(6, '0')}${rng.int(1000, 9999)}`;
}

function sourceTransaction(
  rng: SeededRandom,
  messageType: MessageType,
  counter: number,
  valueDate: string
): TransactionRecord {
  const base = {
    transaction_id: `TXN${String(counter).padStart(6, '0')}`,
    amount: round2(1000 + rng.next() * 4_999_000),
    currency: rng.pick(CURRENCIES),
    value_date: valueDate,
  };

  switch (messageType) {
    case 'pacs.008':
      return {
        ...base,
        message_type: 'pacs.008',
        debtor_name: rng.pick(COMPANIES),
        debtor_account: `GB${digits(rng, 16)}`,
        debtor_bic: rng.pick(BANKS),
        creditor_name: rng.pick(COMPANIES),
        creditor_account: `GB${digits(rng, 16)}`,
        creditor_bic: rng.pick(BANKS),
        remittance_info: `Invoice payment ${rng.int(1000, 9999)}`,
        instruction_id: reference(rng, 'INST', counter),
        end_to_end_id: reference(rng, 'E2E', counter),
      };
    case 'pacs.009':
      return {
        ...base,
        message_type: 'pacs.009',
        instructing_agent: rng.pick(BANKS),
        instructed_agent: rng.pick(BANKS),
        creditor_institution: rng.pick(BANKS),
        debtor_institution: rng.pick(BANKS),
        settlement_method: 'CLRG',
        instruction_id: reference(rng, 'INST', counter),
        end_to_end_id: reference(rng, 'E2E', counter),
        purpose: 'INTC',
      };
    case 'MT103':
      return {
        ...base,
        message_type: 'MT103',
        transaction_reference: reference(rng, 'MT103', counter),
        ordering_customer: rng.pick(COMPANIES),
        ordering_institution: rng.pick(BANKS),
        beneficiary_customer: rng.pick(COMPANIES),
        beneficiary_institution: rng.pick(BANKS),
      };
    case 'MT202':
      return {
        ...base,
        message_type: 'MT202',
        transaction_reference: reference(rng, 'MT202', counter),
        ordering_institution: rng.pick(BANKS),
        beneficiary_institution: rng.pick(BANKS),
        related_reference: reference(rng, 'REL', counter),
      };
  }
}

/**
 * Project a payment platform record onto the compliance layout. The
 * compliance system stores amounts as strings.
 */
export function toComplianceRecord(record: TransactionRecord, messageType: MessageType): TransactionRecord {
  const out: TransactionRecord = {
    transaction_id: record.transaction_id,
    message_type: record.message_type,
    amount: String(record.amount),
    currency: record.currency,
    value_date: record.value_date,
  };
  for (const field of COMPLIANCE_FIELDS[messageType]) {
    const value = record[field];
    if (value !== undefined) out[field] = value;
  }
  return out;
}

function introduceDifference(rng: SeededRandom, record: TransactionRecord, messageType: MessageType): void {
  const kind = rng.pick(['amount', 'currency', 'party'] as const);

  if (kind === 'amount') {
    const delta = round2(1 + rng.next() * 999) * (rng.next() < 0.5 ? -1 : 1);
    record.amount = String(round2(Number(record.amount) + delta));
    return;
  }

  if (kind === 'currency') {
    record.currency = rng.pick(CURRENCIES.filter((c) => c !== record.currency));
    return;
  }

  const field = PARTY_FIELD[messageType];
  const current = record[field];
  record[field] = BANKS.includes(String(current))
    ? rng.pick(BANKS.filter((bank) => bank !== current))
    : `${String(current)} LTD`;
}

/**
 * Generate a source feed and a compliance feed with injected discrepancies
 */
export function generateSampleData(options: SampleDataOptions = {}): SampleData {
  const count = options.count ?? 300;
  const rng = new SeededRandom(options.seed ?? 1);
  const valueDate = (options.asOf ?? new Date()).toISOString().slice(0, 10);

  const source: TransactionRecord[] = [];
  const target: TransactionRecord[] = [];
  const scenarios: Record<SampleScenario, number> = { match: 0, missing: 0, difference: 0, duplicate: 0 };

  for (let i = 0; i < count; i++) {
    // Message types in equal consecutive blocks
    const messageType = MESSAGE_TYPES[Math.min(MESSAGE_TYPES.length - 1, Math.floor((i * MESSAGE_TYPES.length) / count))] ?? 'pacs.008';
    const transaction = sourceTransaction(rng, messageType, i + 1, valueDate);
    source.push(transaction);

    const scenario = rng.weighted(SCENARIO_WEIGHTS);
    scenarios[scenario] += 1;

    switch (scenario) {
      case 'match':
        target.push(toComplianceRecord(transaction, messageType));
        break;
      case 'missing':
        break;
      case 'difference': {
        const altered = toComplianceRecord(transaction, messageType);
        introduceDifference(rng, altered, messageType);
        target.push(altered);
        break;
      }
      case 'duplicate': {
        const copies = rng.int(2, 4);
        for (let c = 0; c < copies; c++) {
          target.push(toComplianceRecord(transaction, messageType));
        }
        break;
      }
    }
  }

  return { source, target, scenarios };
}
