import type { TransactionRecord } from '@txrecon/core';
import type { Clock } from '../src/types/index.js';
import type { EventFields, ReconciliationEventSink } from '../src/interfaces/index.js';

export const START = new Date('2024-03-01T12:00:00.000Z');

/**
 * Clock whose wall time advances one second per call and whose
 * monotonic time advances by `stepMs` per call
 */
export function steppingClock(start: Date = START, stepMs = 250): Clock {
  let ticks = 0;
  let mono = 0;
  return {
    now: () => new Date(start.getTime() + 1000 * ticks++),
    monotonic: () => {
      const value = mono;
      mono += stepMs;
      return value;
    },
  };
}

/** Clock frozen at one instant */
export function fixedClock(at: Date = START): Clock {
  return { now: () => new Date(at.getTime()), monotonic: () => 0 };
}

export interface CapturedEvent {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  fields?: EventFields;
}

export class RecordingSink implements ReconciliationEventSink {
  readonly events: CapturedEvent[] = [];

  debug(message: string, fields?: EventFields): void {
    this.events.push({ level: 'debug', message, fields });
  }
  info(message: string, fields?: EventFields): void {
    this.events.push({ level: 'info', message, fields });
  }
  warn(message: string, fields?: EventFields): void {
    this.events.push({ level: 'warn', message, fields });
  }
  error(message: string, fields?: EventFields): void {
    this.events.push({ level: 'error', message, fields });
  }

  messages(level: CapturedEvent['level']): string[] {
    return this.events.filter((e) => e.level === level).map((e) => e.message);
  }
}

export function pacs008(id: string, overrides: Partial<Record<string, string | number>> = {}): TransactionRecord {
  return {
    transaction_id: id,
    message_type: 'pacs.008',
    amount: 100,
    currency: 'EUR',
    value_date: '2024-03-01',
    debtor_name: 'Alice Example',
    debtor_account: 'DE00TEST0000000001',
    creditor_name: 'Bob Example',
    creditor_account: 'DE00TEST0000000002',
    end_to_end_id: `E2E-${id}`,
    ...overrides,
  };
}

export function mt202(id: string, overrides: Partial<Record<string, string | number>> = {}): TransactionRecord {
  return {
    transaction_id: id,
    message_type: 'MT202',
    amount: '2500.00',
    currency: 'USD',
    value_date: '2024-03-02',
    ordering_institution: 'TESTBANKAXXX',
    beneficiary_institution: 'TESTBANKBXXX',
    transaction_reference: `REF-${id}`,
    ...overrides,
  };
}
