/**
 * FieldComparator
 *
 * Compares the fields two records for the same transaction must agree on.
 */

import type { TransactionRecord } from '@txrecon/core';
import { hasField } from '@txrecon/core';
import type { FieldDifference } from '../types/index.js';
import { CRITICAL_FIELDS } from '../discrepancy/severity.js';

/** Compared for every message type */
export const COMMON_FIELDS: readonly string[] = ['amount', 'currency', 'value_date'];

/** Additional fields compared per message type */
export const TYPE_SPECIFIC_FIELDS: Readonly<Record<string, readonly string[]>> = {
  'pacs.008': ['debtor_name', 'debtor_account', 'creditor_name', 'creditor_account', 'end_to_end_id'],
  'pacs.009': ['instructing_agent', 'instructed_agent', 'end_to_end_id'],
  MT103: ['ordering_customer', 'beneficiary_customer', 'transaction_reference'],
  MT202: ['ordering_institution', 'beneficiary_institution', 'transaction_reference'],
};

export class FieldComparator {
  /**
   * Fields compared for a message type; unknown types get the common set
   */
  fieldsFor(messageType: string): readonly string[] {
    const specific = hasField(TYPE_SPECIFIC_FIELDS, messageType)
      ? TYPE_SPECIFIC_FIELDS[messageType]
      : undefined;
    return specific ? [...COMMON_FIELDS, ...specific] : COMMON_FIELDS;
  }

  /**
   * Compare two records and return field-level differences.
   *
   * The field set follows the source record's message type. A field is
   * compared only when both records carry it, by string form.
   */
  compareRecords(source: TransactionRecord, target: TransactionRecord): FieldDifference[] {
    const differences: FieldDifference[] = [];

    for (const field of this.fieldsFor(source.message_type)) {
      if (!hasField(source, field) || !hasField(target, field)) continue;

      const sourceValue = String(source[field]);
      const targetValue = String(target[field]);
      if (sourceValue !== targetValue) {
        differences.push({ field, sourceValue, targetValue });
      }
    }

    return differences;
  }

  /**
   * True when any differing field is amount or currency
   */
  hasCriticalDifference(differences: readonly FieldDifference[]): boolean {
    return differences.some((d) => CRITICAL_FIELDS.has(d.field));
  }
}
