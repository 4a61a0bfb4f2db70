/**
 * Transaction record model
 *
 * One payment message as supplied by a ledger feed. Records are plain
 * key-value mappings; the message type selects which optional fields a
 * record is expected to carry.
 */

/** Scalar value a transaction field may hold */
export type FieldValue = string | number | null;

/** Message types with a known field layout */
export const MESSAGE_TYPES = ['pacs.008', 'pacs.009', 'MT103', 'MT202'] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

/** Fields every transaction record must carry */
export interface TransactionBase {
  transaction_id: string;
  message_type: string;
  amount: number | string;
  currency: string;
  value_date: string;
  [field: string]: FieldValue | undefined;
}

/** pacs.008 - customer credit transfer */
export interface CustomerCreditTransfer extends TransactionBase {
  message_type: 'pacs.008';
  debtor_name?: string;
  debtor_account?: string;
  debtor_bic?: string;
  creditor_name?: string;
  creditor_account?: string;
  creditor_bic?: string;
  remittance_info?: string;
  instruction_id?: string;
  end_to_end_id?: string;
}

/** pacs.009 - financial institution credit transfer */
export interface InstitutionCreditTransfer extends TransactionBase {
  message_type: 'pacs.009';
  instructing_agent?: string;
  instructed_agent?: string;
  creditor_institution?: string;
  debtor_institution?: string;
  settlement_method?: string;
  instruction_id?: string;
  end_to_end_id?: string;
  purpose?: string;
}

/** MT103 - legacy single customer credit transfer */
export interface LegacyCustomerTransfer extends TransactionBase {
  message_type: 'MT103';
  ordering_customer?: string;
  beneficiary_customer?: string;
  transaction_reference?: string;
  ordering_institution?: string;
  beneficiary_institution?: string;
}

/** MT202 - legacy general financial institution transfer */
export interface LegacyInstitutionTransfer extends TransactionBase {
  message_type: 'MT202';
  ordering_institution?: string;
  beneficiary_institution?: string;
  transaction_reference?: string;
  related_reference?: string;
}

export type KnownTransactionRecord =
  | CustomerCreditTransfer
  | InstitutionCreditTransfer
  | LegacyCustomerTransfer
  | LegacyInstitutionTransfer;

/** Record whose message type has no known layout; compared on common fields only */
export type OtherTransactionRecord = TransactionBase;

export type TransactionRecord = KnownTransactionRecord | OtherTransactionRecord;

/** An ordered collection of records as ingested from one system */
export type TransactionCollection = readonly TransactionRecord[];

export function isKnownMessageType(value: unknown): value is MessageType {
  return typeof value === 'string' && (MESSAGE_TYPES as readonly string[]).includes(value);
}
