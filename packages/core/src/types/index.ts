export type { Record, ReadResult, ValidationResult, ValidationError } from './record.js';

export type {
  FieldValue,
  MessageType,
  TransactionBase,
  CustomerCreditTransfer,
  InstitutionCreditTransfer,
  LegacyCustomerTransfer,
  LegacyInstitutionTransfer,
  KnownTransactionRecord,
  OtherTransactionRecord,
  TransactionRecord,
  TransactionCollection,
} from './transaction.js';
export { MESSAGE_TYPES, isKnownMessageType } from './transaction.js';
