export {
  fieldValueSchema,
  transactionRecordSchema,
  validateTransactionRecord,
  formatValidationErrors,
} from './transaction-schema.js';
export type { TransactionValidation } from './transaction-schema.js';
