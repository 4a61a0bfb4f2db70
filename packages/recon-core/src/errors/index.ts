/**
 * Error exports for recon-core
 */

export { ReconciliationError, validationError } from './reconciliation-error.js';
export type {
  ReconciliationErrorCode,
  ReconciliationErrorDetails,
} from './reconciliation-error.js';
