/**
 * @txrecon/recon-core
 *
 * Transaction matching, discrepancy tracking and run lifecycle for
 * ledger-to-ledger reconciliation.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Discrepancy Module
export * from './discrepancy/index.js';

// Matching Module
export * from './matching/index.js';

// Run Module
export * from './run/index.js';

// Reconciliation Module
export * from './reconciliation/index.js';

// Persistence
export * from './persistence/index.js';

// Formatters
export * from './formatters/index.js';

// Utilities
export * from './utils/index.js';

// Errors
export { ReconciliationError, validationError } from './errors/index.js';
export type { ReconciliationErrorCode, ReconciliationErrorDetails } from './errors/index.js';
