/**
 * @txrecon/core
 *
 * Shared record types, the transaction model and the feed connector
 * interface used by the reconciliation packages.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
