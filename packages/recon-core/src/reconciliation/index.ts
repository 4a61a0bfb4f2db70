/**
 * Reconciliation Module Exports
 */

export {
  ReconciliationEngine,
  DEFAULT_SOURCE_SYSTEM,
  DEFAULT_TARGET_SYSTEM,
} from './reconciliation-engine.js';
export type { ReconciliationEngineOptions } from './reconciliation-engine.js';
