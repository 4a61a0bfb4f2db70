export { RunLogStore, sanitizeFileComponent } from './run-log-store.js';
export { DiscrepancyStore, fileTimestamp } from './discrepancy-store.js';
export type { DiscrepancyReport, DiscrepancyFile } from './discrepancy-store.js';
export { reconcileAndPersist } from './reconcile-and-persist.js';
export type { ReconciliationStores, PersistedReconciliation } from './reconcile-and-persist.js';
export { runRecordSchema, discrepancySchema } from './run-record-schema.js';
