/**
 * Interface exports for recon-core
 */

export type { IReconciliationEngine } from './reconciliation-engine.js';
export type { ReconciliationEventSink, EventFields } from './event-sink.js';
export { noopEventSink } from './event-sink.js';
