export { ReconciliationRun, generateRunId, isTerminalStatus } from './reconciliation-run.js';
export type { RunStartOptions } from './reconciliation-run.js';
