/**
 * Formatters Module Exports
 */

export { formatReconciliationResult, MAX_LISTED_EXCEPTIONS } from './reconciliation-formatter.js';
export { formatRunHistory } from './run-history-formatter.js';
export { formatExceptionLine, formatPercent } from './utils.js';
