export { DiscrepancyTracker } from './discrepancy-tracker.js';
export type { DiscrepancyTrackerOptions } from './discrepancy-tracker.js';
export {
  SEVERITY_RANK,
  CRITICAL_FIELDS,
  compareSeverity,
  escalate,
} from './severity.js';
