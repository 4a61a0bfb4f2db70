export { systemClock, round2 } from './clock.js';
export { deepFreeze } from './freeze.js';
