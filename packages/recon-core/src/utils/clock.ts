import { performance } from 'node:perf_hooks';
import type { Clock } from '../types/index.js';

/** Wall clock for timestamps, performance.now() for durations */
export const systemClock: Clock = {
  now: () => new Date(),
  monotonic: () => performance.now(),
};

/**
 * Round to two decimal places
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
