/**
 * Reconciliation Event Sink
 *
 * Receives the operational events emitted during a run. The core never
 * configures process logging itself; callers pass a logger-shaped sink.
 */

export type EventFields = Record<string, unknown>;

export interface ReconciliationEventSink {
  debug(message: string, fields?: EventFields): void;
  info(message: string, fields?: EventFields): void;
  warn(message: string, fields?: EventFields): void;
  error(message: string, fields?: EventFields): void;
}

const noop = (): void => {};

/** Sink that discards every event */
export const noopEventSink: ReconciliationEventSink = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
