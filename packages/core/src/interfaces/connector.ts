/**
 * Feed Connector Interface
 *
 * Every ledger feed (JSON export, CSV extract, Excel workbook) implements
 * this interface so the reconciliation run can ingest either side the same
 * way. Feeds are read-only.
 */

import type { ReadResult } from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (json, csv, excel) */
  type: string;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Base interface all feed connectors must implement
 */
export interface IConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  /** Connector configuration */
  readonly config: TConfig;

  /** Current connection state */
  readonly state: ConnectionState;

  /**
   * Open the feed and load its records
   * @throws ConnectorError if the feed cannot be read or parsed
   */
  connect(): Promise<void>;

  /**
   * Release loaded records
   */
  disconnect(): Promise<void>;

  /**
   * Read every record of the feed, preserving feed order
   */
  readRecords(): Promise<ReadResult>;

  /**
   * Check the feed is reachable without loading it
   */
  testConnection(): Promise<boolean>;
}
