/**
 * Base class for file-based feed connectors
 * Handles common functionality: file access checks, loading, error mapping
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  ReadResult,
  Record,
} from '@txrecon/core';
import { ConnectorError } from '@txrecon/core';
import type { ConnectorErrorOptions, FeedErrorCode, FeedLocation } from '@txrecon/core';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding for text formats (default: utf-8) */
  encoding?: BufferEncoding;
}

/** Keys that must never become record fields */
export const FORBIDDEN_RECORD_KEYS: ReadonlySet<string> = new Set([
  '__proto__',
  'prototype',
  'constructor',
]);

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Abstract base class for file connectors
 */
export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements IConnector<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _records: Record[] = [];

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      // Check file exists and is readable
      await access(this.config.filePath, constants.R_OK);

      const content = await readFile(this.config.filePath);
      this._records = await this.parseContent(content);
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw error;
      }

      const code = errnoCode(error);
      if (code === 'ENOENT') {
        throw this.fail('NOT_FOUND', `File not found: ${this.config.filePath}`, {
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw this.fail('PERMISSION_DENIED', `Cannot read file: ${this.config.filePath}`, {
          suggestion: 'Check file permissions.',
        });
      }

      throw this.fail(
        'CONNECTION_FAILED',
        `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  async disconnect(): Promise<void> {
    this._records = [];
    this._state = 'disconnected';
  }

  async readRecords(): Promise<ReadResult> {
    this.ensureConnected();

    return {
      records: [...this._records],
      totalCount: this._records.length,
    };
  }

  async testConnection(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw this.fail('CONNECTION_FAILED', 'Connector is not connected', {
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }

  /** This feed's id and file */
  protected get location(): FeedLocation {
    return { feed: this.config.id, filePath: this.config.filePath };
  }

  /**
   * Error located at this feed's file
   */
  protected fail(
    code: FeedErrorCode,
    message: string,
    options: Omit<ConnectorErrorOptions, keyof FeedLocation> & { row?: number } = {}
  ): ConnectorError {
    return new ConnectorError(code, message, { ...this.location, ...options });
  }

  /**
   * Decode text formats with the configured encoding
   */
  protected decode(content: Buffer): string {
    return content.toString(this.config.encoding ?? 'utf-8');
  }

  /**
   * Parse file content into records (implemented by subclasses)
   */
  protected abstract parseContent(content: Buffer): Promise<Record[]>;
}
