/**
 * JSON Connector
 * Reads JSON files holding an array of transaction objects
 */

import type { FeedLocation, Record } from '@txrecon/core';
import { ConnectorError } from '@txrecon/core';
import {
  BaseFileConnector,
  FORBIDDEN_RECORD_KEYS,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface JsonConnectorConfig extends FileConnectorConfig {
  type: 'json';
  /** Dot path to the records array (e.g., 'data.transactions') */
  recordsPath?: string;
}

function parseSafePath(path: string, location: FeedLocation): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError('CONFIGURATION_ERROR', `Invalid recordsPath: "${path}"`, {
      ...location,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.transactions").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_RECORD_KEYS.has(part)) {
      throw new ConnectorError('CONFIGURATION_ERROR', `Unsafe recordsPath segment: "${part}"`, {
        ...location,
        suggestion:
          'Avoid __proto__/prototype/constructor in recordsPath to prevent prototype pollution.',
      });
    }
  }

  return parts;
}

function isObject(value: unknown): value is Record {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, path: string, location: FeedLocation): unknown {
  let current = obj;

  for (const part of parseSafePath(path, location)) {
    if (!isObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

export class JsonConnector extends BaseFileConnector<JsonConnectorConfig> {
  constructor(config: Omit<JsonConnectorConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
  }

  protected async parseContent(content: Buffer): Promise<Record[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.decode(content));
    } catch (error) {
      throw this.fail(
        'SCHEMA_MISMATCH',
        `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const records = this.config.recordsPath
      ? getNestedValue(parsed, this.config.recordsPath, this.location)
      : parsed;

    if (!Array.isArray(records)) {
      throw this.fail(
        'SCHEMA_MISMATCH',
        this.config.recordsPath
          ? `Path '${this.config.recordsPath}' does not contain an array`
          : 'JSON file does not contain an array at root level',
        {
          suggestion: this.config.recordsPath
            ? 'Check that recordsPath points to an array of objects.'
            : 'Either provide a JSON file with an array at root, or specify recordsPath.',
        }
      );
    }

    return records.map((item: unknown, index) => {
      if (!isObject(item)) {
        throw this.fail('SCHEMA_MISMATCH', 'Entry is not an object', { row: index + 1 });
      }
      return item;
    });
  }
}

/**
 * Factory function to create a JSON connector
 */
export function createJsonConnector(
  config: Omit<JsonConnectorConfig, 'type'>
): JsonConnector {
  return new JsonConnector(config);
}
