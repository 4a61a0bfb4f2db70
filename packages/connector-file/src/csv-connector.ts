/**
 * CSV Connector
 * Reads delimited transaction extracts
 */

import { parse } from 'csv-parse/sync';
import type { Record } from '@txrecon/core';
import {
  BaseFileConnector,
  FORBIDDEN_RECORD_KEYS,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
  /**
   * Columns whose numeric values are read as numbers (default: ['amount']).
   * Every other column stays a string so identifiers keep leading zeros.
   */
  numericColumns?: string[];
}

const NUMERIC = /^-?\d+(\.\d+)?$/;

export class CsvConnector extends BaseFileConnector<CsvConnectorConfig> {
  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseContent(content: Buffer): Promise<Record[]> {
    const rows: string[][] = parse(this.decode(content), {
      columns: false, // Parse rows first so we can safely map headers ourselves
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      skip_empty_lines: this.config.skipEmptyLines !== false,
      trim: true,
      bom: true,
    });

    const [headerRow, ...dataRows] = rows;
    if (!headerRow) return [];

    const headers = headerRow.map((h) => String(h));
    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw this.fail('SCHEMA_MISMATCH', `Unsafe CSV header name: ${header}`, {
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    const numeric = new Set(this.config.numericColumns ?? ['amount']);

    return dataRows.map((row) => {
      const record: Record = Object.create(null);
      headers.forEach((key, i) => {
        const raw = row[i];
        if (raw === undefined || raw === '') {
          record[key] = null;
        } else {
          record[key] = numeric.has(key) && NUMERIC.test(raw) ? Number(raw) : raw;
        }
      });
      return record;
    });
  }
}

/**
 * Factory function to create a CSV connector
 */
export function createCsvConnector(
  config: Omit<CsvConnectorConfig, 'type'>
): CsvConnector {
  return new CsvConnector(config);
}
