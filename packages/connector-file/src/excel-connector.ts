/**
 * Excel Connector
 * Reads transaction sheets from .xlsx workbooks
 */

import ExcelJS from 'exceljs';
import type { Record } from '@txrecon/core';
import {
  BaseFileConnector,
  FORBIDDEN_RECORD_KEYS,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or 1-based index (default: first sheet) */
  sheet?: string | number;
  /** Header row (1-indexed, default: 1) */
  startRow?: number;
  /** Starting column (1-indexed, default: 1) */
  startColumn?: number;
}

type CellScalar = string | number | boolean | null;

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async parseContent(_content: Buffer): Promise<Record[]> {
    // ExcelJS reads from the file directly
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet = this.getSheet(workbook);
    if (!sheet) {
      throw this.fail('NOT_FOUND', `Sheet not found: ${this.config.sheet ?? 'first sheet'}`, {
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    const startRow = this.config.startRow ?? 1;
    const startColumn = this.config.startColumn ?? 1;

    const headers: string[] = [];
    sheet.getRow(startRow).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      if (colNumber >= startColumn) {
        headers[colNumber - startColumn] = String(getCellValue(cell) ?? `Column${colNumber}`);
      }
    });

    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw this.fail('SCHEMA_MISMATCH', `Unsafe Excel header name: ${header}`, {
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    const records: Record[] = [];
    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber <= startRow) return;

      const record: Record = Object.create(null);
      let hasData = false;

      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        if (colNumber < startColumn) return;

        const header = headers[colNumber - startColumn];
        if (!header) return;

        const value = getCellValue(cell);
        if (value !== null && value !== '') {
          hasData = true;
        }
        record[header] = value;
      });

      // Only add row if it has some data
      if (hasData) {
        records.push(record);
      }
    });

    return records;
  }

  private getSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
    if (this.config.sheet !== undefined) {
      return workbook.getWorksheet(this.config.sheet);
    }

    // Default: first sheet
    return workbook.worksheets[0];
  }
}

/**
 * Plain value of a cell: formula results, rich text and hyperlinks are
 * flattened and dates become ISO strings
 */
function getCellValue(cell: ExcelJS.Cell): CellScalar {
  return toScalar(cell.value);
}

function toScalar(value: ExcelJS.CellValue): CellScalar {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value !== 'object') {
    return value;
  }

  // Formula results
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : toScalar(value.result);
  }

  // Rich text
  if ('richText' in value) {
    return value.richText.map((rt) => rt.text).join('');
  }

  // Hyperlinks
  if ('hyperlink' in value) {
    return value.text;
  }

  if ('error' in value) {
    return value.error;
  }

  return null;
}

/**
 * Factory function to create an Excel connector
 */
export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
