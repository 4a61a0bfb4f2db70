import type { IConnector } from '@txrecon/core';
import {
  type FileConnectorConfig,
  createCsvConnector,
  createExcelConnector,
  createJsonConnector,
} from '@txrecon/connector-file';
import type { FeedEntry } from './config.js';

/**
 * Build the connector for one side's feed. `entry.filePath` is expected
 * to be resolved already.
 */
export function createFeedConnector(id: string, name: string, entry: FeedEntry): IConnector<FileConnectorConfig> {
  switch (entry.type) {
    case 'json':
      return createJsonConnector({
        id,
        name,
        filePath: entry.filePath,
        encoding: entry.encoding,
        recordsPath: entry.recordsPath,
      });

    case 'csv':
      return createCsvConnector({
        id,
        name,
        filePath: entry.filePath,
        encoding: entry.encoding,
        delimiter: entry.delimiter,
        quote: entry.quote,
        skipEmptyLines: entry.skipEmptyLines,
        numericColumns: entry.numericColumns,
      });

    case 'excel':
      return createExcelConnector({
        id,
        name,
        filePath: entry.filePath,
        sheet: entry.sheet,
        startRow: entry.startRow,
        startColumn: entry.startColumn,
      });

    default: {
      const exhaustive: never = entry;
      throw new Error(`Unknown feed type: ${JSON.stringify(exhaustive)}`);
    }
  }
}
