/**
 * @txrecon/connector-file
 *
 * Read-only JSON, CSV and Excel transaction feeds
 */

export { BaseFileConnector, FORBIDDEN_RECORD_KEYS } from './base-file-connector.js';
export type { FileConnectorConfig } from './base-file-connector.js';

export { CsvConnector, createCsvConnector } from './csv-connector.js';
export type { CsvConnectorConfig } from './csv-connector.js';

export { JsonConnector, createJsonConnector } from './json-connector.js';
export type { JsonConnectorConfig } from './json-connector.js';

export { ExcelConnector, createExcelConnector } from './excel-connector.js';
export type { ExcelConnectorConfig } from './excel-connector.js';

export { readTransactionFeed } from './feed.js';

export { formatExceptionCsv, writeExceptionCsv, EXCEPTION_CSV_COLUMNS } from './exception-csv.js';
export type { ExceptionRow, ExceptionCsvOptions } from './exception-csv.js';

// Re-export core types for convenience
export type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  ReadResult,
  Record,
} from '@txrecon/core';
