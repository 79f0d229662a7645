/**
 * @tablediff/connector-file
 *
 * File-based table connectors for CSV and Excel files
 */

export { BaseFileConnector } from './base-file-connector.js';
export type { FileConnectorConfig } from './base-file-connector.js';

export { CsvConnector, createCsvConnector } from './csv-connector.js';
export type { CsvConnectorConfig } from './csv-connector.js';

export { ExcelConnector, createExcelConnector } from './excel-connector.js';
export type { ExcelConnectorConfig } from './excel-connector.js';

export { createTableConnector } from './table-connector.js';
export type { TableConnectorOptions } from './table-connector.js';

// Re-export core types for convenience
export type {
  ITableConnector,
  ConnectorConfig,
  ConnectionState,
  Table,
  Row,
} from '@tablediff/core';
