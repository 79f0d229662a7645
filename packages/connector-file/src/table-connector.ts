/**
 * Pick a connector for a file path by its extension
 */

import { basename, extname } from 'node:path';
import type { ITableConnector } from '@tablediff/core';
import { createCsvConnector } from './csv-connector.js';
import { createExcelConnector } from './excel-connector.js';

export interface TableConnectorOptions {
  /** Label for logs and reports (default: the file's base name) */
  name?: string;
  encoding?: BufferEncoding;
  readonly?: boolean;
  /** CSV only: escape cells that look like formulas on write (default: true) */
  sanitizeFormulas?: boolean;
}

const EXCEL_EXTENSIONS = new Set(['.xlsx', '.xlsm']);

export function createTableConnector(
  filePath: string,
  options: TableConnectorOptions = {}
): ITableConnector {
  const name = options.name ?? basename(filePath);
  const base = {
    id: name,
    name,
    filePath,
    encoding: options.encoding,
    readonly: options.readonly,
  };

  if (EXCEL_EXTENSIONS.has(extname(filePath).toLowerCase())) {
    return createExcelConnector(base);
  }
  return createCsvConnector({ ...base, sanitizeFormulas: options.sanitizeFormulas });
}
