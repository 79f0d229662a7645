/**
 * CSV Connector
 * Reads and writes CSV files as string tables
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Row, Table } from '@tablediff/core';
import { ConnectorError } from '@tablediff/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /**
   * Mitigate CSV/Excel formula injection on write by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

function sanitizeFormulaValue(value: string, enabled: boolean, prefix: string): string {
  if (!enabled) return value;
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

export class CsvConnector extends BaseFileConnector<CsvConnectorConfig> {
  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async readRows(): Promise<Row[]> {
    const rows: unknown = parse(await this.readText(), {
      bom: true,
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      relax_column_count: true,
      skip_empty_lines: true,
    });

    if (!isStringRows(rows)) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Unexpected CSV parser output for ${this.config.filePath}`,
        connectorId: this.config.id,
      });
    }

    return rows;
  }

  protected async serializeContent(table: Table): Promise<string> {
    const sanitize = this.config.sanitizeFormulas !== false;
    const prefix = this.config.formulaEscapePrefix ?? "'";

    // A single empty cell keeps separator rows as empty lines
    const rows = table.map((row) =>
      row.length === 0 ? [''] : row.map((cell) => sanitizeFormulaValue(cell, sanitize, prefix))
    );

    return stringify(rows, {
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      record_delimiter: 'windows',
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
