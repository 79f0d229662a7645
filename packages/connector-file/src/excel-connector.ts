/**
 * Excel Connector
 * Reads and writes the first (or a named) worksheet of .xlsx files as string tables
 */

import ExcelJS from 'exceljs';
import type { Row, Table } from '@tablediff/core';
import { ConnectorError } from '@tablediff/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or index (default: first sheet) */
  sheet?: string | number;
}

function scalarText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && 'error' in value) return String(value.error);
  return String(value);
}

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async readRows(): Promise<Row[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet = this.getSheet(workbook);
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        connectorId: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    const rows: Row[] = [];
    sheet.eachRow({ includeEmpty: false }, (row) => {
      const cells: Row = [];
      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        cells[colNumber - 1] = this.cellText(cell);
      });
      rows.push(Array.from(cells, (cell) => cell ?? ''));
    });

    return rows;
  }

  protected async serializeContent(table: Table): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    const sheetName = typeof this.config.sheet === 'string' ? this.config.sheet : 'Sheet1';
    const sheet = workbook.addWorksheet(sheetName);

    for (const row of table) {
      sheet.addRow(row);
    }
    if (table.length > 0) {
      sheet.getRow(1).font = { bold: true };
    }

    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }

  private getSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
    if (this.config.sheet !== undefined) {
      return workbook.getWorksheet(this.config.sheet);
    }
    return workbook.worksheets[0];
  }

  private cellText(cell: ExcelJS.Cell): string {
    const value = cell.value;

    if (value === null || value === undefined) {
      return '';
    }

    if (value instanceof Date) {
      return value.toISOString();
    }

    if (typeof value === 'object') {
      if ('richText' in value) {
        return value.richText.map((rt) => rt.text).join('');
      }
      if ('hyperlink' in value) {
        return value.text;
      }
      if ('formula' in value || 'sharedFormula' in value) {
        return scalarText(value.result);
      }
    }

    return scalarText(value);
  }
}

/**
 * Factory function to create an Excel connector
 */
export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
