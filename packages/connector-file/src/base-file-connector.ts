/**
 * Base class for file-based table connectors
 * Handles reading, blank-row removal, padding and writing back
 */

import { readFile, writeFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  ITableConnector,
  ConnectorConfig,
  ConnectionState,
  Row,
  Table,
} from '@tablediff/core';
import { ConnectorError, cloneTable, isBlankRow, padRows } from '@tablediff/core';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /** Drop rows whose cells are all empty (default: true) */
  skipBlankRows?: boolean;
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Abstract base class for file connectors
 */
export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements ITableConnector<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _table: Table = [];

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      await access(this.config.filePath, constants.R_OK);

      const rows = await this.readRows();
      const kept =
        this.config.skipBlankRows === false ? rows : rows.filter((row) => !isBlankRow(row));
      this._table = padRows(kept);
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw error;
      }

      if (errnoCode(error) === 'ENOENT') {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (errnoCode(error) === 'EACCES') {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._table = [];
    this._state = 'disconnected';
  }

  async readTable(): Promise<Table> {
    this.ensureConnected();
    return cloneTable(this._table);
  }

  async writeTable(table: Table): Promise<void> {
    if (this.config.readonly) {
      throw new ConnectorError({
        code: 'UNSUPPORTED_OPERATION',
        message: 'This connector is configured as read-only',
        connectorId: this.config.id,
        suggestion: 'Create a new connector with readonly: false to enable writes.',
      });
    }

    try {
      const content = await this.serializeContent(table);
      await writeFile(this.config.filePath, content, this.config.encoding ?? 'utf-8');
      this._table = cloneTable(table);
    } catch (error) {
      throw new ConnectorError({
        code: 'WRITE_FAILED',
        message: `Failed to write ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before reading the table.',
      });
    }
  }

  /**
   * Decoded text of the file
   */
  protected async readText(): Promise<string> {
    return readFile(this.config.filePath, this.config.encoding ?? 'utf-8');
  }

  /**
   * Read the file into rows (implemented by subclasses)
   */
  protected abstract readRows(): Promise<Row[]>;

  /**
   * Serialize a table back to file content (implemented by subclasses)
   */
  protected abstract serializeContent(table: Table): Promise<string | Buffer>;
}
