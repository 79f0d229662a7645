/**
 * Table Connector Interface
 *
 * Every table source (CSV, Excel) implements this interface, so the CLI can
 * load inputs and write reports without knowing the file format.
 */

import type { Table } from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name, used as the table label */
  name: string;
  /** Connector type (csv, excel) */
  type: string;
  /** Whether writeTable() is refused */
  readonly?: boolean;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface ITableConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  /** Connector configuration */
  readonly config: TConfig;

  /** Current connection state */
  readonly state: ConnectionState;

  /**
   * Read and parse the underlying file
   * @throws ConnectorError if the file cannot be read or parsed
   */
  connect(): Promise<void>;

  /**
   * Drop the loaded table
   */
  disconnect(): Promise<void>;

  /**
   * Get a copy of the loaded table (header row first)
   */
  readTable(): Promise<Table>;

  /**
   * Replace the file's contents with the given table
   */
  writeTable(table: Table): Promise<void>;
}
