export type {
  ConnectorConfig,
  ConnectionState,
  ITableConnector,
} from './connector.js';
