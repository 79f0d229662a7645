export type { Row, Table, Header, LabeledTable } from './table.js';
