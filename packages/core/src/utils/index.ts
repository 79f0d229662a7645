export { isBlankRow, headerOf, dataRowCount, cellAt, padRows, cloneTable } from './table.js';
