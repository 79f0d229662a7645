/**
 * Column module exports
 */

export { byName, byPosition, resolveColumn } from './column-selector.js';
export { applyWhitelist, deleteColumn } from './column-filter.js';
export type { WhitelistResult } from './column-filter.js';
export {
  REQUIRED_COLUMNS,
  TITLE_COLUMN,
  resolveIdentifierPositions,
} from './required-columns.js';
