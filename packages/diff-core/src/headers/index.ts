/**
 * Header module exports
 */

export { buildSynonymMap, isAcceptedVariant } from './synonym-map.js';
export type { SynonymMap } from './synonym-map.js';
export { reconcileHeaders } from './header-reconciler.js';
export type { HeaderLabels } from './header-reconciler.js';
