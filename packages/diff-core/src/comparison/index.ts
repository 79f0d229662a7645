/**
 * Comparison module exports
 */

export {
  ACCESSION_PREFIX,
  BUILT_IN_COMPARATORS,
  COMPARATOR_NAMES,
  accessionComparator,
  exactComparator,
  normalize,
  normalizedComparator,
  stripPrefixComparator,
} from './comparators.js';
export type { ComparatorFn } from './comparators.js';
export { ComparatorRegistry } from './comparator-registry.js';
export type { ComparatorLookup } from './comparator-registry.js';
export { RowClassifier } from './row-classifier.js';
export { DifferenceMap } from './difference-map.js';
export type { DifferenceColumn } from './difference-map.js';
export { DifferenceAggregator } from './difference-aggregator.js';
