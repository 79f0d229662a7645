/**
 * Cell comparators
 *
 * A comparator decides whether two cell strings hold the same value.
 */

import type { ComparatorName } from '../types/index.js';

/** Cell equivalence predicate, table A's value first */
export type ComparatorFn = (a: string, b: string) => boolean;

/** Prefix of PubMed Central accession identifiers */
export const ACCESSION_PREFIX = 'pmc';

export function normalize(value: string): string {
  return value.trim().toLowerCase();
}

/** Default rule: equal after trimming and lowercasing */
export const normalizedComparator: ComparatorFn = (a, b) => normalize(a) === normalize(b);

export const exactComparator: ComparatorFn = (a, b) => a === b;

/**
 * Compare normalized values after removing a case-insensitive prefix from
 * whichever side carries it.
 */
export function stripPrefixComparator(prefix: string): ComparatorFn {
  const normalizedPrefix = normalize(prefix);
  const strip = (value: string): string => {
    const n = normalize(value);
    return n.startsWith(normalizedPrefix) ? n.slice(normalizedPrefix.length) : n;
  };
  return (a, b) => strip(a) === strip(b);
}

/** "PMC123", "pmc123" and "123" are all the same accession */
export const accessionComparator: ComparatorFn = stripPrefixComparator(ACCESSION_PREFIX);

export const BUILT_IN_COMPARATORS: Readonly<Record<ComparatorName, ComparatorFn>> = {
  normalized: normalizedComparator,
  exact: exactComparator,
  accession: accessionComparator,
};

export const COMPARATOR_NAMES = ['normalized', 'exact', 'accession'] as const satisfies readonly ComparatorName[];
