/**
 * SynonymMap
 *
 * For every header name that belongs to a synonym group, the other names of
 * its group(s) it may be matched against.
 */

export type SynonymMap = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Build a SynonymMap from groups of interchangeable column names.
 * A name listed in several groups accepts the names of all of them.
 */
export function buildSynonymMap(groups: readonly (readonly string[])[]): SynonymMap {
  const map = new Map<string, Set<string>>();

  for (const group of groups) {
    for (const variant of group) {
      const others = map.get(variant) ?? new Set<string>();
      for (const other of group) {
        if (other !== variant) {
          others.add(other);
        }
      }
      map.set(variant, others);
    }
  }

  return map;
}

/**
 * Whether `candidate` may stand in for `name` at the same position
 */
export function isAcceptedVariant(synonyms: SynonymMap, name: string, candidate: string): boolean {
  return name === candidate || (synonyms.get(name)?.has(candidate) ?? false);
}
