/**
 * HeaderReconciler
 *
 * Checks that two header rows line up position by position, allowing the
 * renames declared in a SynonymMap. Pure validation: headers are not rewritten.
 */

import type { Header } from '@tablediff/core';
import type { EngineLogger } from '../types/index.js';
import { ReconcileError } from '../errors/index.js';
import { isAcceptedVariant, type SynonymMap } from './synonym-map.js';

export interface HeaderLabels {
  a: string;
  b: string;
}

interface PositionedName {
  name: string;
  position: number;
}

function sameHeaders(a: Header, b: Header): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

function onlyIn(header: Header, other: Header): string[] {
  const names = new Set(other);
  return header.filter((name) => !names.has(name));
}

function checkExpectedDifferences(
  header: Header,
  otherHeader: Header,
  synonyms: SynonymMap,
  label: string,
  otherLabel: string,
  logger?: EngineLogger
): void {
  header.forEach((name, position) => {
    if (!synonyms.has(name)) return;

    const counterpart = otherHeader[position] ?? '';
    if (isAcceptedVariant(synonyms, name, counterpart)) {
      logger?.debug(
        `Column '${name}' at position ${position + 1} in ${label} within expected parameters, moving on.`
      );
      return;
    }

    logger?.debug(`${label} header: ${JSON.stringify(header)}`);
    logger?.debug(`${otherLabel} header: ${JSON.stringify(otherHeader)}`);
    throw new ReconcileError({
      code: 'UNEXPECTED_HEADER_DIFFERENCE',
      message:
        `Column '${name}' at position ${position + 1} in ${label} is unexpectedly different ` +
        `from column '${counterpart}' at the same position in ${otherLabel}.`,
      suggestion: `Declare '${counterpart}' as a synonym of '${name}' in EXPECTED_HEADER_DIFFERENCES_RAW, or fix the header.`,
      context: {
        column: name,
        otherColumn: counterpart,
        position,
        tables: [label, otherLabel],
      },
    });
  });
}

function withoutSynonyms(header: Header, synonyms: SynonymMap): PositionedName[] {
  return header
    .map((name, position) => ({ name, position }))
    .filter(({ name }) => !synonyms.has(name));
}

/**
 * Validate that headers A and B can be compared position by position.
 * @throws ReconcileError on the first alignment failure
 */
export function reconcileHeaders(
  a: Header,
  b: Header,
  synonyms: SynonymMap,
  labels: HeaderLabels,
  logger?: EngineLogger
): void {
  if (a.length !== b.length) {
    logger?.debug(`${labels.a} header (length ${a.length}): ${JSON.stringify(a)}`);
    logger?.debug(`${labels.b} header (length ${b.length}): ${JSON.stringify(b)}`);
    logger?.debug(`Difference (a - b): ${JSON.stringify(onlyIn(a, b))}`);
    logger?.debug(`Difference (b - a): ${JSON.stringify(onlyIn(b, a))}`);
    throw new ReconcileError({
      code: 'COLUMN_COUNT_MISMATCH',
      message: `${labels.a} has ${a.length} columns but ${labels.b} has ${b.length}.`,
      suggestion: 'Whitelist the shared columns with WHITELIST_COLUMNS, or compare files with the same columns.',
      context: { tables: [labels.a, labels.b], lengths: [a.length, b.length] },
    });
  }

  if (sameHeaders(a, b)) return;

  checkExpectedDifferences(a, b, synonyms, labels.a, labels.b, logger);
  checkExpectedDifferences(b, a, synonyms, labels.b, labels.a, logger);

  const aRemaining = withoutSynonyms(a, synonyms);
  const bRemaining = withoutSynonyms(b, synonyms);

  if (aRemaining.length !== bRemaining.length) {
    logger?.debug(`${labels.a} remaining columns to check: ${JSON.stringify(aRemaining.map((c) => c.name))}`);
    logger?.debug(`${labels.b} remaining columns to check: ${JSON.stringify(bRemaining.map((c) => c.name))}`);
    throw new ReconcileError({
      code: 'SYNONYM_COUNT_MISMATCH',
      message: 'Different number of remaining columns to check after removing expected header differences.',
      suggestion: 'Double check EXPECTED_HEADER_DIFFERENCES_RAW, or check the headers of both files.',
      context: {
        tables: [labels.a, labels.b],
        lengths: [aRemaining.length, bRemaining.length],
      },
    });
  }

  for (let i = 0; i < aRemaining.length; i++) {
    const aColumn = aRemaining[i];
    const bColumn = bRemaining[i];
    if (!aColumn || !bColumn || aColumn.name === bColumn.name) continue;

    logger?.debug(`${labels.a} expected headers without variations: ${JSON.stringify(aRemaining.map((c) => c.name))}`);
    logger?.debug(`${labels.b} expected headers without variations: ${JSON.stringify(bRemaining.map((c) => c.name))}`);
    throw new ReconcileError({
      code: 'UNRECONCILED_HEADER_DIFFERENCE',
      message:
        `Unexpectedly different headers for column number ${aColumn.position + 1}: ` +
        `'${aColumn.name}' in ${labels.a}, '${bColumn.name}' in ${labels.b}.`,
      suggestion: 'Rename the column in one file, or declare both names as a synonym group.',
      context: {
        column: aColumn.name,
        otherColumn: bColumn.name,
        position: aColumn.position,
        tables: [labels.a, labels.b],
      },
    });
  }
}
