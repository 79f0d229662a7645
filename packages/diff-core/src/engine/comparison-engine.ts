/**
 * Comparison Engine
 *
 * Runs one reconciliation of tables A and B against their shared original:
 * row counts, whitelist, required columns, comparators, header alignment,
 * row classification, cell comparison and report rendering. Synchronous and
 * fail-fast: the first structural problem aborts the run.
 */

import type { Header, LabeledTable, Table } from '@tablediff/core';
import { dataRowCount, headerOf } from '@tablediff/core';
import type {
  ComparisonInput,
  ComparisonReport,
  ComparisonSettings,
  ComparisonSummary,
  EngineLogger,
  IdentifierPositions,
  SuspiciousRow,
} from '../types/index.js';
import { ReconcileError } from '../errors/index.js';
import { applyWhitelist, byName, byPosition, resolveIdentifierPositions } from '../columns/index.js';
import { buildSynonymMap, reconcileHeaders } from '../headers/index.js';
import {
  ComparatorRegistry,
  DifferenceAggregator,
  RowClassifier,
  type DifferenceMap,
} from '../comparison/index.js';
import { buildDifferencesTable, buildSuspiciousTable } from '../report/index.js';

export interface ComparisonResult {
  /** Disagreeing cells of comparable rows */
  differences: DifferenceMap;
  /** Rows whose identifiers all disagree, ascending */
  suspicious: SuspiciousRow[];
  /** Headers as compared, after whitelisting */
  headers: { a: Header; b: Header; original: Header };
  report: ComparisonReport;
  summary: ComparisonSummary;
}

export class ComparisonEngine {
  constructor(private readonly logger?: EngineLogger) {}

  compare(input: ComparisonInput): ComparisonResult {
    const { a, b, original } = input;
    const settings: ComparisonSettings = input.settings ?? {};

    this.checkRowCounts(a, b);

    const { aTable, bTable } = this.whitelist(a, b, settings);
    const aHeader = headerOf(aTable);
    const bHeader = headerOf(bTable);
    const originalHeader = headerOf(original.table);

    if (settings.printHeaders) {
      this.printHeader(aHeader, a.label);
      this.printHeader(bHeader, b.label);
      this.printHeader(originalHeader, original.label);
    }

    const positions = resolveIdentifierPositions(aHeader, a.label);
    const originalPositions = resolveIdentifierPositions(originalHeader, original.label);

    const registry = this.buildRegistry(aHeader, a.label, positions, settings);

    reconcileHeaders(
      aHeader,
      bHeader,
      buildSynonymMap(settings.synonymGroups ?? []),
      { a: a.label, b: b.label },
      this.logger
    );

    const classifier = new RowClassifier(registry, positions);
    const aggregator = new DifferenceAggregator(registry);
    const suspicious: SuspiciousRow[] = [];

    for (let row = 1; row < aTable.length; row++) {
      const aRow = aTable[row] ?? [];
      const bRow = bTable[row] ?? [];

      const classification = classifier.classify(row, aRow, bRow);
      if (classification.kind === 'suspicious') {
        suspicious.push(classification.suspicious);
        continue;
      }

      aggregator.addRow(row, aRow, bRow);
    }

    const differences = aggregator.result();
    const labels = { a: a.label, b: b.label, original: original.label };

    const report: ComparisonReport = {
      differences: buildDifferencesTable(
        differences,
        { a: aHeader, b: bHeader },
        labels,
        { table: original.table, positions: originalPositions }
      ),
      suspicious: buildSuspiciousTable(suspicious, labels),
    };

    const summary: ComparisonSummary = {
      originalRowCount: original.table.length,
      aRowCount: a.table.length,
      bRowCount: b.table.length,
      comparedRowCount: dataRowCount(aTable),
      processedCount: aggregator.processedCount,
      suspiciousCount: suspicious.length,
      differenceCount: differences.size,
    };

    this.logger?.debug('Comparison finished', { ...summary });

    return {
      differences,
      suspicious,
      headers: { a: aHeader, b: bHeader, original: originalHeader },
      report,
      summary,
    };
  }

  private checkRowCounts(a: LabeledTable, b: LabeledTable): void {
    if (a.table.length > b.table.length) {
      throw new ReconcileError({
        code: 'ROW_COUNT_EXCEEDED',
        message: `Sheet ${a.label} has more rows than sheet ${b.label}, comparison can't continue.`,
        suggestion: 'Switch the order of the arguments if you want a partial comparison.',
        context: {
          tables: [a.label, b.label],
          lengths: [a.table.length, b.table.length],
        },
      });
    }

    if (a.table.length < b.table.length) {
      this.logger?.warn(
        `Sheets have a different number of rows. Comparison will only go as far as the end of sheet ${a.label}, ` +
          `the rest of the rows in sheet ${b.label} will be ignored.`,
        { aRows: a.table.length, bRows: b.table.length }
      );
    }
  }

  private whitelist(
    a: LabeledTable,
    b: LabeledTable,
    settings: ComparisonSettings
  ): { aTable: Table; bTable: Table } {
    if (!settings.whitelist) {
      this.logger?.info('No column whitelist found.');
      return { aTable: a.table, bTable: b.table };
    }

    this.logger?.info(
      `Whitelist found, deleting all columns not in whitelist. Whitelist: ${JSON.stringify(settings.whitelist)}`
    );
    return {
      aTable: applyWhitelist(a.table, settings.whitelist, a.label, this.logger).table,
      bTable: applyWhitelist(b.table, settings.whitelist, b.label, this.logger).table,
    };
  }

  private printHeader(header: Header, label: string): void {
    this.logger?.info(`${label} header:`);
    this.logger?.info(`"${header.join('","')}"`);
  }

  private buildRegistry(
    header: Header,
    label: string,
    positions: IdentifierPositions,
    settings: ComparisonSettings
  ): ComparatorRegistry {
    const registry = new ComparatorRegistry(header, label);
    registry.registerBuiltIn(byPosition(positions.PMCID), 'accession');

    for (const [column, name] of Object.entries(settings.columnComparators ?? {})) {
      const position = registry.registerBuiltIn(byName(column), name);
      this.logger?.debug(`Comparing column '${column}' (position ${position + 1}) with the '${name}' comparator.`);
    }

    return registry;
  }
}

/**
 * Factory function to create a ComparisonEngine
 */
export function createComparisonEngine(logger?: EngineLogger): ComparisonEngine {
  return new ComparisonEngine(logger);
}
