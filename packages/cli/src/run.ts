/**
 * One comparison run: load the three tables, compare, write the reports
 */

import { resolve } from 'node:path';
import { ConnectorError, type LabeledTable, type Table } from '@tablediff/core';
import { createTableConnector } from '@tablediff/connector-file';
import { ComparisonEngine, ReconcileError, type ComparisonResult } from '@tablediff/diff-core';
import type { CliArgs } from './args.js';
import { toComparisonSettings, type SettingsFile } from './config.js';
import type { Logger } from './logger.js';

/** Suspicious rows are echoed to the log only below this count */
export const SUSPICIOUS_LOG_LIMIT = 50;

export interface RunOptions extends CliArgs {
  /** Directory relative paths and default report names resolve against */
  cwd: string;
}

export interface RunOutcome {
  result: ComparisonResult;
  differencesPath: string;
  /** Set only when at least one suspicious row was found */
  suspiciousPath?: string;
}

export function differencesFileName(aLabel: string, bLabel: string): string {
  return `${aLabel}_comparison_${bLabel}.csv`;
}

export function suspiciousFileName(aLabel: string, bLabel: string): string {
  return `${aLabel}_suspicious_${bLabel}.csv`;
}

async function loadTable(filePath: string, logger: Logger): Promise<LabeledTable> {
  const connector = createTableConnector(filePath, { readonly: true });
  await connector.connect();
  try {
    const table = await connector.readTable();
    logger.debug(`Loaded ${connector.config.name}`, { rows: table.length, file: filePath });
    return { label: connector.config.name, table };
  } finally {
    await connector.disconnect();
  }
}

// Reports carry cell values verbatim, so formula escaping stays off
async function saveTable(filePath: string, table: Table): Promise<void> {
  const connector = createTableConnector(filePath, { sanitizeFormulas: false });
  await connector.writeTable(table);
}

export async function runComparison(
  options: RunOptions,
  settings: SettingsFile,
  logger: Logger
): Promise<RunOutcome> {
  const aPath = resolve(options.cwd, options.a);
  const bPath = resolve(options.cwd, options.b);
  const originalPath = resolve(options.cwd, options.originalFile);

  const a = await loadTable(aPath, logger);
  const b = await loadTable(bPath, logger);
  const original = await loadTable(originalPath, logger);

  const engine = new ComparisonEngine(logger.child({ component: 'engine' }));
  const result = engine.compare({
    a,
    b,
    original,
    settings: toComparisonSettings(settings, options.printHeaders),
  });

  const differencesPath = options.outputPath
    ? resolve(options.cwd, options.outputPath)
    : resolve(options.cwd, differencesFileName(a.label, b.label));
  await saveTable(differencesPath, result.report.differences);
  logger.info(`Saved results to ${differencesPath}`);

  let suspiciousPath: string | undefined;
  if (result.suspicious.length > 0) {
    if (result.suspicious.length < SUSPICIOUS_LOG_LIMIT) {
      logger.info(
        'These records are suspicious: all identifiers on the same row did not match across the two sheets. ' +
          'So a (potentially) different article was on the same row in the two sheets.'
      );
      logger.info(JSON.stringify(result.report.suspicious, null, 2));
    }
    suspiciousPath = resolve(options.cwd, suspiciousFileName(a.label, b.label));
    await saveTable(suspiciousPath, result.report.suspicious);
    logger.info(`Saved suspicious records to ${suspiciousPath}`);
  }

  const { summary } = result;
  logger.info(`Original file ${original.label} number of rows ${summary.originalRowCount}`);
  logger.info(`${a.label} number of rows ${summary.aRowCount}`);
  logger.info(`${b.label} number of rows ${summary.bRowCount}`);
  logger.info(
    `${summary.suspiciousCount} suspicious rows which were not processed for differences ` +
      '(all the IDs on those rows did not match across the two tables being compared).'
  );
  logger.info(`${summary.processedCount} rows were processed for differences`);

  return { result, differencesPath, suspiciousPath };
}


/**
 * Log why a run stopped. Known errors get their actionable message and, for
 * ReconcileError, the context that locates the problem.
 */
export function logFailure(logger: Logger, error: unknown): void {
  if (error instanceof ReconcileError) {
    logger.error(error.toActionableMessage(), { error });
    if (Object.keys(error.context).length > 0) {
      logger.error(`Context: ${JSON.stringify(error.context)}`);
    }
    return;
  }
  if (error instanceof ConnectorError) {
    logger.error(error.toActionableMessage(), { error });
    return;
  }
  logger.error(`Comparison failed: ${error instanceof Error ? error.message : String(error)}`, { error });
}
