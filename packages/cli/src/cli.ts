#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   tablediff a.csv b.csv --original-file original.csv [-o report.csv]
 */

import { USAGE, UsageError, parseArgs, type ParsedArgs } from './args.js';
import { loadSettings } from './config.js';
import { Logger } from './logger.js';
import { logFailure, runComparison } from './run.js';

async function main(): Promise<void> {
  let logger = new Logger();

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error('');
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const cwd = process.cwd();

  try {
    const { settings, sources } = await loadSettings({
      cwd,
      originalPath: parsed.args.originalFile,
      globalPath: parsed.args.settingsPath,
    });
    logger = new Logger({ level: settings.LOG_LEVEL, format: settings.LOG_FORMAT });
    logger.debug(sources.length > 0 ? `Settings loaded from ${sources.join(', ')}` : 'No settings files found');

    await runComparison({ ...parsed.args, cwd }, settings, logger);
  } catch (error) {
    logFailure(logger, error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
