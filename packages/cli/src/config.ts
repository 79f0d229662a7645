import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { z } from 'zod';
import {
  COMPARATOR_NAMES,
  ReconcileError,
  type ComparisonSettings,
} from '@tablediff/diff-core';

/** Default name of the global settings file, looked up in the working directory */
export const GLOBAL_SETTINGS_FILE = 'settings.json';

export const settingsFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    WHITELIST_COLUMNS: z.array(z.string()).optional(),
    EXPECTED_HEADER_DIFFERENCES_RAW: z.array(z.array(z.string().min(1)).min(1)).optional(),
    COLUMN_COMPARATORS: z.record(z.enum(COMPARATOR_NAMES)).optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    LOG_FORMAT: z.enum(['text', 'json']).optional(),
  })
  .strict();

export type SettingsFile = z.infer<typeof settingsFileSchema>;

export interface LoadedSettings {
  settings: SettingsFile;
  /** Files that existed and were merged, in merge order */
  sources: string[];
}

export function formatZodError(err: z.ZodError, file: string): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid ${file}:\n${issues}`;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and validate one settings file
 * @returns undefined when the file does not exist
 */
export async function readSettingsFile(filePath: string): Promise<SettingsFile | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new ReconcileError({
      code: 'CONFIG_ERROR',
      message: `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { file: filePath },
    });
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ReconcileError({
      code: 'CONFIG_ERROR',
      message: `${filePath} exists, but contains invalid JSON.`,
      suggestion: 'Remove the file or fix it before running again.',
      cause: error instanceof Error ? error : undefined,
      context: { file: filePath },
    });
  }

  const result = settingsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ReconcileError({
      code: 'CONFIG_ERROR',
      message: formatZodError(result.error, filePath),
      suggestion: 'Fix the listed settings before running again.',
      context: { file: filePath },
    });
  }

  return result.data;
}

/**
 * Shallow merge: keys of later files replace keys of earlier ones
 */
export function mergeSettings(...files: (SettingsFile | undefined)[]): SettingsFile {
  const merged: SettingsFile = {};
  for (const file of files) {
    if (file) Object.assign(merged, file);
  }
  return merged;
}

/**
 * Load the global settings file, then the per-original file
 * `<original file name>.json`, both from `cwd`.
 */
export async function loadSettings(options: {
  cwd: string;
  originalPath: string;
  globalPath?: string;
}): Promise<LoadedSettings> {
  const candidates = [
    resolve(options.cwd, options.globalPath ?? GLOBAL_SETTINGS_FILE),
    resolve(options.cwd, `${basename(options.originalPath)}.json`),
  ];

  const sources: string[] = [];
  const files: SettingsFile[] = [];
  for (const candidate of candidates) {
    const file = await readSettingsFile(candidate);
    if (file) {
      sources.push(candidate);
      files.push(file);
    }
  }

  return { settings: mergeSettings(...files), sources };
}

export function toComparisonSettings(
  settings: SettingsFile,
  printHeaders = false
): ComparisonSettings {
  return {
    whitelist: settings.WHITELIST_COLUMNS,
    synonymGroups: settings.EXPECTED_HEADER_DIFFERENCES_RAW,
    columnComparators: settings.COLUMN_COMPARATORS,
    printHeaders,
  };
}
