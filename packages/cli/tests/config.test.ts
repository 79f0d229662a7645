import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ReconcileError } from '@tablediff/diff-core';
import {
  loadSettings,
  mergeSettings,
  readSettingsFile,
  toComparisonSettings,
} from '../src/config.js';

let tmpDir = '';

function makeTmpDir(): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'tablediff-config-'));
  return tmpDir;
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('readSettingsFile', () => {
  it('returns undefined for a missing file', async () => {
    expect(await readSettingsFile(join(makeTmpDir(), 'settings.json'))).toBeUndefined();
  });

  it('reads settings written with a BOM', async () => {
    const file = join(makeTmpDir(), 'settings.json');
    writeFileSync(
      file,
      '\uFEFF{"WHITELIST_COLUMNS":["DOI","PMID","PMCID","Article title"],"LOG_LEVEL":"debug"}',
      'utf-8'
    );

    expect(await readSettingsFile(file)).toEqual({
      WHITELIST_COLUMNS: ['DOI', 'PMID', 'PMCID', 'Article title'],
      LOG_LEVEL: 'debug',
    });
  });

  it('rejects invalid JSON naming the file', async () => {
    const file = join(makeTmpDir(), 'settings.json');
    writeFileSync(file, '{"WHITELIST_COLUMNS": [', 'utf-8');

    const error = await rejectionOf(readSettingsFile(file));

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error).toMatchObject({
      code: 'CONFIG_ERROR',
      message: `${file} exists, but contains invalid JSON.`,
      context: { file },
    });
  });

  it('rejects unknown keys', async () => {
    const file = join(makeTmpDir(), 'settings.json');
    writeFileSync(file, '{"WHITELIST": []}', 'utf-8');

    const error = await rejectionOf(readSettingsFile(file));

    expect(error).toMatchObject({
      code: 'CONFIG_ERROR',
      message: `Invalid ${file}:\n- (root): Unrecognized key(s) in object: 'WHITELIST'`,
    });
  });

  it('rejects unknown comparator names with the offending path', async () => {
    const file = join(makeTmpDir(), 'settings.json');
    writeFileSync(file, '{"COLUMN_COMPARATORS": {"Journal": "fuzzy"}}', 'utf-8');

    const error = await rejectionOf(readSettingsFile(file));

    expect(error).toBeInstanceOf(ReconcileError);
    if (!(error instanceof ReconcileError)) return;
    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.message).toContain('- COLUMN_COMPARATORS.Journal: Invalid enum value.');
  });
});

describe('mergeSettings', () => {
  it('lets later files replace whole keys', () => {
    expect(
      mergeSettings(
        { WHITELIST_COLUMNS: ['DOI', 'Journal'], LOG_LEVEL: 'debug' },
        undefined,
        { WHITELIST_COLUMNS: ['DOI'] }
      )
    ).toEqual({ WHITELIST_COLUMNS: ['DOI'], LOG_LEVEL: 'debug' });
  });
});

describe('loadSettings', () => {
  it('merges settings.json with the per-original settings file', async () => {
    const cwd = makeTmpDir();
    writeFileSync(
      join(cwd, 'settings.json'),
      JSON.stringify({
        WHITELIST_COLUMNS: ['DOI', 'PMID', 'PMCID', 'Article title', 'Journal'],
        EXPECTED_HEADER_DIFFERENCES_RAW: [['Journal', 'Source']],
      })
    );
    writeFileSync(
      join(cwd, 'original.csv.json'),
      JSON.stringify({ EXPECTED_HEADER_DIFFERENCES_RAW: [['Journal', 'Source title']] })
    );

    const loaded = await loadSettings({ cwd, originalPath: 'data/original.csv' });

    expect(loaded.sources).toEqual([join(cwd, 'settings.json'), join(cwd, 'original.csv.json')]);
    expect(loaded.settings).toEqual({
      WHITELIST_COLUMNS: ['DOI', 'PMID', 'PMCID', 'Article title', 'Journal'],
      EXPECTED_HEADER_DIFFERENCES_RAW: [['Journal', 'Source title']],
    });
  });

  it('reads the global settings from the given path instead', async () => {
    const cwd = makeTmpDir();
    writeFileSync(join(cwd, 'settings.json'), JSON.stringify({ LOG_LEVEL: 'debug' }));
    writeFileSync(join(cwd, 'quiet.json'), JSON.stringify({ LOG_LEVEL: 'error' }));

    const loaded = await loadSettings({ cwd, originalPath: 'o.csv', globalPath: 'quiet.json' });

    expect(loaded).toEqual({ settings: { LOG_LEVEL: 'error' }, sources: [join(cwd, 'quiet.json')] });
  });

  it('returns empty settings when no file exists', async () => {
    expect(await loadSettings({ cwd: makeTmpDir(), originalPath: 'o.csv' })).toEqual({
      settings: {},
      sources: [],
    });
  });
});

describe('toComparisonSettings', () => {
  it('maps settings keys onto engine settings', () => {
    expect(
      toComparisonSettings(
        {
          WHITELIST_COLUMNS: ['DOI'],
          EXPECTED_HEADER_DIFFERENCES_RAW: [['Authors', 'Author']],
          COLUMN_COMPARATORS: { DOI: 'exact' },
          LOG_FORMAT: 'json',
        },
        true
      )
    ).toEqual({
      whitelist: ['DOI'],
      synonymGroups: [['Authors', 'Author']],
      columnComparators: { DOI: 'exact' },
      printHeaders: true,
    });
  });
});
