import { vi } from 'vitest';
import type { EngineLogger } from '../src/index.js';

export const HEADER = ['DOI', 'PMID', 'PMCID', 'Article title'];

/**
 * Run `fn` and return what it threw
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

export function createTestLogger() {
  return {
    debug: vi.fn<[string, Record<string, unknown>?], void>(),
    info: vi.fn<[string, Record<string, unknown>?], void>(),
    warn: vi.fn<[string, Record<string, unknown>?], void>(),
  } satisfies EngineLogger;
}

/** Table with HEADER and one data row per entry */
export function tableOf(...rows: string[][]): string[][] {
  return [[...HEADER], ...rows.map((row) => [...row])];
}
