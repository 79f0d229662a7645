import { describe, expect, it } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const manifestSchema = z.object({
  name: z.string(),
  exports: z.object({
    '.': z.object({ source: z.string(), types: z.string(), default: z.string() }),
  }),
  bin: z.record(z.string()).optional(),
  scripts: z.object({ build: z.string() }),
});

const buildConfigSchema = z.object({
  compilerOptions: z.object({
    rootDir: z.string(),
    outDir: z.string(),
    declaration: z.boolean(),
    noEmit: z.boolean(),
    customConditions: z.array(z.string()),
  }),
});

const PACKAGES = ['core', 'connector-file', 'diff-core', 'cli'];

function packagePath(pkg: string, file: string): string {
  return fileURLToPath(new URL(`../../${pkg}/${file}`, import.meta.url));
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

describe('workspace packages', () => {
  it.each(PACKAGES)('%s exports its sources under "source" and its build otherwise', (pkg) => {
    const manifest = manifestSchema.parse(readJson(packagePath(pkg, 'package.json')));

    expect(manifest.name).toBe(`@tablediff/${pkg}`);
    expect(manifest.exports['.']).toEqual({
      source: './src/index.ts',
      types: './dist/index.d.ts',
      default: './dist/index.js',
    });
    expect(existsSync(packagePath(pkg, 'src/index.ts'))).toBe(true);
    expect(manifest.scripts.build).toBe('tsc -p tsconfig.build.json');
  });

  it.each(PACKAGES)('%s compiles src into dist against the built dependencies', (pkg) => {
    const config = buildConfigSchema.parse(readJson(packagePath(pkg, 'tsconfig.build.json')));

    expect(config.compilerOptions).toEqual({
      rootDir: 'src',
      outDir: 'dist',
      declaration: true,
      noEmit: false,
      customConditions: [],
    });
  });

  it('points the binary at the compiled entry point', () => {
    const manifest = manifestSchema.parse(readJson(packagePath('cli', 'package.json')));

    expect(manifest.bin).toEqual({ tablediff: './dist/cli.js' });
    expect(readFileSync(packagePath('cli', 'src/cli.ts'), 'utf-8').startsWith('#!/usr/bin/env node\n')).toBe(
      true
    );
  });
});
