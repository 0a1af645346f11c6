import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(new URL(path, import.meta.url), 'utf8'));
}

/** Follow `keys` through nested objects, returning the string found there */
function lookup(value: unknown, ...keys: string[]): string | undefined {
  let current = value;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null || !(key in current)) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return typeof current === 'string' ? current : undefined;
}

/** Where `tsconfig.build.json` writes the compiled form of a source file */
function builtPath(tsconfig: unknown, source: string): string {
  const rootDir = lookup(tsconfig, 'compilerOptions', 'rootDir');
  const outDir = lookup(tsconfig, 'compilerOptions', 'outDir');
  const prefix = `./${rootDir}/`;
  if (!source.startsWith(prefix)) throw new Error(`${source} is outside ${rootDir}`);
  return `./${outDir}/${source.slice(prefix.length).replace(/\.ts$/, '.js')}`;
}

describe('cli package', () => {
  const pkg = readJson('../package.json');
  const build = readJson('../tsconfig.build.json');

  it('points the binary at the compiled entry point', () => {
    expect(lookup(pkg, 'bin', 'dateparse')).toBe(builtPath(build, './src/index.ts'));
  });
});

describe('core package', () => {
  const pkg = readJson('../../../packages/core/package.json');
  const build = readJson('../../../packages/core/tsconfig.build.json');

  it.each(['.', './types', './parsers'])('runs %s from compiled output and types it from sources', entry => {
    const types = lookup(pkg, 'exports', entry, 'types');
    expect(types).toMatch(/^\.\/src\/.*\.ts$/);
    expect(lookup(pkg, 'exports', entry, 'default')).toBe(builtPath(build, types ?? ''));
  });
});
