import { readFile } from 'fs/promises';
import path from 'path';
import { load as parseYaml } from 'js-yaml';
import { parseTestDefinition } from '../definition';
import { ValidationError } from '../errors';
import type { Plugin } from '../plugin-api';
import type { Suite } from '../types';

export const SUITE_FILE = /\.suite\.(json|ya?ml)$/;

function suiteNameFromPath(filePath: string): string {
  return path.parse(path.basename(filePath)).name.replace(/\.suite$/, '');
}

/**
 * A suite file holds either an array of tests or `{ name, tests }`.
 */
export function suiteFromData(data: unknown, filePath: string, timeoutSeconds?: number): Suite {
  let rawTests: unknown[] = [];
  let name: string | undefined;

  if (Array.isArray(data)) {
    rawTests = data;
  } else if (typeof data === 'object' && data !== null) {
    if ('tests' in data && Array.isArray(data.tests)) rawTests = data.tests;
    if ('name' in data && typeof data.name === 'string') name = data.name;
  } else {
    throw new ValidationError(`${filePath}: expected an array of tests or an object with a 'tests' array`);
  }

  const suiteName = name || suiteNameFromPath(filePath);
  const tests = rawTests.map((raw, index) => parseTestDefinition(raw, index, { timeoutSeconds, suiteName }));
  return { name: suiteName, tests, loadPath: filePath };
}

export async function loadSuite(filePath: string, timeoutSeconds?: number): Promise<Suite> {
  const raw = await readFile(filePath, 'utf8');
  const data: unknown = filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  return suiteFromData(data, filePath, timeoutSeconds);
}

export const coreLoaderPlugin = (cfg: { timeout?: number } = {}): Plugin => ({
  name: 'core-loader',
  setup(ctx) {
    ctx.onLoad({ filter: SUITE_FILE }, async ({ path }) => {
      const suite = await loadSuite(path, cfg.timeout);
      return { suites: [suite] };
    });
  },
});
