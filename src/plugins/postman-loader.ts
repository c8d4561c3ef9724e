import { readFile } from 'fs/promises';
import type { Plugin } from '../plugin-api';
import { fromPostmanCollection } from '../postman';
import type { Suite, TestDefinition } from '../types';

export const POSTMAN_FILE = /\.postman_collection\.json$/;

export const postmanLoaderPlugin: Plugin = {
  name: 'postman-loader',
  setup(ctx) {
    ctx.onLoad({ filter: POSTMAN_FILE }, async ({ path }) => {
      const data: unknown = JSON.parse(await readFile(path, 'utf8'));
      const { tests, skipped } = fromPostmanCollection(data);
      skipped.forEach((reason) => {
        console.warn(`⚠️  Skipped Postman request ${reason}`);
      });

      const bySuite: Record<string, TestDefinition[]> = {};
      tests.forEach((test) => {
        const suiteName = test.suiteName || 'unknown';
        if (!bySuite[suiteName]) {
          bySuite[suiteName] = [];
        }
        bySuite[suiteName].push(test);
      });

      const suites: Suite[] = Object.entries(bySuite).map(([name, suiteTests]) => ({
        name,
        tests: suiteTests,
        loadPath: path,
      }));
      return { suites };
    });
  },
};
