import type { Plugin } from '../plugin-api';
import type { TestDefinition } from '../types';

export interface FilterConfig {
  tags?: string[];
  filter?: string;
  happy?: boolean;
  randomize?: boolean;
}

export function filterTestsByTags(tests: TestDefinition[], tags?: string[]): TestDefinition[] {
  if (!tags || tags.length === 0) {
    return tests;
  }
  const normalizedTags = tags.map((t) => t.toLowerCase());
  return tests.filter((test) => {
    const testTags = (test.tags || []).map((t) => t.toLowerCase());
    return testTags.some((tag) => normalizedTags.includes(tag));
  });
}

/** Keeps tests whose status assertion expects 2xx; no status assertion counts as 200. */
export function filterTestsByHappy(tests: TestDefinition[], happy?: boolean): TestDefinition[] {
  if (!happy) {
    return tests;
  }
  return tests.filter((test) => {
    const statusAssertion = test.assertions.find((a) => a.type === 'status_code');
    const status = statusAssertion?.type === 'status_code' ? statusAssertion.expected : 200;
    return status >= 200 && status < 300;
  });
}

export function filterTestsByName(tests: TestDefinition[], pattern?: string): TestDefinition[] {
  if (!pattern) {
    return tests;
  }
  const regex = new RegExp(pattern, 'i');
  return tests.filter((test) => regex.test(test.name));
}

function shuffle<T>(arr: T[]): void {
  for (let i = arr.length - 1; i > 0; i -= 1) {
    const j = Math.floor(Math.random() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

export const coreFilterPlugin = (cfg: FilterConfig): Plugin => ({
  name: 'core-filter',
  setup(ctx) {
    ctx.onPrepare(async (suites) => {
      let tests: TestDefinition[] = suites.flatMap((s) => s.tests.map((t) => ({ ...t, suiteName: t.suiteName || s.name })));

      tests = filterTestsByTags(tests, cfg.tags);
      tests = filterTestsByName(tests, cfg.filter);
      tests = filterTestsByHappy(tests, cfg.happy);

      if (cfg.randomize) {
        shuffle(tests);
      }

      const testsBySuite = new Map<string, TestDefinition[]>();
      tests.forEach((test) => {
        const suiteName = test.suiteName || 'unknown';
        const bucket = testsBySuite.get(suiteName) ?? [];
        bucket.push(test);
        testsBySuite.set(suiteName, bucket);
      });

      return [...testsBySuite.entries()].map(([name, suiteTests]) => ({
        name,
        tests: suiteTests,
      }));
    });
  },
});
