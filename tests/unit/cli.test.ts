import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runAllTests } from '../../src/cli';
import type { CliConfig } from '../../src/config';
import { USER_AGENTS } from '../../src/user-agents';
import { jsonResponse, stubFetch } from '../helpers';

const fixtures = fileURLToPath(new URL('../fixtures', import.meta.url));

const routes: Record<string, () => Response> = {
  'GET /users': () => jsonResponse([{ id: 1 }, { id: 2 }]),
  'POST /users': () => jsonResponse({ id: 3 }, 201),
  'GET /users/404': () => jsonResponse({ error: 'not found' }, 404),
  'GET /health': () => jsonResponse({ status: 'ok' }),
  'GET /ping': () => jsonResponse({}),
  'GET /admin/stats': () => jsonResponse({ error: 'forbidden' }, 403),
};

function api() {
  return stubFetch((req) => {
    const route = routes[`${req.method} ${new URL(req.url).pathname}`];
    return route ? route() : new Response('no route', { status: 599 });
  });
}

const baseConfig: CliConfig = {
  projectRoot: fixtures,
  testDir: 'suites',
  filePattern: '\\.(suite\\.(json|ya?ml)|postman_collection\\.json)$',
  baseUrl: 'http://api.test',
  concurrency: 2,
  timeout: 5,
  userAgent: 'curl',
};

describe('runAllTests', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads every suite in the test directory and runs it', async () => {
    const fetch = api();
    const batch = await runAllTests(baseConfig, fetch);

    expect(batch.results.map((r) => [r.testDefinition.suiteName, r.testDefinition.name, r.overallSuccess])).toEqual([
      ['Demo', 'Ping', true],
      ['Admin', 'Stats', false],
      ['health', 'Health', true],
      ['Users', 'List users', true],
      ['Users', 'Create user', true],
      ['Users', 'Missing user', true],
    ]);
    expect(batch.summary).toMatchObject({ total: 6, passed: 5, failed: 1 });
    expect(fetch.requests.every((r) => r.headers['user-agent'] === USER_AGENTS.curl)).toBe(true);
  });

  it('applies tag filters before running', async () => {
    const fetch = api();
    const batch = await runAllTests({ ...baseConfig, tags: ['smoke'] }, fetch);
    expect(batch.results.map((r) => r.testDefinition.name)).toEqual(['List users']);
    expect(fetch.requests.map((r) => r.url)).toEqual(['http://api.test/users']);
  });

  it('runs a single suite file', async () => {
    const fetch = api();
    const batch = await runAllTests({ ...baseConfig, suiteFile: 'suites/health.suite.json' }, fetch);
    expect(batch.summary.total).toBe(1);
    expect(batch.results[0].responseSnapshot?.json).toEqual({ status: 'ok' });
  });
});
