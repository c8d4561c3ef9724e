import { existsSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';

import { loadConfig } from './config';
import type { CliConfig } from './config';
import { errorMessage } from './errors';
import { HttpClient } from './http-client';
import type { FetchFn } from './http-client';
import { loadSuites, resolveSuitePaths } from './loader';
import { runBatch } from './orchestrator';
import { PluginHost } from './plugin-host';
import { consoleReporterPlugin } from './plugins/console-reporter';
import { coreFilterPlugin } from './plugins/core-filter';
import { coreLoaderPlugin } from './plugins/core-loader';
import { postmanLoaderPlugin } from './plugins/postman-loader';
import type { BatchResult } from './types';
import { resolveUserAgent } from './user-agents';

/**
 * Load, filter and execute every suite the config points at.
 */
export async function runAllTests(cfg: CliConfig, fetchFn?: FetchFn): Promise<BatchResult> {
  const host = new PluginHost([
    coreLoaderPlugin(cfg),
    postmanLoaderPlugin,
    coreFilterPlugin(cfg),
    consoleReporterPlugin(cfg),
  ]);
  await host.setup();

  const api = new HttpClient({
    baseURL: cfg.baseUrl,
    pluginHost: host,
    fetch: fetchFn,
  });
  api.setHeader('User-Agent', resolveUserAgent(cfg.userAgent));

  const suitePaths = await resolveSuitePaths(cfg);
  const suites = await host.prepareSuites(await loadSuites(suitePaths, host));
  const tests = suites.flatMap((s) => s.tests);

  return runBatch(tests, {
    executor: api,
    concurrency: cfg.concurrency,
    rps: cfg.rps,
    pluginHost: host,
  });
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return Boolean(entry) && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  loadConfig(process.argv)
    .then((cfg) => runAllTests(cfg))
    .then((batch) => {
      process.exitCode = batch.summary.failed === 0 ? 0 : 1;
    })
    .catch((error: unknown) => {
      console.error(`❌ ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
