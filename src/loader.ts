import { readdir } from 'fs/promises';
import path from 'path';
import type { CliConfig } from './config';
import type { PluginHost } from './plugin-host';
import type { Suite } from './types';

export async function resolveSuitePaths(cfg: CliConfig): Promise<string[]> {
  const projectRoot = cfg.projectRoot || process.cwd();
  if (cfg.suiteFile) {
    return [path.resolve(projectRoot, cfg.suiteFile)];
  }

  const testDir = path.resolve(projectRoot, cfg.testDir || './test');
  const files = await readdir(testDir);
  const pattern = new RegExp(cfg.filePattern || '\\.suite\\.(json|ya?ml)$');
  return files
    .filter((f) => pattern.test(f))
    .sort()
    .map((f) => path.join(testDir, f));
}

export async function loadSuites(paths: string[], host: PluginHost): Promise<Suite[]> {
  const suites: Suite[] = [];
  for (const p of paths) {
    if (!host.canLoad(p)) {
      console.warn(`⚠️  No loader for ${p}, skipping`);
      continue;
    }
    // eslint-disable-next-line no-await-in-loop
    suites.push(...(await host.loadSuites(p)));
  }
  return suites;
}
