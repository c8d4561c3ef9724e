import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { loadConfig, parseArgs } from '../../src/config';
import { ConfigurationError } from '../../src/errors';
import { USER_AGENTS, resolveUserAgent } from '../../src/user-agents';

const projectDir = fileURLToPath(new URL('../fixtures/project', import.meta.url));
const bareDir = fileURLToPath(new URL('../fixtures/suites', import.meta.url));

const argv = (...args: string[]) => ['node', 'probekit', ...args];

describe('parseArgs', () => {
  it('reads flags, values and the suite file', () => {
    expect(
      parseArgs(
        argv('--base-url=http://api.test', '--tags', 'smoke, auth', '--happy', 'users.suite.yaml', '--rps', '5', '--verbose')
      )
    ).toEqual({
      baseUrl: 'http://api.test',
      tags: ['smoke', 'auth'],
      happy: true,
      suiteFile: 'users.suite.yaml',
      rps: 5,
      verbose: true,
    });
  });

  it('keeps everything after the first = in a value', () => {
    expect(parseArgs(argv('--base-url=http://api.test/?a=b')).baseUrl).toBe('http://api.test/?a=b');
  });

  it('drops flags given without a value', () => {
    expect(parseArgs(argv('--filter'))).toEqual({});
  });

  it('accepts the ua alias', () => {
    expect(parseArgs(argv('--ua', 'chrome-mac'))).toEqual({ userAgent: 'chrome-mac' });
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(argv('--nope'))).toThrow(ConfigurationError);
    expect(() => parseArgs(argv('--nope'))).toThrow('unknown option --nope');
  });

  it('rejects non-numeric numbers', () => {
    expect(() => parseArgs(argv('--concurrency', 'abc'))).toThrow("--concurrency expects a number, got 'abc'");
    expect(() => parseArgs(argv('--rps'))).toThrow("--rps expects a number, got ''");
  });
});

describe('loadConfig', () => {
  it('falls back to defaults', async () => {
    const cfg = await loadConfig(argv(), bareDir);
    expect(cfg).toMatchObject({
      baseUrl: 'http://localhost:8080',
      testDir: './test',
      concurrency: 5,
      timeout: 30,
      rps: 0,
      projectRoot: bareDir,
    });
  });

  it('layers the project config file over defaults', async () => {
    const cfg = await loadConfig(argv(), projectDir);
    expect(cfg).toMatchObject({ baseUrl: 'http://file.test', concurrency: 2, tags: ['smoke'], timeout: 30 });
  });

  it('layers --config and then flags on top', async () => {
    const cfg = await loadConfig(argv('--config', 'override.config.js', '--concurrency', '8'), projectDir);
    expect(cfg).toMatchObject({ baseUrl: 'http://override.test', concurrency: 8, tags: ['smoke'] });
  });

  it('rejects an invalid config file', async () => {
    await expect(loadConfig(argv('--config', 'invalid.config.js'), projectDir)).rejects.toThrow(
      /invalid\.config\.js: concurrency: Number must be greater than 0$/
    );
  });
});

describe('resolveUserAgent', () => {
  it('maps profile names and passes custom strings through', () => {
    expect(resolveUserAgent()).toBe(USER_AGENTS.probekit);
    expect(resolveUserAgent('Chrome Mac')).toBe(USER_AGENTS.chrome_mac);
    expect(resolveUserAgent('my-agent/1.0')).toBe('my-agent/1.0');
  });
});
