import path from 'path';
import { existsSync } from 'fs';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import defaultConfig from './default.config';
import { formatIssues } from './definition';
import { ConfigurationError } from './errors';

export interface CliConfig {
  configFile?: string;
  baseUrl?: string;
  testDir?: string;
  filePattern?: string;
  suiteFile?: string;
  tags?: string[];
  filter?: string;
  happy?: boolean;
  randomize?: boolean;
  /** Requests per second; 0 means unlimited */
  rps?: number;
  /** Default per-test timeout in seconds */
  timeout?: number;
  concurrency?: number;
  userAgent?: string;
  verbose?: boolean;
  projectRoot?: string;
}

export const PROJECT_CONFIG_FILE = 'probekit.config.js';

const fileConfigSchema = z
  .object({
    baseUrl: z.string(),
    testDir: z.string(),
    filePattern: z.string(),
    suiteFile: z.string(),
    tags: z.array(z.string()),
    filter: z.string(),
    happy: z.boolean(),
    randomize: z.boolean(),
    rps: z.number().nonnegative(),
    timeout: z.number().positive(),
    concurrency: z.number().int().positive(),
    userAgent: z.string(),
    verbose: z.boolean(),
  })
  .partial();

function parseNumber(key: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${key} expects a number, got '${value ?? ''}'`);
  }
  return parsed;
}

const BOOLEAN_FLAGS = new Set(['happy', 'randomize', 'verbose']);

export function parseArgs(argv: string[]): CliConfig {
  const args = argv.slice(2);
  const cfg: CliConfig = {};
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      let value = eq === -1 ? undefined : arg.slice(eq + 1);
      if (value === undefined && !BOOLEAN_FLAGS.has(key)) {
        const next = args[i + 1];
        if (next && !next.startsWith('--')) {
          value = next;
          i += 1;
        }
      }
      switch (key) {
        case 'config':
          cfg.configFile = value;
          break;
        case 'base-url':
          cfg.baseUrl = value;
          break;
        case 'test-dir':
          cfg.testDir = value;
          break;
        case 'file-pattern':
          cfg.filePattern = value;
          break;
        case 'tags':
          cfg.tags = value ? value.split(',').map((t) => t.trim()).filter(Boolean) : [];
          break;
        case 'filter':
          cfg.filter = value;
          break;
        case 'happy':
          cfg.happy = true;
          break;
        case 'randomize':
          cfg.randomize = true;
          break;
        case 'rps':
          cfg.rps = parseNumber(key, value);
          break;
        case 'timeout':
          cfg.timeout = parseNumber(key, value);
          break;
        case 'concurrency':
          cfg.concurrency = parseNumber(key, value);
          break;
        case 'user-agent':
        case 'ua':
          cfg.userAgent = value;
          break;
        case 'verbose':
          cfg.verbose = true;
          break;
        default:
          throw new ConfigurationError(`unknown option --${key}`);
      }
    } else if (!cfg.suiteFile) {
      cfg.suiteFile = arg;
    }
    i += 1;
  }

  // flags given without a value must not mask config file settings
  for (const key of Object.keys(cfg)) {
    if (Reflect.get(cfg, key) === undefined) Reflect.deleteProperty(cfg, key);
  }
  return cfg;
}

async function importConfigFile(file: string): Promise<CliConfig> {
  const mod: unknown = await import(pathToFileURL(file).href);
  const exported = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  const parsed = fileConfigSchema.safeParse(exported);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config in ${file}: ${formatIssues(parsed.error).join(', ')}`);
  }
  return parsed.data;
}

export async function loadConfig(argv = process.argv, projectRoot = process.cwd()): Promise<CliConfig> {
  const cliOpts = parseArgs(argv);
  // first load default config.
  let cfg: CliConfig = { ...defaultConfig };

  // then load project config.
  const projectCfgPath = path.join(projectRoot, PROJECT_CONFIG_FILE);
  if (existsSync(projectCfgPath)) {
    cfg = { ...cfg, ...(await importConfigFile(projectCfgPath)) };
  }

  // then load invocation-time project config.
  if (cliOpts.configFile) {
    cfg = { ...cfg, ...(await importConfigFile(path.resolve(projectRoot, cliOpts.configFile))) };
  }

  // then apply cli options over the configs.
  cfg = { ...cfg, ...cliOpts };
  cfg.projectRoot = projectRoot;

  return cfg;
}
