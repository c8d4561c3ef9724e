import type { Plugin, PluginContext } from './plugin-api';
import type { BatchResult, Suite, TestDefinition, TestExecutionResult } from './types';

type LoadCallback = (args: { path: string }) => Promise<{ suites: Suite[] } | null>;

export class PluginHost {
  private plugins: Plugin[] = [];

  // Callbacks
  private onLoadCbs: { filter: RegExp; callback: LoadCallback }[] = [];
  private onPrepareCbs: ((suites: Suite[]) => Promise<Suite[]> | Suite[])[] = [];
  private onFetchCbs: ((req: Request) => Promise<Request> | Request)[] = [];
  private onRunStartCbs: ((tests: TestDefinition[]) => Promise<void> | void)[] = [];
  private onRunEndCbs: ((result: BatchResult) => Promise<void> | void)[] = [];
  private onTestStartCbs: ((test: TestDefinition) => Promise<void> | void)[] = [];
  private onTestEndCbs: ((test: TestDefinition, result: TestExecutionResult) => Promise<void> | void)[] = [];

  public context: PluginContext = {
    onLoad: (options, callback) => {
      this.onLoadCbs.push({ filter: options.filter, callback });
    },
    onPrepare: (callback) => {
      this.onPrepareCbs.push(callback);
    },
    onFetch: (callback) => {
      this.onFetchCbs.push(callback);
    },
    onRunStart: (callback) => {
      this.onRunStartCbs.push(callback);
    },
    onRunEnd: (callback) => {
      this.onRunEndCbs.push(callback);
    },
    onTestStart: (callback) => {
      this.onTestStartCbs.push(callback);
    },
    onTestEnd: (callback) => {
      this.onTestEndCbs.push(callback);
    },
  };

  constructor(plugins: Plugin[]) {
    this.plugins = plugins;
  }

  public async setup(): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.setup(this.context);
    }
  }

  public canLoad(path: string): boolean {
    return this.onLoadCbs.some(({ filter }) => filter.test(path));
  }

  public async loadSuites(path: string): Promise<Suite[]> {
    const loader = this.onLoadCbs.find(({ filter }) => filter.test(path));
    if (!loader) return [];
    const result = await loader.callback({ path });
    return result?.suites || [];
  }

  public async prepareSuites(suites: Suite[]): Promise<Suite[]> {
    let result = suites;
    for (const cb of this.onPrepareCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async transformRequest(req: Request): Promise<Request> {
    let result = req;
    for (const cb of this.onFetchCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async dispatch(event: 'onRunStart', arg: TestDefinition[]): Promise<void>;
  public async dispatch(event: 'onRunEnd', arg: BatchResult): Promise<void>;
  public async dispatch(event: 'onTestStart', arg: TestDefinition): Promise<void>;
  public async dispatch(event: 'onTestEnd', arg1: TestDefinition, arg2: TestExecutionResult): Promise<void>;
  public async dispatch(
    event: 'onRunStart' | 'onRunEnd' | 'onTestStart' | 'onTestEnd',
    arg1: TestDefinition[] | BatchResult | TestDefinition,
    arg2?: TestExecutionResult
  ): Promise<void> {
    switch (event) {
      case 'onRunStart':
        if (Array.isArray(arg1)) {
          for (const cb of this.onRunStartCbs) await cb(arg1);
        }
        break;
      case 'onRunEnd':
        if ('summary' in arg1) {
          for (const cb of this.onRunEndCbs) await cb(arg1);
        }
        break;
      case 'onTestStart':
        if ('url' in arg1) {
          for (const cb of this.onTestStartCbs) await cb(arg1);
        }
        break;
      case 'onTestEnd':
        if ('url' in arg1 && arg2) {
          for (const cb of this.onTestEndCbs) await cb(arg1, arg2);
        }
        break;
      default:
        break;
    }
  }
}
