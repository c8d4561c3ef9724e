import type { BatchResult, Suite, TestDefinition, TestExecutionResult } from './types';

export interface PluginContext {
  // Discovery Phase: the first loader whose filter matches a path claims it
  onLoad(options: { filter: RegExp }, callback: (args: { path: string }) => Promise<{ suites: Suite[] } | null>): void;

  // Preparation Phase: Modify/Filter suites before running
  onPrepare(callback: (suites: Suite[]) => Promise<Suite[]> | Suite[]): void;

  // Network Phase: Transform the native Request object before execution
  onFetch(callback: (req: Request) => Promise<Request> | Request): void;

  // Execution Lifecycle
  onRunStart(callback: (tests: TestDefinition[]) => Promise<void> | void): void;
  onRunEnd(callback: (result: BatchResult) => Promise<void> | void): void;

  // Test Granularity
  onTestStart(callback: (test: TestDefinition) => Promise<void> | void): void;
  onTestEnd(callback: (test: TestDefinition, result: TestExecutionResult) => Promise<void> | void): void;
}

export interface Plugin {
  name: string;
  setup: (ctx: PluginContext) => void | Promise<void>;
}
