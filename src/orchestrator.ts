import { validateDefinition } from './definition';
import { ConfigurationError, TransportError, ValidationError, errorMessage } from './errors';
import type { RequestExecutor } from './http-client';
import type { PluginHost } from './plugin-host';
import RateLimiter from './rate-limiter';
import { runSuite } from './suite-runner';
import type { BatchResult, BatchSummary, FailureKind, TestDefinition, TestExecutionResult } from './types';

export const DEFAULT_CONCURRENCY = 5;

export interface BatchOptions {
  executor: RequestExecutor;
  /** Maximum number of tests in flight (default 5) */
  concurrency?: number;
  /** Requests per second across the batch; unset means unlimited */
  rps?: number;
  pluginHost?: PluginHost;
}

function roundSeconds(ms: number): number {
  return Math.round(ms) / 1000;
}

function failureKindOf(error: unknown): FailureKind {
  if (error instanceof ValidationError) return 'validation';
  if (error instanceof TransportError) return 'transport';
  return 'internal';
}

/**
 * Run one test. Every failure is captured on the result; this never rejects.
 */
export async function executeTest(
  test: TestDefinition,
  executor: RequestExecutor,
  rateLimiter?: RateLimiter
): Promise<TestExecutionResult> {
  let startTime = performance.now();
  try {
    validateDefinition(test);
    await rateLimiter?.acquire();
    // time spent throttled is not part of the test
    startTime = performance.now();
    const snapshot = await executor.execute(test);
    const outcome = runSuite(snapshot, test.assertions);
    return {
      testDefinition: test,
      responseSnapshot: snapshot,
      assertionResults: outcome.results,
      overallSuccess: outcome.overallSuccess,
      elapsedSeconds: roundSeconds(performance.now() - startTime),
    };
  } catch (error) {
    return {
      testDefinition: test,
      assertionResults: [],
      overallSuccess: false,
      elapsedSeconds: roundSeconds(performance.now() - startTime),
      transportError: errorMessage(error),
      failureKind: failureKindOf(error),
    };
  }
}

export function summarize(results: readonly TestExecutionResult[]): BatchSummary {
  let passed = 0;
  let totalElapsedSeconds = 0;
  let fastestSeconds = Infinity;
  let slowestSeconds = 0;
  for (const result of results) {
    if (result.overallSuccess) passed += 1;
    totalElapsedSeconds += result.elapsedSeconds;
    fastestSeconds = Math.min(fastestSeconds, result.elapsedSeconds);
    slowestSeconds = Math.max(slowestSeconds, result.elapsedSeconds);
  }
  const total = results.length;
  return {
    total,
    passed,
    failed: total - passed,
    successRatePercent: total === 0 ? 0 : (passed / total) * 100,
    totalElapsedSeconds,
    fastestSeconds: total === 0 ? 0 : fastestSeconds,
    slowestSeconds,
  };
}

/** Plugin listeners report problems; they never change a verdict. */
async function notify(event: string, dispatch: () => Promise<void> | undefined): Promise<void> {
  try {
    await dispatch();
  } catch (error) {
    console.warn(`⚠️  ${event} listener failed: ${errorMessage(error)}`);
  }
}

/**
 * Execute independent tests with bounded concurrency. `results[i]` always
 * belongs to `tests[i]`, and a batch of N tests always yields N results.
 * Rejects only with ConfigurationError.
 */
export async function runBatch(tests: readonly TestDefinition[], options: BatchOptions): Promise<BatchResult> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const host = options.pluginHost;
  const rateLimiter = new RateLimiter(options.rps);
  const results: TestExecutionResult[] = new Array(tests.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < tests.length) {
      const index = next;
      next += 1;
      const test = tests[index];
      await notify('onTestStart', () => host?.dispatch('onTestStart', test));
      const result = await executeTest(test, options.executor, rateLimiter);
      results[index] = result;
      await notify('onTestEnd', () => host?.dispatch('onTestEnd', test, result));
    }
  }

  await notify('onRunStart', () => host?.dispatch('onRunStart', [...tests]));
  try {
    const workers = Array.from({ length: Math.min(concurrency, tests.length) }, () => worker());
    await Promise.all(workers);
  } finally {
    rateLimiter.stop();
  }

  const batch: BatchResult = { results, summary: summarize(results) };
  await notify('onRunEnd', () => host?.dispatch('onRunEnd', batch));
  return batch;
}
