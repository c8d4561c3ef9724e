import { evaluate } from './assertions';
import type { AssertionSpec, ResponseSnapshot, SuiteOutcome } from './types';

/**
 * Evaluate every assertion in order. An empty list passes vacuously.
 */
export function runSuite(snapshot: ResponseSnapshot, specs: readonly AssertionSpec[]): SuiteOutcome {
  const results = specs.map((spec) => evaluate(snapshot, spec));
  const passed = results.filter((r) => r.passed).length;
  return {
    results,
    overallSuccess: passed === results.length,
    passed,
    failed: results.length - passed,
  };
}
