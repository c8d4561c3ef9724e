import type { Plugin } from '../plugin-api';
import type { TestExecutionResult } from '../types';

export interface ReporterConfig {
  baseUrl?: string;
  verbose?: boolean;
}

function red(text: string): string {
  return `\u001b[31m${text}\u001b[39m`;
}

function green(text: string): string {
  return `\u001b[32m${text}\u001b[39m`;
}

export function drawProgressBar(passed: number, failed: number, total: number, width: number = 30): string {
  const passedWidth = Math.round((passed / total) * width) || 0;
  const failedWidth = Math.round((failed / total) * width) || 0;
  const pendingWidth = Math.max(0, width - passedWidth - failedWidth);

  const passedBar = green('█'.repeat(passedWidth));
  const failedBar = red('█'.repeat(failedWidth));
  const pendingBar = '░'.repeat(pendingWidth);

  return `[${passedBar}${failedBar}${pendingBar}]`;
}

export function resultIcon(result: TestExecutionResult): string {
  if (result.overallSuccess) return '✅';
  if (result.transportError === 'timeout') return '⏰';
  return '❌';
}

export function failureLines(result: TestExecutionResult): string[] {
  if (result.transportError) {
    return [`${result.failureKind ?? 'transport'} error: ${result.transportError}`];
  }
  return result.assertionResults
    .filter((a) => !a.passed)
    .map((a) => (a.error ? `${a.spec.type}: ${a.error}` : a.detail));
}

export const consoleReporterPlugin = (cfg: ReporterConfig): Plugin => ({
  name: 'console-reporter',
  setup(ctx) {
    let totalTests = 0;
    let passedTests = 0;
    let failedTests = 0;

    ctx.onRunStart((tests) => {
      console.log(`🚀 Starting API tests${cfg.baseUrl ? ` against ${cfg.baseUrl}` : ''}`);
      console.log('='.repeat(50));
      totalTests = tests.length;
      passedTests = 0;
      failedTests = 0;
    });

    ctx.onTestEnd((_test, result) => {
      if (result.overallSuccess) {
        passedTests++;
      } else {
        failedTests++;
      }
      const progress = passedTests + failedTests;
      const bar = drawProgressBar(passedTests, failedTests, totalTests);
      const percentage = ((progress / totalTests) * 100).toFixed(0);
      process.stdout.write(`  Progress: ${bar} ${percentage}% (${progress}/${totalTests})\r`);
    });

    ctx.onRunEnd(({ results, summary }) => {
      process.stdout.write('\n'); // Clear progress bar line

      const resultsBySuite = new Map<string, TestExecutionResult[]>();
      results.forEach((r) => {
        const suiteName = r.testDefinition.suiteName || 'unknown';
        const bucket = resultsBySuite.get(suiteName) ?? [];
        bucket.push(r);
        resultsBySuite.set(suiteName, bucket);
      });

      console.log('\n📊 Test Summary:');
      resultsBySuite.forEach((suiteResults, suite) => {
        console.log(`\n🗂️  Suite: ${suite}`);
        suiteResults.forEach((result) => {
          const ms = Math.round(result.elapsedSeconds * 1000);
          console.log(`  [${resultIcon(result)}] ${result.testDefinition.name} (${ms}ms)`);
          if (!result.overallSuccess) {
            failureLines(result).forEach((line) => {
              console.log(red(`    Test failure reason: ${line}`));
            });
          } else if (cfg.verbose) {
            result.assertionResults.forEach((a) => {
              console.log(`    ✓ ${a.detail}`);
            });
          }
        });
      });

      console.log('\n' + '='.repeat(50));
      console.log(
        `✨ Tests completed: ${summary.passed}/${summary.total} passed (${summary.successRatePercent.toFixed(1)}%)`
      );

      if (summary.total > 0) {
        const avg = summary.totalElapsedSeconds / summary.total;
        console.log(
          `⏱️  Latency: min ${summary.fastestSeconds.toFixed(3)}s; avg ${avg.toFixed(3)}s; max ${summary.slowestSeconds.toFixed(3)}s`
        );
      }
    });
  },
});
