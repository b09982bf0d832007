import fs from 'fs';
import { TestCaseResult, TestResultSet, TestRunReport, TimeoutError } from '../types';
import { Clock, systemClock } from './clock';
import { describeError } from './error';
import { Logger, createLogger } from './logger';

export const RESULT_MARKERS = {
  pass: '[PASS]',
  fail: '[FAIL]',
  summary: 'Summary:',
} as const;

const DEFAULT_POLL_INTERVAL_MS = 1000;

// "file.c:42: message" as printed by the guest-side assertion macros
const FAILURE_LOCATION = /^[^\s:][^:]*:\d+:/;

export function parseTestResults(contents: string): TestResultSet {
  const tests: TestCaseResult[] = [];
  let passed = 0;
  let failed = 0;
  let previousWasFailure = false;

  // Files written by the guest use classic Mac CR line endings.
  for (const line of contents.split(/\r\n|\r|\n/)) {
    const trimmed = line.trim();

    if (line.startsWith(RESULT_MARKERS.pass)) {
      tests.push({ name: line.slice(RESULT_MARKERS.pass.length).trim(), passed: true });
      passed += 1;
      previousWasFailure = false;
    } else if (line.startsWith(RESULT_MARKERS.fail)) {
      tests.push({ name: line.slice(RESULT_MARKERS.fail.length).trim(), passed: false });
      failed += 1;
      previousWasFailure = true;
    } else if (previousWasFailure && FAILURE_LOCATION.test(trimmed)) {
      tests[tests.length - 1].details = trimmed;
      previousWasFailure = false;
    } else {
      previousWasFailure = false;
    }
  }

  return { tests, passed, failed, total: passed + failed };
}

export interface ResultWatcherOptions {
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Waits for the guest test runner to finish writing its log on the shared
 * volume. The log is only parsed once it contains the summary marker.
 */
export class ResultWatcher {
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ResultWatcherOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('results');
  }

  async waitForResults(resultsPath: string, timeoutMs: number): Promise<TestResultSet> {
    const startedAt = this.clock.now();
    const deadline = startedAt + timeoutMs;

    for (;;) {
      const contents = await this.readIfPresent(resultsPath);
      if (contents !== undefined && contents.includes(RESULT_MARKERS.summary)) {
        this.logger.debug('results complete', { resultsPath });
        return parseTestResults(contents);
      }

      const now = this.clock.now();
      if (now >= deadline) {
        const elapsedMs = now - startedAt;
        throw new TimeoutError(
          `Tests did not complete within ${Math.round(elapsedMs / 1000)} seconds (${resultsPath})`,
          elapsedMs
        );
      }

      await this.clock.sleep(Math.min(this.pollIntervalMs, deadline - now));
    }
  }

  // The guest may still be creating or writing the file; any read failure
  // counts as "not there yet" until the deadline.
  private async readIfPresent(filePath: string): Promise<string | undefined> {
    try {
      return await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        this.logger.debug('result log not readable yet', { filePath, error: describeError(error) });
      }
      return undefined;
    }
  }
}

export function formatTestReport(report: TestRunReport): string {
  const rule = '='.repeat(50);
  const thin = '-'.repeat(50);
  const lines: string[] = [rule, 'FINAL TEST RESULTS', rule, ''];

  for (const outcome of report.outcomes) {
    lines.push(`${outcome.target.displayName}:`);
    if (outcome.results) {
      for (const test of outcome.results.tests) {
        lines.push(`  ${test.passed ? RESULT_MARKERS.pass : RESULT_MARKERS.fail} ${test.name}`);
        if (!test.passed && test.details) {
          lines.push(`         ${test.details}`);
        }
      }
    }
    if (outcome.status !== 'completed') {
      lines.push(`  [${outcome.status.toUpperCase()}] ${outcome.error ?? 'no results'}`);
    }
    lines.push('');
  }

  lines.push(thin, `Total: ${report.passed} passed, ${report.failed} failed`, thin);
  return lines.join('\n');
}
