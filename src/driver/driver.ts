import { randomUUID } from 'crypto';
import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { Config } from '../engine/config.js';
import { Context } from '../engine/context.js';
import { EngineError, errorMessage } from '../engine/errors.js';
import { CaptureHooks } from '../engine/hooks.js';
import { isGoodResult, type TestResult } from '../engine/result.js';
import type { TestCase } from '../engine/test-case.js';
import type { TestProgram } from '../engine/test-program.js';
import { createLogger } from '../utils/logger.js';
import { FilterSet } from './filters.js';
import type {
  ListResult,
  ListedTestCase,
  ProgramError,
  RunOptions,
  RunReport,
  RunSummary,
  TestCaseReport,
} from './types.js';

const log = createLogger('driver');

/**
 * Runs every selected test case of the given programs, one after another.
 *
 * A fault while loading or running a program aborts that program only; it
 * is recorded in `errors` and the run moves on.
 */
export async function runSuite(
  programs: TestProgram[],
  config: Config,
  options: RunOptions = {}
): Promise<RunReport> {
  const filters = FilterSet.parse(options.filters ?? []);
  const context = options.context ?? Context.current();
  const startTime = Date.now();
  const startedAt = new Date(startTime).toISOString();
  const results: TestCaseReport[] = [];
  const errors: ProgramError[] = [];

  const recordError = (program: TestProgram, error: unknown) => {
    const programError = toProgramError(program, error);
    errors.push(programError);
    options.onProgramError?.(programError);
  };

  for (const program of programs) {
    if (!filters.matchesProgram(program.binary)) {
      continue;
    }

    let testCases: TestCase[];
    try {
      testCases = await program.loadTestCases();
    } catch (error) {
      recordError(program, error);
      continue;
    }

    for (const testCase of testCases) {
      if (!filters.matchesTestCase(program.binary, testCase.name)) {
        continue;
      }
      options.onStart?.(testCase);
      let report: TestCaseReport;
      try {
        report = await runTestCase(testCase, config, options.outputDir);
      } catch (error) {
        recordError(program, error);
        break;
      }
      results.push(report);
      options.onResult?.(report);
    }
  }

  const completedTime = Date.now();
  return {
    id: options.id ?? randomUUID(),
    context: context.toJSON(),
    config,
    startedAt,
    completedAt: new Date(completedTime).toISOString(),
    duration: completedTime - startTime,
    results,
    errors,
    unusedFilters: filters.unused(),
    summary: summarize(results),
  };
}

export async function runTestCase(
  testCase: TestCase,
  config: Config,
  outputDir?: string
): Promise<TestCaseReport> {
  const program = testCase.testProgram;
  const hooks = new CaptureHooks();
  const startTime = Date.now();

  let result: TestResult;
  if (outputDir) {
    const dir = join(outputDir, safeFileName(program.binary));
    await mkdir(dir, { recursive: true });
    const base = join(dir, safeFileName(testCase.name));
    result = await testCase.debug(config, hooks, `${base}.stdout`, `${base}.stderr`);
  } else {
    result = await testCase.run(config, hooks);
  }

  log.debug(`${testCase.displayName} -> ${result.type}`);
  return {
    program: program.binary,
    testSuite: program.testSuiteName,
    testCase: testCase.name,
    result,
    startedAt: new Date(startTime).toISOString(),
    duration: Date.now() - startTime,
    // Without an output directory the files are gone once run() resolves.
    ...(outputDir ? { stdoutPath: hooks.stdoutPath, stderrPath: hooks.stderrPath } : {}),
  };
}

export async function listSuite(programs: TestProgram[], filters: string[] = []): Promise<ListResult> {
  const filterSet = FilterSet.parse(filters);
  const testCases: ListedTestCase[] = [];
  const errors: ProgramError[] = [];

  for (const program of programs) {
    if (!filterSet.matchesProgram(program.binary)) {
      continue;
    }
    let loaded: TestCase[];
    try {
      loaded = await program.loadTestCases();
    } catch (error) {
      errors.push(toProgramError(program, error));
      continue;
    }
    for (const testCase of loaded) {
      if (filterSet.matchesTestCase(program.binary, testCase.name)) {
        testCases.push({
          program: program.binary,
          testSuite: program.testSuiteName,
          interfaceName: program.interfaceName,
          testCase,
        });
      }
    }
  }

  return { testCases, errors, unusedFilters: filterSet.unused() };
}

function toProgramError(program: TestProgram, error: unknown): ProgramError {
  const message = errorMessage(error);
  if (error instanceof EngineError) {
    log.warn(`${program.binary}: ${message}`);
  } else {
    log.error(`Unexpected failure in ${program.binary}: ${message}`);
  }
  return { program: program.binary, message };
}

export function summarize(results: TestCaseReport[]): RunSummary {
  const summary: RunSummary = {
    total: results.length,
    passed: 0,
    failed: 0,
    broken: 0,
    skipped: 0,
    expected_failure: 0,
  };
  for (const { result } of results) {
    summary[result.type]++;
  }
  return summary;
}

export function reportIsGood(report: RunReport): boolean {
  return report.errors.length === 0 && report.results.every(r => isGoodResult(r.result));
}

/** Maps a binary or test case name to a single path component; distinct names never collide. */
export function safeFileName(name: string): string {
  return encodeURIComponent(name).replace(/^\./, '%2E');
}
