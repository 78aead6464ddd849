import type { Config } from '../engine/config.js';
import type { Context, Environment } from '../engine/context.js';
import type { ResultType, TestResult } from '../engine/result.js';
import type { TestCase } from '../engine/test-case.js';

export interface TestCaseReport {
  program: string;
  testSuite: string;
  testCase: string;
  result: TestResult;
  startedAt: string;
  duration: number;
  stdoutPath?: string;
  stderrPath?: string;
}

export interface ProgramError {
  program: string;
  message: string;
}

export type RunSummary = Record<ResultType, number> & { total: number };

export interface RunReport {
  id: string;
  context: { cwd: string; env: Environment };
  config: Config;
  startedAt: string;
  completedAt: string;
  duration: number;
  results: TestCaseReport[];
  errors: ProgramError[];
  unusedFilters: string[];
  summary: RunSummary;
}

export interface RunOptions {
  /** Report identifier; generated when omitted. */
  id?: string;
  /** Recorded in the report; the process's own when omitted. */
  context?: Context;
  filters?: string[];
  /** Keep each test case's output under this directory. */
  outputDir?: string;
  onStart?: (testCase: TestCase) => void;
  onResult?: (report: TestCaseReport) => void;
  onProgramError?: (error: ProgramError) => void;
}

export interface ListedTestCase {
  program: string;
  testSuite: string;
  interfaceName: string;
  testCase: TestCase;
}

export interface ListResult {
  testCases: ListedTestCase[];
  errors: ProgramError[];
  unusedFilters: string[];
}
