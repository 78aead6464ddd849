import { EngineError } from './errors.js';

export const RESULT_TYPES = ['passed', 'failed', 'broken', 'skipped', 'expected_failure'] as const;

export type ResultType = typeof RESULT_TYPES[number];

export type TestResult =
  | { readonly type: 'passed'; readonly reason?: undefined }
  | { readonly type: Exclude<ResultType, 'passed'>; readonly reason: string };

export function createResult(type: ResultType, reason?: string): TestResult {
  if (type === 'passed') {
    if (reason) {
      throw new EngineError('A passed result cannot carry a reason');
    }
    return Object.freeze({ type });
  }
  if (!reason) {
    throw new EngineError(`A ${type} result must have a reason`);
  }
  return Object.freeze({ type, reason });
}

export const passed = (): TestResult => createResult('passed');
export const failed = (reason: string): TestResult => createResult('failed', reason);
export const broken = (reason: string): TestResult => createResult('broken', reason);
export const skipped = (reason: string): TestResult => createResult('skipped', reason);
export const expectedFailure = (reason: string): TestResult => createResult('expected_failure', reason);

export function isResultType(value: unknown): value is ResultType {
  return typeof value === 'string' && (RESULT_TYPES as readonly string[]).includes(value);
}

export function resultsEqual(a: TestResult, b: TestResult): boolean {
  return a.type === b.type && a.reason === b.reason;
}

/** Whether the outcome should not count as a regression. */
export function isGoodResult(result: TestResult): boolean {
  return result.type === 'passed' || result.type === 'skipped' || result.type === 'expected_failure';
}

export function formatResult(result: TestResult): string {
  return result.type === 'passed' ? 'passed' : `${result.type}: ${result.reason}`;
}
