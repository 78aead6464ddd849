import { broken, expectedFailure, failed, passed, skipped, type TestResult } from '../../engine/result.js';
import { signalNumber, type IsolatedExecResult } from '../sandbox.js';

export const ATF_STATUSES = [
  'passed',
  'failed',
  'skipped',
  'broken',
  'expected_failure',
  'expected_death',
  'expected_exit',
  'expected_signal',
  'expected_timeout',
] as const;

export type AtfStatus = typeof ATF_STATUSES[number];

/** What the test case wrote to its results file, before checking it against the exit status. */
export interface AtfRawResult {
  status: AtfStatus;
  argument?: number;
  reason?: string;
}

const STATUS_PART = /^([a-z_]+)(?:\(([^)]*)\))?$/;

function isAtfStatus(value: string): value is AtfStatus {
  return (ATF_STATUSES as readonly string[]).includes(value);
}

/**
 * Parses the contents of a results file. Malformed contents are not an
 * error: they describe a broken test case.
 */
export function parseResultFile(content: string): AtfRawResult {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  if (lines.length === 0 || lines[0] === '') {
    return { status: 'broken', reason: 'Empty results file' };
  }
  if (lines.length > 1) {
    return { status: 'broken', reason: 'Results file has more than one line' };
  }

  const line = lines[0];
  const separator = line.indexOf(': ');
  const statusPart = separator === -1 ? line : line.slice(0, separator);
  const reason = separator === -1 ? undefined : line.slice(separator + 2);

  const match = statusPart.match(STATUS_PART);
  if (!match || !isAtfStatus(match[1])) {
    return { status: 'broken', reason: `Unknown test result '${statusPart}'` };
  }
  const status = match[1];
  const rawArgument = match[2];

  let argument: number | undefined;
  if (rawArgument !== undefined) {
    if (status !== 'expected_exit' && status !== 'expected_signal') {
      return { status: 'broken', reason: `'${status}' result does not take an argument` };
    }
    if (!/^-?\d+$/.test(rawArgument)) {
      return { status: 'broken', reason: `Invalid argument '${rawArgument}' in result` };
    }
    argument = parseInt(rawArgument, 10);
  }

  if (status === 'passed') {
    if (reason !== undefined) {
      return { status: 'broken', reason: 'passed test case should not have a reason' };
    }
    return { status };
  }
  if (!reason) {
    return { status: 'broken', reason: `${status} test case should have a reason` };
  }
  return argument === undefined ? { status, reason } : { status, argument, reason };
}

function describeTermination(status: IsolatedExecResult): string {
  if (status.signal) {
    return `received signal ${signalNumber(status.signal)}`;
  }
  return `exited with code ${status.exitCode}`;
}

function requireReason(raw: AtfRawResult): string {
  // parseResultFile only yields reasonless results for 'passed'.
  return raw.reason ?? raw.status;
}

/**
 * Checks what the test case reported against how its body terminated.
 * `raw` is undefined when no results file was written.
 */
export function calculateResult(raw: AtfRawResult | undefined, status: IsolatedExecResult): TestResult {
  if (status.spawnError) {
    return broken(`Failed to execute test program: ${status.spawnError.message}`);
  }

  if (status.timedOut) {
    if (raw?.status === 'expected_timeout') {
      return expectedFailure(requireReason(raw));
    }
    return broken('Test case body timed out');
  }

  if (!raw) {
    return broken(`Premature exit; test case ${describeTermination(status)}`);
  }

  const reason = requireReason(raw);
  switch (raw.status) {
    case 'broken':
      return broken(reason);

    case 'passed':
      return status.exitCode === 0
        ? passed()
        : broken(`Passed test case should have reported success but ${describeTermination(status)}`);

    case 'skipped':
      return status.exitCode === 0
        ? skipped(reason)
        : broken(`Skipped test case should have reported success but ${describeTermination(status)}`);

    case 'expected_failure':
      return status.exitCode === 0
        ? expectedFailure(reason)
        : broken(`Expected failure test case should have reported success but ${describeTermination(status)}`);

    case 'failed':
      return status.exitCode === 1
        ? failed(reason)
        : broken(`Failed test case should have reported failure but ${describeTermination(status)}`);

    case 'expected_death':
      return expectedFailure(reason);

    case 'expected_exit':
      if (status.signal) {
        return broken(`Expected clean exit but ${describeTermination(status)}`);
      }
      if (raw.argument !== undefined && raw.argument !== status.exitCode) {
        return broken(`Expected clean exit with code ${raw.argument} but got code ${status.exitCode}`);
      }
      return expectedFailure(reason);

    case 'expected_signal':
      if (!status.signal) {
        return broken(`Expected signal but ${describeTermination(status)}`);
      }
      if (raw.argument !== undefined && raw.argument !== signalNumber(status.signal)) {
        return broken(`Expected signal ${raw.argument} but got ${signalNumber(status.signal)}`);
      }
      return expectedFailure(reason);

    case 'expected_timeout':
      return failed('Test case was expected to hang but it continued execution');
  }
}
