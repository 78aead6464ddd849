import { resolve } from 'node:path';
import { Context } from './context.js';
import { EngineError } from './errors.js';
import type { TestCase } from './test-case.js';

export interface TestProgramIdentity {
  /** Path to the binary, relative to `root` unless absolute. */
  binary: string;
  /** Root directory of the test suite tree; relative to the context directory unless absolute. */
  root: string;
  testSuiteName: string;
  /** Environment the test cases run under; the process's own when omitted. */
  context?: Context;
}

export interface TestProgram {
  readonly binary: string;
  readonly root: string;
  readonly testSuiteName: string;
  readonly context: Context;
  readonly interfaceName: string;
  absolutePath(): string;
  loadTestCases(): Promise<TestCase[]>;
}

export abstract class BaseTestProgram implements TestProgram {
  readonly binary: string;
  readonly root: string;
  readonly testSuiteName: string;
  readonly context: Context;

  constructor(identity: TestProgramIdentity) {
    this.binary = identity.binary;
    this.root = identity.root;
    this.testSuiteName = identity.testSuiteName;
    this.context = identity.context ?? Context.current();
  }

  abstract get interfaceName(): string;

  /** The binary resolved against the root, and a relative root against the context directory. */
  absolutePath(): string {
    return resolve(this.context.cwd, this.root, this.binary);
  }

  /**
   * Discovers the test cases of this program. Rejects with `LoadError`
   * rather than returning a partial list.
   */
  abstract loadTestCases(): Promise<TestCase[]>;
}

export async function findTestCase(program: TestProgram, name: string): Promise<TestCase> {
  const testCases = await program.loadTestCases();
  const testCase = testCases.find(tc => tc.name === name);
  if (!testCase) {
    throw new EngineError(`Unknown test case '${name}' in test program ${program.binary}`);
  }
  return testCase;
}
