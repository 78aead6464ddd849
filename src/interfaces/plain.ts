import type { Config } from '../engine/config.js';
import type { TestCaseHooks } from '../engine/hooks.js';
import { MetadataError } from '../engine/errors.js';
import { parseMetadata, type Metadata } from '../engine/metadata.js';
import { checkRequirements } from '../engine/requirements.js';
import { broken, expectedFailure, failed, passed, skipped, type TestResult } from '../engine/result.js';
import { BaseTestCase, type PropertiesMap, type TestCase } from '../engine/test-case.js';
import { BaseTestProgram, type TestProgramIdentity } from '../engine/test-program.js';
import { isolatedExec, signalNumber, withExecution, type IsolatedExecResult } from './sandbox.js';

export const PLAIN_TEST_CASE_NAME = 'main';

export interface PlainTestProgramOptions extends TestProgramIdentity {
  metadata?: Record<string, string>;
}

/** A binary that is a single test case; its exit status is the verdict. */
export class PlainTestProgram extends BaseTestProgram {
  private readonly properties: PropertiesMap;

  constructor(options: PlainTestProgramOptions) {
    super(options);
    this.properties = Object.freeze({ ...options.metadata });
    if (Object.hasOwn(this.properties, 'has_cleanup')) {
      throw new MetadataError('has_cleanup is only supported by atf test programs');
    }
    parseMetadata(this.properties);
  }

  get interfaceName(): string {
    return 'plain';
  }

  async loadTestCases(): Promise<TestCase[]> {
    return [new PlainTestCase(this, this.properties)];
  }
}

export class PlainTestCase extends BaseTestCase {
  private readonly properties: PropertiesMap;
  private readonly metadata: Metadata;

  constructor(testProgram: PlainTestProgram, properties: PropertiesMap) {
    super(testProgram, PLAIN_TEST_CASE_NAME);
    this.properties = properties;
    this.metadata = parseMetadata(properties);
  }

  protected getAllProperties(): PropertiesMap {
    return this.properties;
  }

  protected async execute(
    config: Config,
    hooks: TestCaseHooks,
    stdoutPath: string | undefined,
    stderrPath: string | undefined
  ): Promise<TestResult> {
    const program = this.testProgram;
    const { context } = program;

    return withExecution({ context, hooks, stdoutPath, stderrPath }, async (execution) => {
      const skipReason = await checkRequirements(this.metadata, config, program.testSuiteName, context);
      if (skipReason) {
        return skipped(skipReason);
      }

      const status = await isolatedExec(program.absolutePath(), [], {
        cwd: execution.workDir,
        env: execution.env,
        timeout: this.metadata.timeout * 1000,
        stdoutPath: execution.stdoutPath,
        stderrPath: execution.stderrPath,
      });
      return classifyPlainStatus(status, this.metadata.expectedFailure);
    });
  }
}

export function classifyPlainStatus(status: IsolatedExecResult, expectedFailureReason?: string): TestResult {
  if (status.spawnError) {
    return broken(`Failed to execute test program: ${status.spawnError.message}`);
  }
  if (status.timedOut) {
    return broken('Test case timed out');
  }
  if (status.signal) {
    return broken(`Received signal ${signalNumber(status.signal)}`);
  }
  if (status.exitCode === 0) {
    return expectedFailureReason ? failed('Test case was expected to fail but it passed') : passed();
  }
  if (expectedFailureReason) {
    return expectedFailure(expectedFailureReason);
  }
  return failed(`Returned non-success exit status ${status.exitCode}`);
}
