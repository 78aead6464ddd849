import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { testSuiteVariables, type Config } from '../../engine/config.js';
import { LoadError, MetadataError, errorMessage } from '../../engine/errors.js';
import type { TestCaseHooks } from '../../engine/hooks.js';
import { parseMetadata, type Metadata } from '../../engine/metadata.js';
import { checkRequirements } from '../../engine/requirements.js';
import { broken, isGoodResult, skipped, type TestResult } from '../../engine/result.js';
import { BaseTestCase, type PropertiesMap, type TestCase } from '../../engine/test-case.js';
import { BaseTestProgram } from '../../engine/test-program.js';
import { createLogger } from '../../utils/logger.js';
import {
  createExecutionDirectory,
  isolatedEnvironment,
  isolatedExec,
  signalNumber,
  withExecution,
  type Execution,
  type IsolatedExecResult,
} from '../sandbox.js';
import { parseTestCaseList } from './list-parser.js';
import { calculateResult, parseResultFile, type AtfRawResult } from './results.js';

const log = createLogger('atf');

const LIST_TIMEOUT_MS = 30_000;

export class AtfTestProgram extends BaseTestProgram {
  get interfaceName(): string {
    return 'atf';
  }

  async loadTestCases(): Promise<TestCase[]> {
    const output = await this.listTestCases();
    const definitions = parseTestCaseList(this.binary, output);

    return definitions.map((definition) => {
      try {
        return new AtfTestCase(this, definition.name, definition.properties);
      } catch (error) {
        if (error instanceof MetadataError) {
          throw new LoadError(this.binary, `Test case '${definition.name}': ${error.message}`, { cause: error });
        }
        throw error;
      }
    });
  }

  private async listTestCases(): Promise<string> {
    const directory = await createExecutionDirectory(this.context);
    try {
      const stdoutPath = join(directory.root, 'list.out');
      const stderrPath = join(directory.root, 'list.err');
      const status = await isolatedExec(this.absolutePath(), ['-l'], {
        cwd: directory.workDir,
        env: isolatedEnvironment(this.context, directory.workDir),
        timeout: LIST_TIMEOUT_MS,
        stdoutPath,
        stderrPath,
      });

      if (status.spawnError) {
        throw new LoadError(this.binary, status.spawnError.message, { cause: status.spawnError });
      }
      if (status.timedOut) {
        throw new LoadError(this.binary, 'Test program timed out while listing its test cases');
      }
      if (status.exitCode !== 0) {
        const stderr = (await readFile(stderrPath, 'utf-8')).trim();
        const how = status.signal ? `received signal ${signalNumber(status.signal)}` : `exited with code ${status.exitCode}`;
        throw new LoadError(this.binary, `Test program ${how} while listing its test cases${stderr ? `: ${stderr}` : ''}`);
      }

      log.debug(`Listed test cases of ${this.binary}`);
      return await readFile(stdoutPath, 'utf-8');
    } finally {
      await directory.remove();
    }
  }
}

export class AtfTestCase extends BaseTestCase {
  private readonly properties: PropertiesMap;
  private readonly metadata: Metadata;

  constructor(testProgram: AtfTestProgram, name: string, properties: Record<string, string>) {
    super(testProgram, name);
    this.properties = Object.freeze({ ...properties });
    this.metadata = parseMetadata(this.properties);
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

      const resultFile = join(execution.root, 'result.atf');
      const variables = Object.entries(testSuiteVariables(config, program.testSuiteName))
        .flatMap(([name, value]) => ['-v', `${name}=${value}`]);
      const srcdir = `-s${dirname(program.absolutePath())}`;

      const body = await this.invoke(execution, [`-r${resultFile}`, srcdir, ...variables, this.name]);
      const result = calculateResult(await readResultFile(resultFile), body);

      if (!this.metadata.hasCleanup) {
        return result;
      }

      const cleanup = await this.invoke(execution, [srcdir, ...variables, `${this.name}:cleanup`]);
      return applyCleanup(result, cleanup);
    });
  }

  private invoke(execution: Execution, args: string[]): Promise<IsolatedExecResult> {
    return isolatedExec(this.testProgram.absolutePath(), args, {
      cwd: execution.workDir,
      env: execution.env,
      timeout: this.metadata.timeout * 1000,
      stdoutPath: execution.stdoutPath,
      stderrPath: execution.stderrPath,
    });
  }
}

async function readResultFile(path: string): Promise<AtfRawResult | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    return { status: 'broken', reason: `Cannot read results file: ${errorMessage(error)}` };
  }
  return parseResultFile(content);
}

export function applyCleanup(result: TestResult, cleanup: IsolatedExecResult): TestResult {
  if (!isGoodResult(result)) {
    return result;
  }
  if (cleanup.timedOut) {
    return broken('Test case cleanup timed out');
  }
  if (cleanup.spawnError || cleanup.signal || cleanup.exitCode !== 0) {
    log.debug(`Cleanup failed: ${cleanup.spawnError ? errorMessage(cleanup.spawnError) : `exit ${cleanup.exitCode}, signal ${cleanup.signal}`}`);
    return broken('Test case cleanup did not terminate successfully');
  }
  return result;
}
