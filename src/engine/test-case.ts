import { isConfig, type Config } from './config.js';
import { ConfigError, EngineError } from './errors.js';
import type { TestCaseHooks } from './hooks.js';
import type { TestResult } from './result.js';
import type { TestProgram } from './test-program.js';

export type PropertiesMap = Readonly<Record<string, string>>;

export interface TestCase {
  readonly testProgram: TestProgram;
  readonly name: string;
  readonly displayName: string;
  allProperties(): PropertiesMap;
  run(config: Config, hooks: TestCaseHooks): Promise<TestResult>;
  debug(config: Config, hooks: TestCaseHooks, stdoutPath: string, stderrPath: string): Promise<TestResult>;
}

/**
 * Identity and public entry points shared by every test case.
 *
 * Subclasses supply the metadata and the actual execution; the base class
 * only checks preconditions and forwards its arguments untouched. Outcomes
 * (including crashes of the program under test) come back as results;
 * anything thrown is an engine fault.
 */
export abstract class BaseTestCase implements TestCase {
  readonly testProgram: TestProgram;
  readonly name: string;

  constructor(testProgram: TestProgram, name: string) {
    if (name.length === 0) {
      throw new EngineError(`Test case names in ${testProgram.binary} cannot be empty`);
    }
    this.testProgram = testProgram;
    this.name = name;
  }

  get displayName(): string {
    return `${this.testProgram.binary}:${this.name}`;
  }

  allProperties(): PropertiesMap {
    return this.getAllProperties();
  }

  async run(config: Config, hooks: TestCaseHooks): Promise<TestResult> {
    this.checkConfig(config);
    return this.execute(config, hooks, undefined, undefined);
  }

  /** Runs the test case sending its output to the given files, which are left in place. */
  async debug(config: Config, hooks: TestCaseHooks, stdoutPath: string, stderrPath: string): Promise<TestResult> {
    this.checkConfig(config);
    return this.execute(config, hooks, stdoutPath, stderrPath);
  }

  protected abstract getAllProperties(): PropertiesMap;

  /**
   * Runs the test case. When no output paths are given the implementation
   * picks its own, reports them through the hooks and may remove them once
   * the execution is over.
   */
  protected abstract execute(
    config: Config,
    hooks: TestCaseHooks,
    stdoutPath: string | undefined,
    stderrPath: string | undefined
  ): Promise<TestResult>;

  private checkConfig(config: Config): void {
    if (!isConfig(config)) {
      throw new ConfigError(`Cannot run ${this.displayName} with a malformed configuration`);
    }
  }
}
