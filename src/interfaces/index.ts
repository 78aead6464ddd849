import { EngineError } from '../engine/errors.js';
import type { TestProgram } from '../engine/test-program.js';
import { AtfTestProgram } from './atf/program.js';
import { PlainTestProgram, type PlainTestProgramOptions } from './plain.js';

export { AtfTestProgram, AtfTestCase, applyCleanup } from './atf/program.js';
export { parseTestCaseList, type AtfTestCaseDefinition } from './atf/list-parser.js';
export { parseResultFile, calculateResult, type AtfRawResult, type AtfStatus } from './atf/results.js';
export { PlainTestProgram, PlainTestCase, classifyPlainStatus, PLAIN_TEST_CASE_NAME } from './plain.js';
export {
  isolatedExec,
  isolatedEnvironment,
  createExecutionDirectory,
  withExecution,
  type IsolatedExecResult,
  type IsolatedExecOptions,
} from './sandbox.js';

export type TestProgramOptions = PlainTestProgramOptions;

const interfaceRegistry: Record<string, new (options: TestProgramOptions) => TestProgram> = {
  atf: AtfTestProgram,
  plain: PlainTestProgram,
};

export const INTERFACE_NAMES = Object.keys(interfaceRegistry);

export function isInterfaceName(name: string): boolean {
  return Object.hasOwn(interfaceRegistry, name);
}

export function createTestProgram(interfaceName: string, options: TestProgramOptions): TestProgram {
  const ProgramClass = Object.hasOwn(interfaceRegistry, interfaceName) ? interfaceRegistry[interfaceName] : undefined;
  if (!ProgramClass) {
    throw new EngineError(`Unknown test interface: ${interfaceName}`);
  }
  return new ProgramClass(options);
}
