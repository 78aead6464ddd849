import { ConfigError } from './errors.js';

export type VariablesMap = Readonly<Record<string, string>>;
export type TestSuitesMap = Readonly<Record<string, VariablesMap>>;

export interface Config {
  readonly architecture: string;
  readonly platform: string;
  readonly testSuite?: string;
  readonly testSuites: TestSuitesMap;
}

export interface ConfigInput {
  architecture: string;
  platform: string;
  testSuite?: string;
  testSuites?: Record<string, Record<string, string>>;
}

export const DEFAULT_CONFIG: Config = createConfig({
  architecture: process.arch,
  platform: process.platform,
});

export function createConfig(input: ConfigInput): Config {
  if (!isNonEmptyString(input.architecture)) {
    throw new ConfigError('architecture must be a non-empty string');
  }
  if (!isNonEmptyString(input.platform)) {
    throw new ConfigError('platform must be a non-empty string');
  }
  if (input.testSuite !== undefined && !isNonEmptyString(input.testSuite)) {
    throw new ConfigError('test_suite must be a non-empty string when set');
  }

  const testSuites: Record<string, VariablesMap> = {};
  for (const [suite, variables] of Object.entries(input.testSuites ?? {})) {
    if (!isVariablesMap(variables)) {
      throw new ConfigError(`Variables of test suite '${suite}' must map names to strings`);
    }
    testSuites[suite] = Object.freeze({ ...variables });
  }

  const config: Config = {
    architecture: input.architecture,
    platform: input.platform,
    testSuites: Object.freeze(testSuites),
    ...(input.testSuite !== undefined ? { testSuite: input.testSuite } : {}),
  };
  return Object.freeze(config);
}

export function isConfig(value: unknown): value is Config {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('architecture' in value) || !('platform' in value) || !('testSuites' in value)) {
    return false;
  }
  if (!isNonEmptyString(value.architecture) || !isNonEmptyString(value.platform)) {
    return false;
  }
  if ('testSuite' in value && value.testSuite !== undefined && !isNonEmptyString(value.testSuite)) {
    return false;
  }
  const testSuites = value.testSuites;
  if (!testSuites || typeof testSuites !== 'object') {
    return false;
  }
  return Object.values(testSuites).every(isVariablesMap);
}

/**
 * Variables that apply to test programs of the given suite. A config that
 * names a test suite only hands variables to that suite.
 */
export function testSuiteVariables(config: Config, suiteName: string): VariablesMap {
  if (config.testSuite !== undefined && config.testSuite !== suiteName) {
    return {};
  }
  return Object.hasOwn(config.testSuites, suiteName) ? config.testSuites[suiteName] : {};
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isVariablesMap(value: unknown): value is Record<string, string> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(v => typeof v === 'string');
}
