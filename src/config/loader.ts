import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { DEFAULT_CONFIG, createConfig, type Config, type ConfigInput } from '../engine/config.js';
import { ConfigError, errorMessage } from '../engine/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'casework.config.yaml';

export interface LoadConfigOptions {
  /** Explicit file; must exist. */
  file?: string;
  /** Directory searched for the default file when no file is given. */
  cwd?: string;
  /** `name=value` assignments applied after the file. */
  overrides?: string[];
}

const TOP_LEVEL_KEYS = ['architecture', 'platform', 'test_suite', 'test_suites'];

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const input: ConfigInput = {
    architecture: DEFAULT_CONFIG.architecture,
    platform: DEFAULT_CONFIG.platform,
    testSuites: {},
  };

  const file = options.file ?? join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  if (existsSync(file)) {
    log.debug(`Loading configuration from ${file}`);
    applyDocument(input, readDocument(file), file);
  } else if (options.file) {
    throw new ConfigError(`Configuration file not found: ${options.file}`);
  }

  for (const override of options.overrides ?? []) {
    applyOverride(input, override);
  }

  return createConfig(input);
}

function readDocument(file: string): unknown {
  try {
    return yaml.load(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot parse ${file}: ${errorMessage(error)}`, { cause: error });
  }
}

function applyDocument(input: ConfigInput, document: unknown, file: string): void {
  if (document === undefined || document === null) {
    return;
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError(`${file}: configuration must be a mapping`);
  }

  for (const [key, value] of Object.entries(document)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      throw new ConfigError(`${file}: unknown configuration key '${key}'`);
    }
    if (key === 'test_suites') {
      applyTestSuites(input, value, file);
      continue;
    }
    const text = toVariableValue(value);
    if (text === undefined) {
      throw new ConfigError(`${file}: '${key}' must be a string`);
    }
    setTopLevel(input, key, text);
  }
}

function applyTestSuites(input: ConfigInput, value: unknown, file: string): void {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`${file}: 'test_suites' must map suite names to variables`);
  }
  const testSuites = input.testSuites ?? {};
  for (const [suite, variables] of Object.entries(value)) {
    if (variables === null || typeof variables !== 'object' || Array.isArray(variables)) {
      throw new ConfigError(`${file}: variables of test suite '${suite}' must be a mapping`);
    }
    const converted: Record<string, string> = { ...testSuites[suite] };
    for (const [name, raw] of Object.entries(variables)) {
      const text = toVariableValue(raw);
      if (text === undefined) {
        throw new ConfigError(`${file}: test_suites.${suite}.${name} must be a scalar`);
      }
      converted[name] = text;
    }
    testSuites[suite] = converted;
  }
  input.testSuites = testSuites;
}

/** Applies one `name=value` assignment, as given on the command line. */
export function applyOverride(input: ConfigInput, assignment: string): void {
  const equals = assignment.indexOf('=');
  if (equals <= 0) {
    throw new ConfigError(`Invalid variable assignment '${assignment}'; expected name=value`);
  }
  const name = assignment.slice(0, equals);
  const value = assignment.slice(equals + 1);

  const parts = name.split('.');
  if (parts.length === 1 && TOP_LEVEL_KEYS.includes(name) && name !== 'test_suites') {
    setTopLevel(input, name, value);
    return;
  }
  if (parts.length === 3 && parts[0] === 'test_suites' && parts[1] && parts[2]) {
    const [, suite, variable] = parts;
    const testSuites = input.testSuites ?? {};
    testSuites[suite] = { ...testSuites[suite], [variable]: value };
    input.testSuites = testSuites;
    return;
  }
  throw new ConfigError(`Unknown configuration variable '${name}'`);
}

function setTopLevel(input: ConfigInput, key: string, value: string): void {
  switch (key) {
    case 'architecture':
      input.architecture = value;
      break;
    case 'platform':
      input.platform = value;
      break;
    case 'test_suite':
      input.testSuite = value;
      break;
  }
}

function toVariableValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}
