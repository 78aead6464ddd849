import { Context } from '../engine/context.js';
import type { Config } from '../engine/config.js';
import type { TestProgram } from '../engine/test-program.js';
import { loadConfig } from '../config/loader.js';
import { loadManifest } from '../suite/manifest.js';

export interface ConfigOptions {
  config?: string;
  variable: string[];
}

export interface SuiteOptions extends ConfigOptions {
  testfile: string;
}

export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

export function resolveConfig(options: ConfigOptions): Config {
  return loadConfig({ file: options.config, overrides: options.variable });
}

export interface LoadedSuite {
  context: Context;
  config: Config;
  programs: TestProgram[];
}

export async function loadSuite(options: SuiteOptions): Promise<LoadedSuite> {
  const context = Context.current();
  const config = resolveConfig(options);
  const programs = await loadManifest(options.testfile, context);
  return { context, config, programs };
}
