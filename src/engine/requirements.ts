import { access, constants } from 'node:fs/promises';
import { delimiter, isAbsolute, join } from 'node:path';
import { totalmem } from 'node:os';
import { testSuiteVariables, type Config } from './config.js';
import type { Context } from './context.js';
import type { Metadata } from './metadata.js';

export interface RequirementsEnvironment {
  isRoot(): boolean;
  totalMemory(): number;
}

export const hostEnvironment: RequirementsEnvironment = {
  isRoot: () => typeof process.getuid === 'function' && process.getuid() === 0,
  totalMemory: () => totalmem(),
};

/**
 * Returns why the test case cannot run here, or undefined when every
 * requirement declared in its metadata is met.
 */
export async function checkRequirements(
  metadata: Metadata,
  config: Config,
  suiteName: string,
  context: Context,
  host: RequirementsEnvironment = hostEnvironment
): Promise<string | undefined> {
  if (metadata.allowedArchitectures.length > 0 && !metadata.allowedArchitectures.includes(config.architecture)) {
    return `Current architecture '${config.architecture}' not supported`;
  }
  if (metadata.allowedPlatforms.length > 0 && !metadata.allowedPlatforms.includes(config.platform)) {
    return `Current platform '${config.platform}' not supported`;
  }

  const variables = testSuiteVariables(config, suiteName);
  for (const name of metadata.requiredConfigs) {
    if (!Object.hasOwn(variables, name)) {
      return `Required configuration property '${name}' not defined`;
    }
  }

  if (metadata.requiredUser === 'root' && !host.isRoot()) {
    return 'Requires root privileges';
  }
  if (metadata.requiredUser === 'unprivileged' && host.isRoot()) {
    return 'Requires an unprivileged user';
  }

  for (const file of metadata.requiredFiles) {
    if (!(await canAccess(file, constants.F_OK))) {
      return `Required file '${file}' not found`;
    }
  }

  if (metadata.requiredMemory > 0) {
    const available = host.totalMemory();
    if (available < metadata.requiredMemory) {
      return `Requires ${metadata.requiredMemory} bytes of physical memory but only ${available} available`;
    }
  }

  for (const program of metadata.requiredPrograms) {
    if (!(await findProgram(program, context))) {
      return `Required program '${program}' not found`;
    }
  }

  return undefined;
}

async function findProgram(program: string, context: Context): Promise<boolean> {
  if (isAbsolute(program)) {
    return canAccess(program, constants.X_OK);
  }
  const searchPath = (context.env.PATH ?? '').split(delimiter).filter(dir => dir.length > 0);
  for (const dir of searchPath) {
    if (await canAccess(join(dir, program), constants.X_OK)) {
      return true;
    }
  }
  return false;
}

async function canAccess(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
}
