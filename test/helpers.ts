import { chmod, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Context } from '../src/engine/context.js';
import type { IsolatedExecResult } from '../src/interfaces/sandbox.js';

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `casework-${prefix}-`));
}

/** Writes an executable shell script and returns its path. */
export async function writeScript(dir: string, name: string, body: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, `#!/bin/sh\n${body}\n`);
  await chmod(path, 0o755);
  return path;
}

export function testContext(cwd: string, env: Record<string, string> = {}): Context {
  return new Context(cwd, { PATH: process.env.PATH ?? '/usr/bin:/bin', ...env });
}

export function execStatus(overrides: Partial<IsolatedExecResult> = {}): IsolatedExecResult {
  return { exitCode: 0, signal: null, timedOut: false, duration: 5, ...overrides };
}
