import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { mkdir, mkdtemp, open, rm, writeFile, type FileHandle } from 'node:fs/promises';
import { constants as osConstants, tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Context } from '../engine/context.js';
import { errorMessage } from '../engine/errors.js';
import type { TestCaseHooks } from '../engine/hooks.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('sandbox');

const KILL_GRACE_PERIOD_MS = 1000;

const LOCALE_VARIABLES = [
  'LANG',
  'LC_ALL',
  'LC_COLLATE',
  'LC_CTYPE',
  'LC_MESSAGES',
  'LC_MONETARY',
  'LC_NUMERIC',
  'LC_TIME',
];

export interface IsolatedExecOptions {
  cwd: string;
  env: Record<string, string>;
  /** Milliseconds before the process group is killed. */
  timeout: number;
  /** Output is appended to these files. */
  stdoutPath: string;
  stderrPath: string;
}

export interface IsolatedExecResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  duration: number;
  spawnError?: Error;
}

export interface ExecutionDirectory {
  root: string;
  workDir: string;
  remove(): Promise<void>;
}

export interface Execution {
  root: string;
  workDir: string;
  stdoutPath: string;
  stderrPath: string;
  env: Record<string, string>;
}

export async function createExecutionDirectory(context: Context): Promise<ExecutionDirectory> {
  const base = context.env.TMPDIR || tmpdir();
  const root = await mkdtemp(join(base, 'casework.'));
  const workDir = join(root, 'work');
  await mkdir(workDir);
  return {
    root,
    workDir,
    remove: () => rm(root, { recursive: true, force: true }),
  };
}

/** Environment of the context with a private home and a neutral locale. */
export function isolatedEnvironment(context: Context, workDir: string): Record<string, string> {
  const env: Record<string, string> = { ...context.env };
  for (const name of LOCALE_VARIABLES) {
    delete env[name];
  }
  env.HOME = workDir;
  env.TMPDIR = workDir;
  env.TZ = 'UTC';
  return env;
}

/**
 * Prepares a fresh execution directory and the two output files, reports
 * the output paths to the hooks and hands everything to `body`. The
 * directory is removed afterwards; caller-chosen output paths survive.
 */
export async function withExecution<T>(
  options: {
    context: Context;
    hooks: TestCaseHooks;
    stdoutPath?: string;
    stderrPath?: string;
  },
  body: (execution: Execution) => Promise<T>
): Promise<T> {
  const { context, hooks } = options;
  const directory = await createExecutionDirectory(context);
  try {
    const stdoutPath = options.stdoutPath ?? join(directory.root, 'stdout.txt');
    const stderrPath = options.stderrPath ?? join(directory.root, 'stderr.txt');
    await writeFile(stdoutPath, '');
    await writeFile(stderrPath, '');
    hooks.gotStdout(stdoutPath);
    hooks.gotStderr(stderrPath);

    return await body({
      root: directory.root,
      workDir: directory.workDir,
      stdoutPath,
      stderrPath,
      env: isolatedEnvironment(context, directory.workDir),
    });
  } finally {
    await directory.remove();
  }
}

export async function isolatedExec(
  command: string,
  args: string[],
  options: IsolatedExecOptions
): Promise<IsolatedExecResult> {
  const { cwd, env, timeout, stdoutPath, stderrPath } = options;

  let stdout: FileHandle | undefined;
  let stderr: FileHandle | undefined;
  try {
    stdout = await open(stdoutPath, 'a');
    stderr = await open(stderrPath, 'a');

    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', stdout.fd, stderr.fd],
      detached: true,
    };

    log.debug(`Spawning ${command} ${args.join(' ')} in ${cwd}`);
    return await waitForChild(spawn(command, args, spawnOptions), timeout);
  } finally {
    await stdout?.close();
    await stderr?.close();
  }
}

function waitForChild(child: ChildProcess, timeout: number): Promise<IsolatedExecResult> {
  const startTime = Date.now();

  return new Promise((resolve) => {
    let settled = false;
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      log.debug(`Process ${child.pid} timed out after ${timeout}ms`);
      signalGroup(child, 'SIGTERM');
      killTimer = setTimeout(() => signalGroup(child, 'SIGKILL'), KILL_GRACE_PERIOD_MS);
    }, timeout);

    const finish = (result: Omit<IsolatedExecResult, 'duration' | 'timedOut'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      clearTimeout(killTimer);
      // Leftover children of the test must not outlive it.
      signalGroup(child, 'SIGKILL');
      resolve({ ...result, timedOut, duration: Date.now() - startTime });
    };

    child.on('close', (code, signal) => {
      finish({ exitCode: code, signal });
    });

    child.on('error', (err) => {
      finish({ exitCode: null, signal: null, spawnError: err });
    });
  });
}

function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    log.debug(`Could not send ${signal} to process group ${child.pid}: ${errorMessage(error)}`);
  }
}

export function signalNumber(signal: NodeJS.Signals): number {
  return osConstants.signals[signal];
}
