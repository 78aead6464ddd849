/**
 * Receives the locations of a test case's captured output while it runs.
 *
 * Each method is called at most once per execution and always before the
 * execution resolves. The file may still be growing when the hook fires.
 */
export interface TestCaseHooks {
  gotStdout(path: string): void;
  gotStderr(path: string): void;
}

/** Ignores both notifications; extend it to override only one. */
export class NoopHooks implements TestCaseHooks {
  gotStdout(_path: string): void {}

  gotStderr(_path: string): void {}
}

export const noopHooks: TestCaseHooks = new NoopHooks();

/** Remembers the paths it was given. */
export class CaptureHooks implements TestCaseHooks {
  stdoutPath?: string;
  stderrPath?: string;

  gotStdout(path: string): void {
    this.stdoutPath = path;
  }

  gotStderr(path: string): void {
    this.stderrPath = path;
  }
}
