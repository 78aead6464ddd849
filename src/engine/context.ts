export type Environment = Readonly<Record<string, string>>;

/**
 * Working directory and environment variables under which tests run.
 *
 * Contexts are values: both fields are frozen copies and equality is
 * structural.
 */
export class Context {
  readonly cwd: string;
  readonly env: Environment;

  constructor(cwd: string, env: Record<string, string>) {
    this.cwd = cwd;
    this.env = Object.freeze({ ...env });
    Object.freeze(this);
  }

  /**
   * Snapshots the process working directory and environment.
   *
   * Throws whatever `process.cwd()` throws when the directory is gone.
   */
  static current(): Context {
    const cwd = process.cwd();
    const env: Record<string, string> = {};
    for (const [name, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        env[name] = value;
      }
    }
    return new Context(cwd, env);
  }

  equals(other: Context): boolean {
    if (this.cwd !== other.cwd) {
      return false;
    }
    const names = Object.keys(this.env);
    if (names.length !== Object.keys(other.env).length) {
      return false;
    }
    return names.every(
      name => Object.hasOwn(other.env, name) && other.env[name] === this.env[name]
    );
  }

  toJSON(): { cwd: string; env: Environment } {
    return { cwd: this.cwd, env: this.env };
  }
}
