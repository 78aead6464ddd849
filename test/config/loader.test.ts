import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG_FILE, applyOverride, loadConfig } from '../../src/config/loader.js';
import { DEFAULT_CONFIG, type ConfigInput } from '../../src/engine/config.js';
import { ConfigError } from '../../src/engine/errors.js';
import { makeTempDir } from '../helpers.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('config');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to the host defaults', () => {
    expect(loadConfig({ cwd: dir })).toEqual(DEFAULT_CONFIG);
  });

  it('reads the default file from the directory', async () => {
    await writeFile(
      join(dir, DEFAULT_CONFIG_FILE),
      [
        'architecture: riscv64',
        'platform: netbsd',
        'test_suite: math',
        'test_suites:',
        '  math:',
        '    iterations: 10',
        '    fast: true',
        '    name: quick',
      ].join('\n')
    );

    expect(loadConfig({ cwd: dir })).toEqual({
      architecture: 'riscv64',
      platform: 'netbsd',
      testSuite: 'math',
      testSuites: { math: { iterations: '10', fast: 'true', name: 'quick' } },
    });
  });

  it('applies overrides after the file', async () => {
    const file = join(dir, 'custom.yaml');
    await writeFile(file, 'platform: netbsd\ntest_suites:\n  math:\n    iterations: 10\n');

    const config = loadConfig({
      file,
      overrides: ['platform=openbsd', 'test_suites.math.iterations=20', 'test_suites.io.dir=/tmp'],
    });

    expect(config.platform).toBe('openbsd');
    expect(config.testSuites).toEqual({ math: { iterations: '20' }, io: { dir: '/tmp' } });
  });

  it('accepts an empty file', async () => {
    await writeFile(join(dir, DEFAULT_CONFIG_FILE), '');
    expect(loadConfig({ cwd: dir })).toEqual(DEFAULT_CONFIG);
  });

  it('fails when an explicit file is missing', () => {
    const file = join(dir, 'absent.yaml');
    expect(() => loadConfig({ file })).toThrow(new ConfigError(`Configuration file not found: ${file}`));
  });

  it('rejects malformed documents', async () => {
    const file = join(dir, 'bad.yaml');

    await writeFile(file, '- a\n- b\n');
    expect(() => loadConfig({ file })).toThrow(`${file}: configuration must be a mapping`);

    await writeFile(file, 'colour: blue\n');
    expect(() => loadConfig({ file })).toThrow(`${file}: unknown configuration key 'colour'`);

    await writeFile(file, 'platform: [a, b]\n');
    expect(() => loadConfig({ file })).toThrow(`${file}: 'platform' must be a string`);

    await writeFile(file, 'test_suites:\n  math: 3\n');
    expect(() => loadConfig({ file })).toThrow(`${file}: variables of test suite 'math' must be a mapping`);

    await writeFile(file, 'test_suites:\n  math:\n    list: [1, 2]\n');
    expect(() => loadConfig({ file })).toThrow(`${file}: test_suites.math.list must be a scalar`);

    await writeFile(file, 'platform: [unclosed\n');
    expect(() => loadConfig({ file })).toThrow(ConfigError);
  });
});

describe('applyOverride', () => {
  const input = (): ConfigInput => ({ architecture: 'a', platform: 'p' });

  it('sets top-level variables', () => {
    const target = input();
    applyOverride(target, 'test_suite=math');
    applyOverride(target, 'architecture=x=y');

    expect(target).toEqual({ architecture: 'x=y', platform: 'p', testSuite: 'math' });
  });

  it('sets suite variables', () => {
    const target = input();
    applyOverride(target, 'test_suites.math.fast=');

    expect(target.testSuites).toEqual({ math: { fast: '' } });
  });

  it('rejects malformed assignments', () => {
    expect(() => applyOverride(input(), 'platform')).toThrow(
      "Invalid variable assignment 'platform'; expected name=value"
    );
    expect(() => applyOverride(input(), '=x')).toThrow(ConfigError);
    expect(() => applyOverride(input(), 'colour=blue')).toThrow("Unknown configuration variable 'colour'");
    expect(() => applyOverride(input(), 'test_suites=x')).toThrow("Unknown configuration variable 'test_suites'");
    expect(() => applyOverride(input(), 'test_suites.math=x')).toThrow(
      "Unknown configuration variable 'test_suites.math'"
    );
  });
});
