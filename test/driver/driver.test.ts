import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { listSuite, reportIsGood, runSuite, safeFileName, summarize } from '../../src/driver/driver.js';
import type { RunReport } from '../../src/driver/types.js';
import { createConfig, type Config } from '../../src/engine/config.js';
import { Context } from '../../src/engine/context.js';
import { LoadError } from '../../src/engine/errors.js';
import type { TestCaseHooks } from '../../src/engine/hooks.js';
import { broken, failed, passed, skipped, type TestResult } from '../../src/engine/result.js';
import { BaseTestCase, type PropertiesMap, type TestCase } from '../../src/engine/test-case.js';
import { BaseTestProgram } from '../../src/engine/test-program.js';
import { makeTempDir } from '../helpers.js';

const context = new Context('/suite', {});

class FakeTestCase extends BaseTestCase {
  constructor(program: FakeTestProgram, name: string, private readonly result: TestResult | Error) {
    super(program, name);
  }

  protected getAllProperties(): PropertiesMap {
    return { description: `Fake ${this.name}` };
  }

  protected async execute(
    _config: Config,
    hooks: TestCaseHooks,
    stdoutPath: string | undefined,
    stderrPath: string | undefined
  ): Promise<TestResult> {
    const out = stdoutPath ?? `/tmp/${this.name}.out`;
    const err = stderrPath ?? `/tmp/${this.name}.err`;
    if (stdoutPath) {
      await writeFile(stdoutPath, `${this.name} output\n`);
    }
    hooks.gotStdout(out);
    hooks.gotStderr(err);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

class FakeTestProgram extends BaseTestProgram {
  constructor(binary: string, private readonly cases: Record<string, TestResult | Error> | LoadError) {
    super({ binary, root: '/suite', testSuiteName: 'fake', context });
  }

  get interfaceName(): string {
    return 'fake';
  }

  async loadTestCases(): Promise<TestCase[]> {
    if (this.cases instanceof LoadError) {
      throw this.cases;
    }
    return Object.entries(this.cases).map(([name, result]) => new FakeTestCase(this, name, result));
  }
}

const config = createConfig({ architecture: 'x86_64', platform: 'linux' });

function programs(): FakeTestProgram[] {
  return [
    new FakeTestProgram('math/add', { one: passed(), two: failed('Wrong sum') }),
    new FakeTestProgram('math/sub', { only: skipped('Not here') }),
    new FakeTestProgram('io/broken', new LoadError('io/broken', 'No listing')),
  ];
}

describe('runSuite', () => {
  it('runs every test case and records load failures', async () => {
    const onResult = vi.fn();
    const onProgramError = vi.fn();

    const report = await runSuite(programs(), config, { id: 'run-1', context, onResult, onProgramError });

    expect(report.id).toBe('run-1');
    expect(report.context).toEqual({ cwd: '/suite', env: {} });
    expect(report.results.map(r => [r.program, r.testCase, r.result.type])).toEqual([
      ['math/add', 'one', 'passed'],
      ['math/add', 'two', 'failed'],
      ['math/sub', 'only', 'skipped'],
    ]);
    expect(report.errors).toEqual([
      { program: 'io/broken', message: 'Failed to load test cases from io/broken: No listing' },
    ]);
    expect(report.summary).toEqual({
      total: 3,
      passed: 1,
      failed: 1,
      broken: 0,
      skipped: 1,
      expected_failure: 0,
    });
    expect(onResult).toHaveBeenCalledTimes(3);
    expect(onProgramError).toHaveBeenCalledTimes(1);
    expect(reportIsGood(report)).toBe(false);
  });

  it('records an unexpected fault against its program and carries on', async () => {
    const suite = [
      new FakeTestProgram('disk/io', { first: new Error('disk exploded'), second: passed() }),
      ...programs(),
    ];

    const report = await runSuite(suite, config, { context });

    expect(report.errors).toEqual([
      { program: 'disk/io', message: 'disk exploded' },
      { program: 'io/broken', message: 'Failed to load test cases from io/broken: No listing' },
    ]);
    expect(report.results.map(r => `${r.program}:${r.testCase}`)).toEqual([
      'math/add:one',
      'math/add:two',
      'math/sub:only',
    ]);
  });

  it('runs only what the filters select', async () => {
    const report = await runSuite(programs(), config, { filters: ['math/add:two', 'math/sub', 'net'] });

    expect(report.results.map(r => `${r.program}:${r.testCase}`)).toEqual(['math/add:two', 'math/sub:only']);
    expect(report.errors).toEqual([]);
    expect(report.unusedFilters).toEqual(['net']);
  });

  it('drops temporary output paths from the report', async () => {
    const report = await runSuite(programs(), config, { filters: ['math/sub'] });

    expect(report.results[0].stdoutPath).toBeUndefined();
    expect(report.results[0].stderrPath).toBeUndefined();
  });

  describe('with an output directory', () => {
    let outputDir: string;

    beforeEach(async () => {
      outputDir = await makeTempDir('driver');
    });

    afterEach(async () => {
      await rm(outputDir, { recursive: true, force: true });
    });

    it('keeps each test case output under it', async () => {
      const report = await runSuite(programs(), config, { filters: ['math/add:one'], outputDir });
      const stdoutPath = join(outputDir, 'math%2Fadd', 'one.stdout');

      expect(report.results[0].stdoutPath).toBe(stdoutPath);
      expect(report.results[0].stderrPath).toBe(join(outputDir, 'math%2Fadd', 'one.stderr'));
      expect(await readFile(stdoutPath, 'utf-8')).toBe('one output\n');
    });
  });
});

describe('listSuite', () => {
  it('lists the selected test cases', async () => {
    const listing = await listSuite(programs(), ['math']);

    expect(listing.testCases.map(l => [l.program, l.testSuite, l.interfaceName, l.testCase.name])).toEqual([
      ['math/add', 'fake', 'fake', 'one'],
      ['math/add', 'fake', 'fake', 'two'],
      ['math/sub', 'fake', 'fake', 'only'],
    ]);
    expect(listing.errors).toEqual([]);
    expect(listing.unusedFilters).toEqual([]);
  });

  it('reports programs that cannot be listed', async () => {
    const listing = await listSuite(programs());

    expect(listing.errors.map(e => e.program)).toEqual(['io/broken']);
  });
});

describe('report helpers', () => {
  it('summarizes by result type', () => {
    const summary = summarize([
      { program: 'p', testSuite: 's', testCase: 'a', result: broken('x'), startedAt: '', duration: 1 },
      { program: 'p', testSuite: 's', testCase: 'b', result: broken('y'), startedAt: '', duration: 1 },
    ]);
    expect(summary.broken).toBe(2);
    expect(summary.total).toBe(2);
  });

  it('considers a run good when nothing regressed', () => {
    const report: RunReport = {
      id: 'r',
      context: { cwd: '/', env: {} },
      config,
      startedAt: '2024-01-01T00:00:00.000Z',
      completedAt: '2024-01-01T00:00:01.000Z',
      duration: 1000,
      results: [
        { program: 'p', testSuite: 's', testCase: 'a', result: skipped('x'), startedAt: '', duration: 1 },
      ],
      errors: [],
      unusedFilters: [],
      summary: summarize([]),
    };
    expect(reportIsGood(report)).toBe(true);
    expect(reportIsGood({ ...report, errors: [{ program: 'p', message: 'm' }] })).toBe(false);
  });

  it('makes binaries safe as file names', () => {
    expect(safeFileName('dir/sub\\prog:x')).toBe('dir%2Fsub%5Cprog%3Ax');
    expect(safeFileName('.hidden')).toBe('%2Ehidden');
    expect(safeFileName('..')).toBe('%2E.');
  });

  it('never maps two names to the same file', () => {
    expect(safeFileName('a/b')).not.toBe(safeFileName('a_b'));
    expect(safeFileName('a/b')).not.toBe(safeFileName('a%2Fb'));
  });
});
