import { describe, it, expect } from 'vitest';
import { Context } from '../../src/engine/context.js';
import { EngineError } from '../../src/engine/errors.js';
import { passed, type TestResult } from '../../src/engine/result.js';
import { BaseTestCase, type PropertiesMap, type TestCase } from '../../src/engine/test-case.js';
import { BaseTestProgram, findTestCase, type TestProgramIdentity } from '../../src/engine/test-program.js';

class FixedTestCase extends BaseTestCase {
  protected getAllProperties(): PropertiesMap {
    return {};
  }

  protected async execute(): Promise<TestResult> {
    return passed();
  }
}

class FixedTestProgram extends BaseTestProgram {
  constructor(identity: TestProgramIdentity, private readonly names: string[]) {
    super(identity);
  }

  get interfaceName(): string {
    return 'fixed';
  }

  async loadTestCases(): Promise<TestCase[]> {
    return this.names.map(name => new FixedTestCase(this, name));
  }
}

describe('BaseTestProgram', () => {
  it('resolves relative binaries against the root', () => {
    const program = new FixedTestProgram({ binary: 'dir/prog', root: '/suite', testSuiteName: 's' }, []);
    expect(program.absolutePath()).toBe('/suite/dir/prog');
  });

  it('leaves absolute binaries alone', () => {
    const program = new FixedTestProgram({ binary: '/usr/bin/prog', root: '/suite', testSuiteName: 's' }, []);
    expect(program.absolutePath()).toBe('/usr/bin/prog');
  });

  it('resolves a relative root against the context directory', () => {
    const context = new Context('/work', {});
    const program = new FixedTestProgram({ binary: 'p', root: '../suite', testSuiteName: 's', context }, []);
    expect(program.absolutePath()).toBe('/suite/p');
  });

  it('keeps the identity it was built with', () => {
    const program = new FixedTestProgram({ binary: 'dir/prog', root: 'tests', testSuiteName: 'math' }, []);

    expect(program.binary).toBe('dir/prog');
    expect(program.root).toBe('tests');
    expect(program.testSuiteName).toBe('math');
  });

  it('uses the given context or the process one', () => {
    const context = new Context('/work', { A: '1' });
    const explicit = new FixedTestProgram({ binary: 'p', root: '/', testSuiteName: 's', context }, []);
    const implicit = new FixedTestProgram({ binary: 'p', root: '/', testSuiteName: 's' }, []);

    expect(explicit.context).toBe(context);
    expect(implicit.context.cwd).toBe(process.cwd());
  });
});

describe('findTestCase', () => {
  const program = new FixedTestProgram({ binary: 'prog', root: '/', testSuiteName: 's' }, ['one', 'two']);

  it('returns the named test case', async () => {
    const testCase = await findTestCase(program, 'two');
    expect(testCase.displayName).toBe('prog:two');
  });

  it('fails for an unknown name', async () => {
    await expect(findTestCase(program, 'three')).rejects.toThrow(
      new EngineError("Unknown test case 'three' in test program prog")
    );
  });
});
