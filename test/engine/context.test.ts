import { describe, it, expect } from 'vitest';
import { Context } from '../../src/engine/context.js';

describe('Context', () => {
  it('copies the environment it is given', () => {
    const env: Record<string, string> = { HOME: '/home/test' };
    const context = new Context('/work', env);
    env.HOME = '/elsewhere';

    expect(context.env).toEqual({ HOME: '/home/test' });
    expect(Object.isFrozen(context.env)).toBe(true);
    expect(Object.isFrozen(context)).toBe(true);
  });

  it('compares by value', () => {
    const a = new Context('/work', { A: '1', B: '2' });

    expect(a.equals(new Context('/work', { B: '2', A: '1' }))).toBe(true);
    expect(a.equals(new Context('/other', { A: '1', B: '2' }))).toBe(false);
    expect(a.equals(new Context('/work', { A: '1' }))).toBe(false);
    expect(a.equals(new Context('/work', { A: '1', B: '3' }))).toBe(false);
    expect(a.equals(new Context('/work', { A: '1', C: '2' }))).toBe(false);
  });

  it('snapshots the current process', () => {
    const context = Context.current();

    expect(context.cwd).toBe(process.cwd());
    expect(context.env.PATH).toBe(process.env.PATH);
  });

  it('serializes to its fields', () => {
    const context = new Context('/work', { A: '1' });
    expect(JSON.parse(JSON.stringify(context))).toEqual({ cwd: '/work', env: { A: '1' } });
  });
});
