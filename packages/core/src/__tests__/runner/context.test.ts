/**
 * Execution Context and Invocation Stack Tests
 */

import { describe, it, expect } from 'vitest';

import { CycleError } from '../../errors.js';
import { ExecutionContext } from '../../runner/context.js';
import { InvocationStack } from '../../runner/invocation-stack.js';

describe('ExecutionContext', () => {
  it('should store and read parameters', () => {
    const context = new ExecutionContext({ scenarioId: 'A', parameters: { temp: 85 } });
    context.set('fan', 'ok');

    expect(context.get('temp')).toBe(85);
    expect(context.get('fan')).toBe('ok');
    expect(context.get('missing')).toBeUndefined();
    expect(context.has('temp')).toBe(true);
  });

  it('should let a child read but not write its parent', () => {
    const parent = new ExecutionContext({ scenarioId: 'A', parameters: { mode: 'fast', temp: 85 } });
    const child = parent.child('B');

    child.set('temp', 90);
    child.merge({ result: true });

    expect(child.scenarioId).toBe('B');
    expect(child.get('mode')).toBe('fast');
    expect(child.get('temp')).toBe(90);
    expect(parent.get('temp')).toBe(85);
    expect(parent.get('result')).toBeUndefined();
  });

  it('should list own entries and a merged snapshot', () => {
    const parent = new ExecutionContext({ scenarioId: 'A', parameters: { a: 1, b: 2 } });
    const child = parent.child('B');
    child.set('b', 3);

    expect(child.ownEntries()).toEqual({ b: 3 });
    expect(child.snapshot()).toEqual({ a: 1, b: 3 });
  });
});

describe('InvocationStack', () => {
  it('should track depth while entered', async () => {
    const stack = new InvocationStack();

    const depth = await stack.enter('A', () => stack.enter('B', async () => stack.depth));

    expect(depth).toBe(2);
    expect(stack.depth).toBe(0);
  });

  it('should reject a scenario already on the chain', () => {
    const stack = new InvocationStack();
    stack.push('A');
    stack.push('B');

    expect(() => stack.push('A')).toThrow(CycleError);
    expect(() => stack.push('A')).toThrow('Scenario invocation cycle: A -> B -> A');
    expect(stack.toArray()).toEqual(['A', 'B']);
  });

  it('should pop on failure', async () => {
    const stack = new InvocationStack();

    await expect(
      stack.enter('A', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(stack.depth).toBe(0);
  });

  it('should allow the same scenario again after it returns', async () => {
    const stack = new InvocationStack();

    await stack.enter('A', async () => undefined);
    await stack.enter('A', async () => undefined);

    expect(stack.has('A')).toBe(false);
  });

  it('should refuse out-of-order pops', () => {
    const stack = new InvocationStack();
    stack.push('A');

    expect(() => stack.pop('B')).toThrow('Invocation stack out of order: expected "B" on top, found "A"');
  });
});
