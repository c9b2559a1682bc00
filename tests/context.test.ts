import { describe, it, expect } from 'vitest';
import { ExecutionContext } from '../context.js';

describe('ExecutionContext', () => {
  it('should copy the initial values instead of holding the caller object', () => {
    const initial = { a: 1 };
    const context = new ExecutionContext(initial);

    context.merge({ a: 2, b: 3 });

    expect(initial).toEqual({ a: 1 });
    expect(context.snapshot()).toEqual({ a: 2, b: 3 });
  });

  it('should let later writes replace earlier values and keep first-write key order', () => {
    const context = new ExecutionContext({ x: 'first' });
    context.merge({ y: 1 }).merge({ x: 'second' });

    expect(context.get('x')).toBe('second');
    expect(context.keys()).toEqual(['x', 'y']);
    expect(context.size).toBe(2);
  });

  it('should report keys holding undefined as present', () => {
    const context = new ExecutionContext({ maybe: undefined });

    expect(context.has('maybe')).toBe(true);
    expect(context.has('absent')).toBe(false);
    expect(context.get('absent')).toBeUndefined();
  });

  it('should serialize as a plain object', () => {
    const context = new ExecutionContext({ n: 1, s: 'two' });

    expect(JSON.stringify(context)).toBe('{"n":1,"s":"two"}');
  });
});
