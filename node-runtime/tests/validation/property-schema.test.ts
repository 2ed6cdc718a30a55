import { describe, it, expect } from 'vitest';
import { compileProperty, formatIssue } from '../../src/validation/property-schema.js';

function reason(result: ReturnType<ReturnType<typeof compileProperty>['safeParse']>): string | null {
  return result.success ? null : formatIssue(result.error.issues[0]);
}

describe('compileProperty', () => {
  it('enforces string length bounds', () => {
    const schema = compileProperty({ type: 'string', minLength: 2, maxLength: 4 });
    expect(reason(schema.safeParse('a'))).toBe('must be at least 2 characters');
    expect(reason(schema.safeParse('abcde'))).toBe('must be at most 4 characters');
    expect(reason(schema.safeParse('abc'))).toBeNull();
  });

  it('rejects every value when the pattern itself is invalid', () => {
    const schema = compileProperty({ type: 'string', pattern: '([' });
    expect(reason(schema.safeParse('anything'))).toBe('schema pattern ([ is not a valid regular expression');
  });

  it('distinguishes integers from numbers', () => {
    expect(reason(compileProperty({ type: 'integer' }).safeParse(1.5))).toBe('must be an integer');
    expect(reason(compileProperty({ type: 'number' }).safeParse(1.5))).toBeNull();
    expect(reason(compileProperty({ type: 'number', maximum: 10 }).safeParse(11))).toBe('must be <= 10');
  });

  it('checks booleans and enums of any scalar type', () => {
    expect(reason(compileProperty({ type: 'boolean' }).safeParse('yes'))).toBe('must be of type boolean');
    const levels = compileProperty({ type: 'integer', enum: [1, 2, 3] });
    expect(reason(levels.safeParse(4))).toBe('must be one of: 1, 2, 3');
    expect(reason(levels.safeParse(2))).toBeNull();
  });

  it('bounds array length', () => {
    const schema = compileProperty({ type: 'array', items: { type: 'string' }, minItems: 1 });
    expect(reason(schema.safeParse([]))).toBe('must contain at least 1 item(s)');
    expect(reason(schema.safeParse([3]))).toBe('at 0: must be of type string');
  });

  it('keeps unknown keys on objects', () => {
    const schema = compileProperty({ type: 'object', properties: { a: { type: 'string' } } });
    const result = schema.safeParse({ a: 'x', b: 1 });
    expect(result.success && result.data).toEqual({ a: 'x', b: 1 });
  });
});
