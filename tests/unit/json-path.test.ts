import { describe, it, expect } from 'vitest';
import { EvaluationError } from '../../src/errors';
import { jsonTypeOf, resolvePath } from '../../src/json-path';

describe('resolvePath', () => {
  const body = { a: { b: [10, 20, 30] }, n: null };

  it('walks objects and indexes arrays', () => {
    expect(resolvePath(body, 'a.b.1')).toBe(20);
  });

  it('returns the root for an empty path', () => {
    expect(resolvePath([1, 2, 3], '')).toEqual([1, 2, 3]);
  });

  it('resolves a key whose value is null', () => {
    expect(resolvePath(body, 'n')).toBeNull();
  });

  it('throws EvaluationError for a missing key', () => {
    expect(() => resolvePath(body, 'a.c')).toThrow(EvaluationError);
    expect(() => resolvePath(body, 'a.c')).toThrow("path not found: 'a.c'");
  });

  it('throws for an out-of-range index', () => {
    expect(() => resolvePath(body, 'a.b.3')).toThrow(
      "path not found: 'a.b.3' (index 3 out of range, length 3)"
    );
  });

  it('throws for a non-numeric segment on an array', () => {
    expect(() => resolvePath(body, 'a.b.first')).toThrow("cannot index array with 'first'");
  });

  it('throws for a negative index', () => {
    expect(() => resolvePath(body, 'a.b.-1')).toThrow(EvaluationError);
  });

  it('throws when descending into a scalar', () => {
    expect(() => resolvePath(body, 'a.b.0.x')).toThrow("path not found: 'a.b.0.x' (cannot descend into number)");
  });

  it('throws when there is no parsed body', () => {
    expect(() => resolvePath(undefined, 'a')).toThrow('response body is not JSON');
  });

  it('does not read inherited properties', () => {
    expect(() => resolvePath({}, 'toString')).toThrow(EvaluationError);
  });
});

describe('jsonTypeOf', () => {
  it('names JSON types', () => {
    expect(jsonTypeOf(null)).toBe('null');
    expect(jsonTypeOf([])).toBe('array');
    expect(jsonTypeOf({})).toBe('object');
    expect(jsonTypeOf('x')).toBe('string');
    expect(jsonTypeOf(1)).toBe('number');
    expect(jsonTypeOf(true)).toBe('boolean');
  });
});
