import { describe, it, expect } from 'vitest';
import { parseAssertion, parseTestDefinition, validateDefinition } from '../../src/definition';
import { ValidationError } from '../../src/errors';
import { definition } from '../helpers';

describe('parseAssertion', () => {
  it('applies field defaults', () => {
    expect(parseAssertion({ type: 'status_code' })).toEqual({ type: 'status_code', expected: 200 });
    expect(parseAssertion({ type: 'response_time' })).toEqual({ type: 'response_time', maxMs: 5000 });
    expect(parseAssertion({ type: 'regex_match', pattern: 'ok' })).toEqual({
      type: 'regex_match',
      pattern: 'ok',
      target: 'body',
    });
    expect(parseAssertion({ type: 'array_length', expected: 2 })).toEqual({
      type: 'array_length',
      path: '',
      expected: 2,
    });
  });

  it('accepts legacy field names', () => {
    expect(parseAssertion({ type: 'response_time', max_ms: 250 })).toEqual({ type: 'response_time', maxMs: 250 });
    expect(parseAssertion({ type: 'header', header: 'etag', expected: 'v1' })).toEqual({
      type: 'header',
      name: 'etag',
      expected: 'v1',
    });
  });

  it('turns unknown tags into unrecognized assertions', () => {
    expect(parseAssertion({ type: 'custom_javascript', code: 'return true' })).toEqual({
      type: 'unrecognized',
      tag: 'custom_javascript',
      reason: 'Unknown assertion type: custom_javascript',
    });
    expect(parseAssertion({ expected: 200 })).toEqual({
      type: 'unrecognized',
      tag: '(missing)',
      reason: 'Unknown assertion type: (missing)',
    });
  });

  it('turns invalid fields into unrecognized assertions', () => {
    expect(parseAssertion({ type: 'json_path' })).toEqual({
      type: 'unrecognized',
      tag: 'json_path',
      reason: 'Invalid json_path assertion: path: Required',
    });
  });
});

describe('parseTestDefinition', () => {
  it('fills defaults', () => {
    expect(parseTestDefinition({ url: 'https://example.test/a' })).toEqual({
      name: 'Test 1',
      method: 'GET',
      url: 'https://example.test/a',
      headers: {},
      assertions: [],
      timeoutSeconds: 30,
    });
  });

  it('normalises legacy shapes', () => {
    const test = parseTestDefinition(
      {
        endpoint: '/users',
        method: 'post',
        expected_status: 201,
        headers: { 'X-Retry': 3 },
        tags: 'smoke',
        body: { name: 'ada' },
        assertions: [{ type: 'response_time', max_ms: 300 }],
      },
      2,
      { timeoutSeconds: 5, suiteName: 'users' }
    );
    expect(test).toEqual({
      name: 'Test 3',
      method: 'POST',
      url: '/users',
      headers: { 'X-Retry': '3' },
      body: { name: 'ada' },
      tags: ['smoke'],
      suiteName: 'users',
      timeoutSeconds: 5,
      assertions: [
        { type: 'status_code', expected: 201 },
        { type: 'response_time', maxMs: 300 },
      ],
    });
  });

  it('does not add a status assertion when one exists', () => {
    const test = parseTestDefinition({
      url: '/a',
      expectedStatus: 204,
      assertions: [{ type: 'status_code', expected: 200 }],
    });
    expect(test.assertions).toEqual([{ type: 'status_code', expected: 200 }]);
  });

  it('prefers an explicit timeout over defaults', () => {
    expect(parseTestDefinition({ url: '/a', timeout: 2 }, 0, { timeoutSeconds: 9 }).timeoutSeconds).toBe(2);
  });

  it('rejects a definition without a url', () => {
    expect(() => parseTestDefinition({ name: 'x' })).toThrow(
      'Invalid test definition #1: missing required field: url'
    );
  });

  it('reports field issues', () => {
    try {
      parseTestDefinition({ url: 5 }, 1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Invalid test definition #2: url: Expected string, received number');
        expect(error.issues).toEqual(['url: Expected string, received number']);
      }
    }
  });

  it('keeps unknown assertions so only they fail', () => {
    const test = parseTestDefinition({ url: '/a', assertions: [{ type: 'status_code' }, { type: 'nope' }] });
    expect(test.assertions.map((a) => a.type)).toEqual(['status_code', 'unrecognized']);
  });
});

describe('validateDefinition', () => {
  it('accepts a well-formed definition', () => {
    expect(() => validateDefinition(definition())).not.toThrow();
  });

  it('rejects a lower-case method', () => {
    expect(() => validateDefinition(definition({ method: 'get' }))).toThrow(
      "Invalid test 'ok': method: expected an upper-case HTTP method, got 'get'"
    );
  });

  it('rejects an empty url and a non-positive timeout together', () => {
    expect(() => validateDefinition(definition({ url: ' ', timeoutSeconds: 0 }))).toThrow(
      "Invalid test 'ok': url: Required, timeoutSeconds: expected a positive number, got 0"
    );
  });
});
