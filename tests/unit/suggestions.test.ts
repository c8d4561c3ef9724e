import { describe, it, expect } from 'vitest';
import { runSuite } from '../../src/suite-runner';
import { categorizeEndpoint, suggestAssertions, suggestTests } from '../../src/suggestions';
import { jsonSnapshot, snapshot } from '../helpers';

describe('suggestAssertions', () => {
  it('suggests status, timing, content type and key fields for an object body', () => {
    const snap = jsonSnapshot({ id: 42, name: 'ada', status: 'active' }, { elapsedMs: 700 });
    expect(suggestAssertions(snap).map((s) => [s.assertion, s.confidence])).toEqual([
      [{ type: 'status_code', expected: 200 }, 'high'],
      [{ type: 'response_time', maxMs: 1400 }, 'medium'],
      [{ type: 'content_type', expected: 'application/json' }, 'high'],
      [{ type: 'json_path', path: 'id', expected: 42 }, 'medium'],
      [{ type: 'json_path', path: 'status', expected: 'active' }, 'medium'],
    ]);
  });

  it('never suggests a time limit under one second', () => {
    const [, timing] = suggestAssertions(snapshot({ elapsedMs: 120 }));
    expect(timing.assertion).toEqual({ type: 'response_time', maxMs: 1000 });
    expect(timing.description).toBe('Validate response time is under 1000ms');
  });

  it('suggests a length check for an array body', () => {
    const suggestions = suggestAssertions(jsonSnapshot([1, 2, 3], { elapsedMs: 0 }));
    expect(suggestions.map((s) => s.assertion.type)).toEqual(['status_code', 'content_type', 'array_length']);
    expect(suggestions[2].assertion).toEqual({ type: 'array_length', path: '', expected: 3 });
    expect(suggestions[2].confidence).toBe('low');
  });

  it('skips content type when the header is absent', () => {
    const suggestions = suggestAssertions(snapshot({ headers: {}, text: 'ok', json: undefined, elapsedMs: 0 }));
    expect(suggestions.map((s) => s.assertion.type)).toEqual(['status_code']);
  });

  it('produces assertions that pass against the same response', () => {
    const snap = jsonSnapshot({ id: 'a-1', success: true, error: null }, { statusCode: 201, elapsedMs: 900 });
    const outcome = runSuite(
      snap,
      suggestAssertions(snap).map((s) => s.assertion)
    );
    expect(outcome.overallSuccess).toBe(true);
    expect(outcome.passed).toBe(6);
  });
});

describe('categorizeEndpoint', () => {
  it('matches the first category whose pattern appears in the path', () => {
    expect(categorizeEndpoint('/Users/42')).toBe('user_management');
    expect(categorizeEndpoint('/auth/login')).toBe('authentication');
    expect(categorizeEndpoint('/api/orders')).toBe('api_operations');
    expect(categorizeEndpoint('/api/users')).toBe('user_management');
    expect(categorizeEndpoint('/health')).toBe('general');
  });
});

describe('suggestTests', () => {
  it('drafts creation, security and error scenarios for a POST', () => {
    const suggestions = suggestTests({ method: 'post', path: '/users' });
    expect(suggestions.map((s) => [s.test.name, s.category, s.confidence])).toEqual([
      ['Test POST /users - Happy Path', 'basic', 'high'],
      ['Test POST /users - Valid Creation', 'creation', 'high'],
      ['Test POST /users - No Authentication', 'security', 'medium'],
      ['Test POST /users - Invalid Token', 'security', 'medium'],
      ['Test POST /users - Invalid Input', 'error_handling', 'medium'],
    ]);

    const creation = suggestions[1].test;
    expect(creation.method).toBe('POST');
    expect(creation.body).toEqual({ name: 'Test Resource', description: 'Test description' });
    expect(creation.assertions).toEqual([
      { type: 'status_code', expected: 201 },
      { type: 'json_path', path: 'id' },
    ]);
    expect(creation.tags).toEqual(['suggested', 'user_management']);
    expect(suggestions[3].test.headers).toEqual({ Authorization: 'Bearer invalid_token' });
  });

  it('adds a not-found scenario for item paths', () => {
    const suggestions = suggestTests({ method: 'DELETE', path: '/users/{id}' });
    expect(suggestions.map((s) => s.category)).toEqual(['basic', 'deletion', 'security', 'security', 'error_handling']);

    const notFound = suggestions[4].test;
    expect(notFound.name).toBe('Test DELETE /users/{id} - Resource Not Found');
    expect(notFound.url).toBe('/users/999999');
    expect(notFound.assertions).toEqual([{ type: 'status_code', expected: 404 }]);
    expect(suggestions[4].confidence).toBe('high');
  });

  it('replaces a trailing sample id in the not-found url', () => {
    const notFound = suggestTests({ path: '/orders/123' }).find((s) => s.test.name.endsWith('Resource Not Found'));
    expect(notFound?.test.url).toBe('/orders/999999');
  });

  it('keeps to the basic and security scenarios for a plain GET', () => {
    const suggestions = suggestTests({ path: '/health' });
    expect(suggestions.map((s) => s.test.name)).toEqual([
      'Test GET /health - Happy Path',
      'Test GET /health - No Authentication',
      'Test GET /health - Invalid Token',
    ]);
    expect(suggestions[0].test.assertions).toEqual([
      { type: 'status_code', expected: 200 },
      { type: 'response_time', maxMs: 5000 },
    ]);
    expect(suggestions[0].test.tags).toEqual(['suggested', 'general']);
  });
});
