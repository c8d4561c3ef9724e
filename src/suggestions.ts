import { getHeader } from './assertions';
import { parseTestDefinition } from './definition';
import { isJsonObject } from './json-path';
import type { AssertionSpec, JsonValue, ResponseSnapshot, TestDefinition } from './types';

export type Confidence = 'high' | 'medium' | 'low';

export interface AssertionSuggestion {
  assertion: AssertionSpec;
  description: string;
  confidence: Confidence;
}

const KEY_FIELDS = ['id', 'uuid', 'status', 'success', 'error'];

/**
 * Propose assertions that would pass against an observed response.
 */
export function suggestAssertions(snapshot: ResponseSnapshot): AssertionSuggestion[] {
  const suggestions: AssertionSuggestion[] = [
    {
      assertion: { type: 'status_code', expected: snapshot.statusCode },
      description: 'Validate HTTP status code',
      confidence: 'high',
    },
  ];

  if (snapshot.elapsedMs > 0) {
    // twice the observed time, never under a second
    const maxMs = Math.max(1000, Math.round(snapshot.elapsedMs * 2));
    suggestions.push({
      assertion: { type: 'response_time', maxMs },
      description: `Validate response time is under ${maxMs}ms`,
      confidence: 'medium',
    });
  }

  const contentType = getHeader(snapshot.headers, 'content-type');
  if (contentType) {
    suggestions.push({
      assertion: { type: 'content_type', expected: contentType.split(';')[0].trim() },
      description: 'Validate response content type',
      confidence: 'high',
    });
  }

  const body = snapshot.json;
  if (isJsonObject(body)) {
    for (const key of KEY_FIELDS) {
      if (Object.hasOwn(body, key)) {
        suggestions.push({
          assertion: { type: 'json_path', path: key, expected: body[key] },
          description: `Validate ${key} field value`,
          confidence: 'medium',
        });
      }
    }
  } else if (Array.isArray(body)) {
    suggestions.push({
      assertion: { type: 'array_length', path: '', expected: body.length },
      description: `Validate array contains ${body.length} items`,
      confidence: 'low',
    });
  }

  return suggestions;
}

export interface EndpointInfo {
  method?: string;
  path: string;
}

export interface TestSuggestion {
  test: TestDefinition;
  confidence: Confidence;
  category: string;
}

const ENDPOINT_CATEGORIES: [string, string[]][] = [
  ['user_management', ['/users', '/user', '/accounts', '/account', '/profile']],
  ['authentication', ['/auth', '/login', '/logout', '/token', '/signin']],
  ['api_operations', ['/api', '/v1', '/v2']],
];

export function categorizeEndpoint(path: string): string {
  const lower = path.toLowerCase();
  const match = ENDPOINT_CATEGORIES.find(([, patterns]) => patterns.some((p) => lower.includes(p)));
  return match ? match[0] : 'general';
}

interface Scenario {
  name: string;
  url?: string;
  headers?: Record<string, string>;
  body?: JsonValue;
  assertions: AssertionSpec[];
  confidence: Confidence;
  category: string;
}

function methodScenarios(method: string): Scenario[] {
  switch (method) {
    case 'POST':
      return [
        {
          name: 'Valid Creation',
          body: { name: 'Test Resource', description: 'Test description' },
          assertions: [
            { type: 'status_code', expected: 201 },
            { type: 'json_path', path: 'id' },
          ],
          confidence: 'high',
          category: 'creation',
        },
      ];
    case 'PUT':
      return [
        {
          name: 'Full Update',
          body: { name: 'Updated Resource', description: 'Updated description' },
          assertions: [
            { type: 'status_code', expected: 200 },
            { type: 'json_path', path: 'name', expected: 'Updated Resource' },
          ],
          confidence: 'medium',
          category: 'update',
        },
      ];
    case 'DELETE':
      return [
        {
          name: 'Successful Deletion',
          assertions: [{ type: 'status_code', expected: 204 }],
          confidence: 'medium',
          category: 'deletion',
        },
      ];
    default:
      return [];
  }
}

function errorScenarios(method: string, path: string): Scenario[] {
  const scenarios: Scenario[] = [];
  if (method === 'POST' || method === 'PUT' || method === 'PATCH') {
    scenarios.push({
      name: 'Invalid Input',
      body: { invalid_field: 'invalid_value' },
      assertions: [{ type: 'status_code', expected: 400 }],
      confidence: 'medium',
      category: 'error_handling',
    });
  }
  if (path.includes('{id}') || /\/(1|123)$/.test(path)) {
    scenarios.push({
      name: 'Resource Not Found',
      url: path.replace('{id}', '999999').replace(/\/(1|123)$/, '/999999'),
      assertions: [{ type: 'status_code', expected: 404 }],
      confidence: 'high',
      category: 'error_handling',
    });
  }
  return scenarios;
}

/**
 * Draft test scenarios for an endpoint: a happy path, method-specific
 * checks, missing and invalid credentials, then error cases.
 */
export function suggestTests(endpoint: EndpointInfo): TestSuggestion[] {
  const method = (endpoint.method || 'GET').toUpperCase();
  const { path } = endpoint;
  const endpointCategory = categorizeEndpoint(path);

  const scenarios: Scenario[] = [
    {
      name: 'Happy Path',
      assertions: [
        { type: 'status_code', expected: 200 },
        { type: 'response_time', maxMs: 5000 },
      ],
      confidence: 'high',
      category: 'basic',
    },
    ...methodScenarios(method),
    {
      name: 'No Authentication',
      headers: {},
      assertions: [{ type: 'status_code', expected: 401 }],
      confidence: 'medium',
      category: 'security',
    },
    {
      name: 'Invalid Token',
      headers: { Authorization: 'Bearer invalid_token' },
      assertions: [{ type: 'status_code', expected: 401 }],
      confidence: 'medium',
      category: 'security',
    },
    ...errorScenarios(method, path),
  ];

  return scenarios.map((scenario, index) => {
    const raw: Record<string, unknown> = {
      name: `Test ${method} ${path} - ${scenario.name}`,
      method,
      url: scenario.url ?? path,
      headers: scenario.headers ?? {},
      assertions: scenario.assertions,
      tags: ['suggested', endpointCategory],
    };
    if (scenario.body !== undefined) raw.body = scenario.body;
    return {
      test: parseTestDefinition(raw, index),
      confidence: scenario.confidence,
      category: scenario.category,
    };
  });
}
