import { z } from 'zod';
import { ASSERTION_TYPES } from './assertions';
import { ValidationError } from './errors';
import type { AssertionSpec, JsonValue, SimpleSchema, TestDefinition } from './types';

export const DEFAULT_TIMEOUT_SECONDS = 30;

const KNOWN_ASSERTIONS: ReadonlySet<string> = new Set(ASSERTION_TYPES);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const simpleSchema: z.ZodType<SimpleSchema> = z.lazy(() =>
  z.object({
    type: z.enum(['object', 'array', 'string', 'number', 'integer', 'boolean', 'null']).optional(),
    required: z.array(z.string()).optional(),
    properties: z.record(simpleSchema).optional(),
  })
);

const path = z.string().default('');

const assertionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('status_code'), expected: z.number().int().default(200) }),
  z.object({ type: z.literal('response_time'), maxMs: z.number().nonnegative().default(5000) }),
  z.object({ type: z.literal('json_path'), path: z.string(), expected: jsonValueSchema.optional() }),
  z.object({ type: z.literal('json_schema'), schema: simpleSchema }),
  z.object({ type: z.literal('header'), name: z.string().min(1), expected: z.string() }),
  z.object({ type: z.literal('content_type'), expected: z.string().default('application/json') }),
  z.object({ type: z.literal('body_contains'), text: z.string() }),
  z.object({ type: z.literal('body_not_contains'), text: z.string() }),
  z.object({ type: z.literal('regex_match'), pattern: z.string(), target: z.enum(['body', 'headers']).default('body') }),
  z.object({ type: z.literal('array_length'), path, expected: z.number().int().nonnegative() }),
  z.object({ type: z.literal('value_equals'), path, expected: jsonValueSchema }),
  z.object({ type: z.literal('value_greater_than'), path, threshold: z.number() }),
  z.object({ type: z.literal('value_less_than'), path, threshold: z.number() }),
  z.object({ type: z.literal('value_in_range'), path, min: z.number(), max: z.number() }),
]);

const rawTestSchema = z.object({
  id: z.string().optional(),
  name: z.string().trim().optional(),
  description: z.string().optional(),
  method: z.string().trim().min(1).default('GET'),
  url: z.string().trim().optional(),
  /** Older suites call the url `endpoint` */
  endpoint: z.string().trim().optional(),
  headers: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  body: jsonValueSchema.optional(),
  assertions: z.array(z.unknown()).default([]),
  timeoutSeconds: z.number().positive().optional(),
  timeout: z.number().positive().optional(),
  expectedStatus: z.number().int().optional(),
  expected_status: z.number().int().optional(),
  tags: z.union([z.string(), z.array(z.string())]).optional(),
  suiteName: z.string().optional(),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const at = err.path.join('.');
    return at ? `${at}: ${err.message}` : err.message;
  });
}

function withLegacyFields(raw: object): object {
  const aliased: Record<string, unknown> = { ...raw };
  if ('max_ms' in raw && !('maxMs' in raw)) aliased.maxMs = raw.max_ms;
  if ('header' in raw && !('name' in raw)) aliased.name = raw.header;
  return aliased;
}

/**
 * Normalise one loosely-typed assertion. Unknown tags and invalid fields
 * become an `unrecognized` assertion so only that assertion fails.
 */
export function parseAssertion(raw: unknown): AssertionSpec {
  if (typeof raw !== 'object' || raw === null || !('type' in raw) || typeof raw.type !== 'string') {
    return { type: 'unrecognized', tag: '(missing)', reason: 'Unknown assertion type: (missing)' };
  }
  const tag = raw.type;
  // already normalised, e.g. a stored test being updated or re-imported
  if (tag === 'unrecognized' && 'tag' in raw && typeof raw.tag === 'string' && 'reason' in raw && typeof raw.reason === 'string') {
    return { type: 'unrecognized', tag: raw.tag, reason: raw.reason };
  }
  if (!KNOWN_ASSERTIONS.has(tag)) {
    return { type: 'unrecognized', tag, reason: `Unknown assertion type: ${tag}` };
  }
  const parsed = assertionSchema.safeParse(withLegacyFields(raw));
  if (!parsed.success) {
    return { type: 'unrecognized', tag, reason: `Invalid ${tag} assertion: ${formatIssues(parsed.error).join(', ')}` };
  }
  return parsed.data;
}

export interface DefinitionDefaults {
  timeoutSeconds?: number;
  suiteName?: string;
}

/**
 * Turn a loosely-typed test (suite file, import payload, store input) into a
 * TestDefinition. Throws ValidationError when the test cannot be run at all.
 */
export function parseTestDefinition(raw: unknown, index = 0, defaults: DefinitionDefaults = {}): TestDefinition {
  const parsed = rawTestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`Invalid test definition #${index + 1}: ${issues.join(', ')}`, issues);
  }
  const data = parsed.data;
  const url = data.url || data.endpoint;
  if (!url) {
    throw new ValidationError(`Invalid test definition #${index + 1}: missing required field: url`, ['url: Required']);
  }

  const assertions = data.assertions.map(parseAssertion);
  const expectedStatus = data.expectedStatus ?? data.expected_status;
  if (expectedStatus !== undefined && !assertions.some((a) => a.type === 'status_code')) {
    assertions.unshift({ type: 'status_code', expected: expectedStatus });
  }

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(data.headers)) {
    headers[name] = String(value);
  }

  const definition: TestDefinition = {
    name: data.name || `Test ${index + 1}`,
    method: data.method.toUpperCase(),
    url,
    headers,
    assertions,
    timeoutSeconds: data.timeoutSeconds ?? data.timeout ?? defaults.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
  };
  if (data.body !== undefined) definition.body = data.body;
  if (data.id) definition.id = data.id;
  if (data.description) definition.description = data.description;
  if (data.tags !== undefined) definition.tags = Array.isArray(data.tags) ? data.tags : [data.tags];
  const suiteName = data.suiteName ?? defaults.suiteName;
  if (suiteName) definition.suiteName = suiteName;
  return definition;
}

/** Checks a typed definition right before it is executed. */
export function validateDefinition(test: TestDefinition): void {
  const issues: string[] = [];
  if (typeof test.method !== 'string' || !/^[A-Z]+$/.test(test.method)) {
    issues.push(`method: expected an upper-case HTTP method, got '${String(test.method)}'`);
  }
  if (typeof test.url !== 'string' || test.url.trim() === '') {
    issues.push('url: Required');
  }
  if (!Number.isFinite(test.timeoutSeconds) || test.timeoutSeconds <= 0) {
    issues.push(`timeoutSeconds: expected a positive number, got ${String(test.timeoutSeconds)}`);
  }
  if (!Array.isArray(test.assertions)) {
    issues.push('assertions: expected an array');
  }
  if (issues.length > 0) {
    throw new ValidationError(`Invalid test '${test.name}': ${issues.join(', ')}`, issues);
  }
}
