import { isDeepStrictEqual } from 'node:util';
import { EvaluationError, errorMessage } from './errors';
import { isJsonObject, jsonTypeOf, resolvePath } from './json-path';
import type { AssertionResult, AssertionSpec, JsonValue, ResponseSnapshot, SimpleSchema } from './types';

interface Verdict {
  passed: boolean;
  expectedValue: JsonValue;
  actualValue: JsonValue;
  detail: string;
}

export const ASSERTION_TYPES = [
  'status_code',
  'response_time',
  'json_path',
  'json_schema',
  'header',
  'content_type',
  'body_contains',
  'body_not_contains',
  'regex_match',
  'array_length',
  'value_equals',
  'value_greater_than',
  'value_less_than',
  'value_in_range',
] as const;

/** Case-insensitive header lookup. */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const key = Object.keys(headers).find((k) => k.toLowerCase() === wanted);
  return key === undefined ? undefined : headers[key];
}

function show(value: JsonValue | undefined): string {
  return value === undefined ? 'undefined' : JSON.stringify(value);
}

function numericAt(snapshot: ResponseSnapshot, path: string): number {
  const value = resolvePath(snapshot.json, path);
  if (typeof value !== 'number') {
    throw new EvaluationError(`value at path '${path}' is not numeric (got ${jsonTypeOf(value)})`);
  }
  return value;
}

function matchesType(value: JsonValue, type: NonNullable<SimpleSchema['type']>): boolean {
  switch (type) {
    case 'object':
      return isJsonObject(value);
    case 'array':
      return Array.isArray(value);
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'integer':
      return Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'null':
      return value === null;
  }
}

export function schemaViolations(value: JsonValue, schema: SimpleSchema, at = '$'): string[] {
  const violations: string[] = [];
  if (schema.type && !matchesType(value, schema.type)) {
    violations.push(`${at}: expected ${schema.type}, got ${jsonTypeOf(value)}`);
    return violations;
  }
  if (isJsonObject(value)) {
    for (const key of schema.required ?? []) {
      if (!Object.hasOwn(value, key)) {
        violations.push(`${at}: missing required property '${key}'`);
      }
    }
    for (const [key, child] of Object.entries(schema.properties ?? {})) {
      if (Object.hasOwn(value, key)) {
        violations.push(...schemaViolations(value[key], child, `${at}.${key}`));
      }
    }
  }
  return violations;
}

function tagOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'type' in value) {
    return String(value.type);
  }
  return String(value);
}

function headerText(headers: Record<string, string>): string {
  return Object.entries(headers)
    .map(([name, value]) => `${name}: ${value}`)
    .join('\n');
}

function check(snapshot: ResponseSnapshot, spec: AssertionSpec): Verdict {
  switch (spec.type) {
    case 'status_code': {
      const actual = snapshot.statusCode;
      return {
        passed: actual === spec.expected,
        expectedValue: spec.expected,
        actualValue: actual,
        detail: `Status code: expected ${spec.expected}, got ${actual}`,
      };
    }
    case 'response_time': {
      const actual = snapshot.elapsedMs;
      return {
        passed: actual <= spec.maxMs,
        expectedValue: `<= ${spec.maxMs}ms`,
        actualValue: actual,
        detail: `Response time: ${actual}ms (limit: ${spec.maxMs}ms)`,
      };
    }
    case 'json_path': {
      const actual = resolvePath(snapshot.json, spec.path);
      if (spec.expected === undefined) {
        return {
          passed: true,
          expectedValue: 'exists',
          actualValue: actual,
          detail: `JSON path '${spec.path}' exists`,
        };
      }
      return {
        passed: isDeepStrictEqual(actual, spec.expected),
        expectedValue: spec.expected,
        actualValue: actual,
        detail: `JSON path '${spec.path}': expected ${show(spec.expected)}, got ${show(actual)}`,
      };
    }
    case 'json_schema': {
      if (snapshot.json === undefined) {
        throw new EvaluationError('response body is not JSON');
      }
      const violations = schemaViolations(snapshot.json, spec.schema);
      return {
        passed: violations.length === 0,
        expectedValue: spec.schema.type ?? 'any',
        actualValue: violations,
        detail:
          violations.length === 0
            ? 'Schema validation: 0 errors found'
            : `Schema validation: ${violations.length} errors found (${violations.join('; ')})`,
      };
    }
    case 'header': {
      const actual = getHeader(snapshot.headers, spec.name) ?? null;
      return {
        passed: actual === spec.expected,
        expectedValue: spec.expected,
        actualValue: actual,
        detail: `Header '${spec.name}': expected '${spec.expected}', got ${actual === null ? 'none' : `'${actual}'`}`,
      };
    }
    case 'content_type': {
      const raw = getHeader(snapshot.headers, 'content-type') ?? '';
      const mediaType = raw.split(';')[0].trim();
      return {
        passed: mediaType.toLowerCase().includes(spec.expected.toLowerCase()),
        expectedValue: spec.expected,
        actualValue: mediaType,
        detail: `Content type: expected '${spec.expected}', got '${mediaType}'`,
      };
    }
    case 'body_contains': {
      const passed = snapshot.text.includes(spec.text);
      return {
        passed,
        expectedValue: `contains '${spec.text}'`,
        actualValue: `body length: ${snapshot.text.length}`,
        detail: `Body contains '${spec.text}': ${passed}`,
      };
    }
    case 'body_not_contains': {
      const passed = !snapshot.text.includes(spec.text);
      return {
        passed,
        expectedValue: `does not contain '${spec.text}'`,
        actualValue: `body length: ${snapshot.text.length}`,
        detail: `Body does not contain '${spec.text}': ${passed}`,
      };
    }
    case 'regex_match': {
      let regex: RegExp;
      try {
        regex = new RegExp(spec.pattern);
      } catch (error) {
        throw new EvaluationError(`invalid pattern '${spec.pattern}': ${errorMessage(error)}`);
      }
      const subject = spec.target === 'headers' ? headerText(snapshot.headers) : snapshot.text;
      const match = regex.exec(subject);
      return {
        passed: match !== null,
        expectedValue: `matches pattern '${spec.pattern}'`,
        actualValue: match ? match[0] : null,
        detail: `Regex '${spec.pattern}' match in ${spec.target}: ${match !== null}`,
      };
    }
    case 'array_length': {
      const value = resolvePath(snapshot.json, spec.path);
      if (!Array.isArray(value)) {
        throw new EvaluationError(`value at path '${spec.path}' is not an array (got ${jsonTypeOf(value)})`);
      }
      return {
        passed: value.length === spec.expected,
        expectedValue: spec.expected,
        actualValue: value.length,
        detail: `Array length at '${spec.path}': expected ${spec.expected}, got ${value.length}`,
      };
    }
    case 'value_equals': {
      const actual = resolvePath(snapshot.json, spec.path);
      return {
        passed: isDeepStrictEqual(actual, spec.expected),
        expectedValue: spec.expected,
        actualValue: actual,
        detail: `Value at '${spec.path}': expected ${show(spec.expected)}, got ${show(actual)}`,
      };
    }
    case 'value_greater_than': {
      const actual = numericAt(snapshot, spec.path);
      const passed = actual > spec.threshold;
      return {
        passed,
        expectedValue: `> ${spec.threshold}`,
        actualValue: actual,
        detail: `Value at '${spec.path}': ${actual} > ${spec.threshold} = ${passed}`,
      };
    }
    case 'value_less_than': {
      const actual = numericAt(snapshot, spec.path);
      const passed = actual < spec.threshold;
      return {
        passed,
        expectedValue: `< ${spec.threshold}`,
        actualValue: actual,
        detail: `Value at '${spec.path}': ${actual} < ${spec.threshold} = ${passed}`,
      };
    }
    case 'value_in_range': {
      const actual = numericAt(snapshot, spec.path);
      const passed = spec.min <= actual && actual <= spec.max;
      return {
        passed,
        expectedValue: `between ${spec.min} and ${spec.max}`,
        actualValue: actual,
        detail: `Value at '${spec.path}': ${actual} in range [${spec.min}, ${spec.max}] = ${passed}`,
      };
    }
    case 'unrecognized':
      throw new EvaluationError(spec.reason);
    default: {
      const unknown: never = spec;
      throw new EvaluationError(`Unknown assertion type: ${tagOf(unknown)}`);
    }
  }
}

/**
 * Evaluate one assertion against one response. Never throws: anything that
 * prevents a verdict is reported through `error` with `passed: false`.
 */
export function evaluate(snapshot: ResponseSnapshot, spec: AssertionSpec): AssertionResult {
  try {
    return { spec, ...check(snapshot, spec) };
  } catch (error) {
    return {
      spec,
      passed: false,
      expectedValue: null,
      actualValue: null,
      error: errorMessage(error),
      detail: `Failed to evaluate ${spec.type} assertion`,
    };
  }
}
