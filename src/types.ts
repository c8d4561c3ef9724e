export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS' | (string & {});

export type SchemaType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

/** Minimal structural schema. Not JSON Schema. */
export interface SimpleSchema {
  type?: SchemaType;
  /** Keys that must be present when the value is an object */
  required?: string[];
  /** Checked recursively for keys that are present */
  properties?: Record<string, SimpleSchema>;
}

export type AssertionSpec =
  | { type: 'status_code'; expected: number }
  | { type: 'response_time'; maxMs: number }
  /** Without `expected` the assertion only checks that the path resolves */
  | { type: 'json_path'; path: string; expected?: JsonValue }
  | { type: 'json_schema'; schema: SimpleSchema }
  | { type: 'header'; name: string; expected: string }
  | { type: 'content_type'; expected: string }
  | { type: 'body_contains'; text: string }
  | { type: 'body_not_contains'; text: string }
  | { type: 'regex_match'; pattern: string; target: 'body' | 'headers' }
  | { type: 'array_length'; path: string; expected: number }
  | { type: 'value_equals'; path: string; expected: JsonValue }
  | { type: 'value_greater_than'; path: string; threshold: number }
  | { type: 'value_less_than'; path: string; threshold: number }
  | { type: 'value_in_range'; path: string; min: number; max: number }
  /** Produced by normalisation for unknown tags or invalid fields */
  | { type: 'unrecognized'; tag: string; reason: string };

export type AssertionType = AssertionSpec['type'];

export interface TestDefinition {
  /** Unique name for the test */
  name: string;
  /** Upper-cased HTTP method */
  method: HttpMethod;
  /** Absolute URL, or a path resolved against the base url */
  url: string;
  headers: Record<string, string>;
  /** Only sent for methods that carry a payload */
  body?: JsonValue;
  assertions: AssertionSpec[];
  /** Per-test timeout in seconds */
  timeoutSeconds: number;
  /** Store identifier, when the test came from a store */
  id?: string;
  description?: string;
  /** Tags used for filtering */
  tags?: string[];
  /** Provided by the loader */
  suiteName?: string;
}

/** Normalized result of one HTTP call. */
export interface ResponseSnapshot {
  statusCode: number;
  /** Case preserved as received; look up with `getHeader` */
  headers: Record<string, string>;
  /** Raw body decoded as UTF-8 */
  text: string;
  /** Parsed body, absent when the body is not JSON */
  json?: JsonValue;
  elapsedMs: number;
}

export interface AssertionResult {
  spec: AssertionSpec;
  passed: boolean;
  expectedValue: JsonValue;
  actualValue: JsonValue;
  /** Set only when the assertion could not be evaluated */
  error?: string;
  detail: string;
}

export interface SuiteOutcome {
  results: AssertionResult[];
  overallSuccess: boolean;
  passed: number;
  failed: number;
}

export type FailureKind = 'validation' | 'transport' | 'internal';

export interface TestExecutionResult {
  testDefinition: TestDefinition;
  /** Absent when the request never completed */
  responseSnapshot?: ResponseSnapshot;
  assertionResults: AssertionResult[];
  overallSuccess: boolean;
  elapsedSeconds: number;
  transportError?: string;
  failureKind?: FailureKind;
}

export interface BatchSummary {
  total: number;
  passed: number;
  failed: number;
  successRatePercent: number;
  totalElapsedSeconds: number;
  fastestSeconds: number;
  slowestSeconds: number;
}

export interface BatchResult {
  /** Same order as the input tests */
  results: TestExecutionResult[];
  summary: BatchSummary;
}

export interface Suite {
  name: string;
  tests: TestDefinition[];
  /** Path the suite was loaded from */
  loadPath?: string;
}
