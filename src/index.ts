export { evaluate, getHeader, schemaViolations, ASSERTION_TYPES } from './assertions';
export { runSuite } from './suite-runner';
export { HttpClient, toTransportError } from './http-client';
export type { FetchFn, HttpClientConfig, RequestExecutor } from './http-client';
export { runBatch, executeTest, summarize, DEFAULT_CONCURRENCY } from './orchestrator';
export type { BatchOptions } from './orchestrator';
export { parseTestDefinition, parseAssertion, validateDefinition, DEFAULT_TIMEOUT_SECONDS } from './definition';
export { resolvePath } from './json-path';
export { suggestAssertions, suggestTests, categorizeEndpoint } from './suggestions';
export type { AssertionSuggestion, Confidence, EndpointInfo, TestSuggestion } from './suggestions';
export { TestStore } from './store';
export type { StoredTest, TestStatistics, TestExport, ImportOutcome, MergeStrategy } from './store';
export { fromPostmanCollection, isPostmanCollection } from './postman';
export { PluginHost } from './plugin-host';
export type { Plugin, PluginContext } from './plugin-api';
export {
  ProbeError,
  TransportError,
  EvaluationError,
  ValidationError,
  ConfigurationError,
} from './errors';
export type { TransportErrorCode } from './errors';
export type * from './types';
