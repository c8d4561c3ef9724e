import type { FetchFn, RequestExecutor } from '../src/http-client';
import type { JsonValue, ResponseSnapshot, TestDefinition } from '../src/types';

export function snapshot(overrides: Partial<ResponseSnapshot> = {}): ResponseSnapshot {
  return {
    statusCode: 200,
    headers: { 'content-type': 'application/json; charset=utf-8' },
    text: '{}',
    json: {},
    elapsedMs: 120,
    ...overrides,
  };
}

export function jsonSnapshot(body: JsonValue, overrides: Partial<ResponseSnapshot> = {}): ResponseSnapshot {
  return snapshot({ text: JSON.stringify(body), json: body, ...overrides });
}

export function definition(overrides: Partial<TestDefinition> = {}): TestDefinition {
  return {
    name: 'ok',
    method: 'GET',
    url: 'https://example.test/ok',
    headers: {},
    assertions: [],
    timeoutSeconds: 30,
    ...overrides,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/** Executor that answers from a per-url table, optionally after a delay. */
export function tableExecutor(
  table: Record<string, { snapshot?: ResponseSnapshot; error?: Error; delayMs?: number }>
): RequestExecutor & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async execute(test) {
      calls.push(test.url);
      const entry = table[test.url];
      if (!entry) throw new Error(`no stub for ${test.url}`);
      if (entry.delayMs) await delay(entry.delayMs);
      if (entry.error) throw entry.error;
      return entry.snapshot ?? snapshot();
    },
  };
}

export interface CapturedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * Fetch stand-in: records requests and answers with the handler's Response.
 * Honors the abort signal the client passes.
 */
export function stubFetch(handler: (req: CapturedRequest) => Response | Promise<Response>): FetchFn & {
  requests: CapturedRequest[];
} {
  const requests: CapturedRequest[] = [];
  const fn = async (input: Request, init?: RequestInit): Promise<Response> => {
    const headers: Record<string, string> = {};
    input.headers.forEach((value, key) => {
      headers[key] = value;
    });
    const captured: CapturedRequest = {
      url: input.url,
      method: input.method,
      headers,
      body: await input.text(),
    };
    requests.push(captured);
    const signal = init?.signal;
    return await new Promise<Response>((resolve, reject) => {
      if (signal) {
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      }
      Promise.resolve(handler(captured)).then(resolve, reject);
    });
  };
  return Object.assign(fn, { requests });
}

export function jsonResponse(body: JsonValue, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}
