import { TransportError, ValidationError, errorMessage } from './errors';
import type { PluginHost } from './plugin-host';
import type { JsonValue, ResponseSnapshot, TestDefinition } from './types';

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

/** Largest delay setTimeout honours; longer ones fire immediately. */
const MAX_TIMER_MS = 2 ** 31 - 1;

export type FetchFn = (input: Request, init?: RequestInit) => Promise<Response>;

/** Anything that can turn a test definition into a response snapshot. */
export interface RequestExecutor {
  execute(test: TestDefinition): Promise<ResponseSnapshot>;
}

export interface HttpClientConfig {
  /** Relative test urls resolve against this */
  baseURL?: string;
  pluginHost?: PluginHost;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

function errorCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined;
  for (const candidate of [cause, error]) {
    if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
      return candidate.code;
    }
  }
  return undefined;
}

export function toTransportError(error: unknown, url: string, timedOut: boolean): TransportError {
  if (error instanceof TransportError) return error;
  if (timedOut) return new TransportError('timeout', 'timeout', url);
  switch (errorCode(error)) {
    case 'ECONNREFUSED':
      return new TransportError('connection refused', 'connection_refused', url);
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return new TransportError(`dns lookup failed for ${new URL(url).hostname}`, 'dns', url);
    case 'ECONNRESET':
    case 'UND_ERR_SOCKET':
      return new TransportError('connection reset', 'reset', url);
    case 'ETIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
      return new TransportError('timeout', 'timeout', url);
    default: {
      const cause = error instanceof Error && error.cause !== undefined ? `: ${errorMessage(error.cause)}` : '';
      return new TransportError(`${errorMessage(error)}${cause}`, 'network', url);
    }
  }
}

export class HttpClient implements RequestExecutor {
  private baseURL?: string;
  private headers: Record<string, string>;
  private pluginHost?: PluginHost;
  private fetchFn: FetchFn;

  constructor(config: HttpClientConfig = {}) {
    this.baseURL = config.baseURL;
    this.pluginHost = config.pluginHost;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.headers = {};
  }

  public setHeader(key: string, value: string): void {
    this.headers[key] = value;
  }

  public resolveUrl(url: string): string {
    try {
      return new URL(url, this.baseURL).toString();
    } catch {
      throw new ValidationError(
        this.baseURL ? `invalid url '${url}'` : `invalid url '${url}' (relative urls need a base url)`
      );
    }
  }

  private encodeBody(test: TestDefinition, headers: Headers): string | undefined {
    if (test.body === undefined || test.body === null || !BODY_METHODS.has(test.method)) return undefined;
    if (typeof test.body === 'string') return test.body;
    if (!headers.has('content-type')) {
      headers.set('Content-Type', 'application/json');
    }
    return JSON.stringify(test.body);
  }

  /**
   * Send the request for one test and snapshot the response.
   * Rejects with TransportError when no response arrives in time.
   */
  public async execute(test: TestDefinition): Promise<ResponseSnapshot> {
    const url = this.resolveUrl(test.url);
    const headers = new Headers(this.headers);
    for (const [name, value] of Object.entries(test.headers)) {
      headers.set(name, value);
    }
    const body = this.encodeBody(test, headers);

    const initialRequest = new Request(url, {
      method: test.method,
      headers,
      body,
    });

    const request = this.pluginHost
      ? await this.pluginHost.transformRequest(initialRequest)
      : initialRequest;

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, Math.min(test.timeoutSeconds * 1000, MAX_TIMER_MS));

    const start = performance.now();
    try {
      const response = await this.fetchFn(request, { signal: controller.signal });
      const text = await response.text();
      const elapsedMs = Math.round(performance.now() - start);

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      let json: JsonValue | undefined;
      if (text.trim() !== '') {
        try {
          json = JSON.parse(text);
        } catch {
          // not JSON; JSON assertions report it
        }
      }

      return {
        statusCode: response.status,
        headers: responseHeaders,
        text,
        json,
        elapsedMs,
      };
    } catch (error) {
      throw toTransportError(error, url, controller.signal.aborted);
    } finally {
      clearTimeout(timeout);
    }
  }
}
