import type { ReadableStream } from 'node:stream/web';
import { Agent, fetch as undiciFetch } from 'undici';
import type { LookupClient, LookupOptions } from '../../domain/lookup.js';
import type { JsonObject } from '../../domain/value.js';
import { isJsonObject } from '../../domain/value.js';
import { LookupError, errorMessage } from '../../domain/errors.js';

/** Max characters of an error response body kept for diagnostics. */
const ERROR_BODY_LIMIT = 1024;

/** The subset of a fetch Response the client reads. */
export interface LookupResponse {
  readonly status: number;
  /** Streamed body; error bodies are read from here up to the limit. */
  readonly body?: ReadableStream<Uint8Array> | null;
  text(): Promise<string>;
}

export interface LookupRequestInit {
  readonly method: 'GET';
  readonly headers: Record<string, string>;
  readonly signal: AbortSignal;
}

export type LookupFetch = (url: string, init: LookupRequestInit) => Promise<LookupResponse>;

export interface HttpLookupClientOptions {
  /** Max connections per origin (default: 10) */
  connections?: number;
  /** Keep-alive timeout in milliseconds (default: 30000) */
  keepAliveTimeout?: number;
  /** Replaces the pooled undici fetch, mainly for tests. */
  fetch?: LookupFetch;
}

const DEFAULTS = {
  connections: 10,
  keepAliveTimeout: 30_000,
};

/** Joins an endpoint and a key into `<endpoint>/<key>`, encoding the key as one path segment. */
export function buildLookupUrl(endpoint: string, key: string): string {
  return `${endpoint.replace(/\/+$/, '')}/${encodeURIComponent(key)}`;
}

/**
 * Lookup client backed by one undici connection pool.
 *
 * Constructed once by the composition root and shared by every
 * enrichment unit; there is no process-wide client.
 *
 * Failure modes, all rejected as `LookupError`:
 * - status >= 400: "http status <code>: <first 1KB of body>"
 * - body not JSON, `null`, or not an object: "empty body" / "invalid JSON body"
 * - timeout: "timeout after <ms>ms"
 * - transport error: the underlying message
 */
export class HttpLookupClient implements LookupClient {
  private readonly agent: Agent;
  private readonly fetchFn: LookupFetch;
  private closed = false;

  constructor(options: HttpLookupClientOptions = {}) {
    const opts = { ...DEFAULTS, ...options };
    this.agent = new Agent({
      connections: opts.connections,
      keepAliveTimeout: opts.keepAliveTimeout,
    });
    this.fetchFn = options.fetch
      ?? ((url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }));
  }

  async lookup(endpoint: string, key: string, options: LookupOptions): Promise<JsonObject> {
    const url = buildLookupUrl(endpoint, key);
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);

    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      if (response.status >= 400) {
        const prefix = await readPrefix(response, ERROR_BODY_LIMIT);
        throw new LookupError(
          url,
          `http status ${response.status}: ${prefix}`,
          { status: response.status },
        );
      }

      return decodeObject(url, await response.text());
    } catch (err: unknown) {
      if (err instanceof LookupError) throw err;
      if (timedOut) {
        throw new LookupError(url, `timeout after ${options.timeoutMs}ms`, { cause: err });
      }
      throw new LookupError(url, errorMessage(err), { cause: err });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /** Drains pooled connections. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.agent.close();
  }
}

/**
 * Reads at most `limit` characters of the body, then cancels the rest of
 * the stream. Falls back to `text()` when the response exposes no stream.
 */
async function readPrefix(response: LookupResponse, limit: number): Promise<string> {
  if (!response.body) {
    return (await response.text()).slice(0, limit);
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';

  try {
    while (text.length < limit) {
      const chunk = await reader.read();
      if (chunk.done) break;
      text += decoder.decode(chunk.value, { stream: true });
    }
  } finally {
    await reader.cancel();
  }

  return text.slice(0, limit);
}

function decodeObject(url: string, text: string): JsonObject {
  if (text.trim() === '') {
    throw new LookupError(url, 'empty body');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    throw new LookupError(url, `invalid JSON body: ${errorMessage(err)}`, { cause: err });
  }

  if (!isJsonObject(parsed)) {
    throw new LookupError(url, 'empty body');
  }
  return parsed;
}
