import type { JsonObject } from './value.js';

export interface LookupOptions {
  /** Per-call budget; the call is abandoned and fails once it elapses. */
  readonly timeoutMs: number;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Fetch-and-decode access to an enrichment service.
 *
 * `lookup(endpoint, key)` issues `GET <endpoint>/<key>` and resolves to the
 * decoded JSON object, or rejects with a `LookupError`.
 */
export interface LookupClient {
  lookup(endpoint: string, key: string, options: LookupOptions): Promise<JsonObject>;
  /** Releases pooled connections, where the client holds any. */
  close?(): Promise<void>;
}
