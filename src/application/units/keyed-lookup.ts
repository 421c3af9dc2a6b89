import type { LookupClient } from '../../domain/lookup.js';
import type { JsonObject } from '../../domain/value.js';
import { resolveStringPath } from '../../domain/value.js';
import { LookupError, errorMessage } from '../../domain/errors.js';

/** Settings shared by the enrichers that look up one key per record. */
export interface KeyedEnricherConfig {
  /** Base URL; the key is appended as one path segment. */
  endpoint: string;
  /** Dotted path to the key, e.g. `device.uid`. */
  idField: string;
  timeoutMs: number;
}

export type KeyedLookupResult =
  | { readonly kind: 'no_key'; readonly reason: 'missing' | 'type_mismatch' }
  | { readonly kind: 'failed'; readonly key: string; readonly error: LookupError }
  | { readonly kind: 'found'; readonly key: string; readonly data: JsonObject };

/**
 * Resolves `config.idField` on the body and, when it is a non-empty string,
 * looks it up. Never throws: every outcome is a variant of the result.
 */
export async function lookupByField(
  client: LookupClient,
  config: KeyedEnricherConfig,
  body: JsonObject,
  signal: AbortSignal | undefined,
): Promise<KeyedLookupResult> {
  const key = resolveStringPath(body, config.idField);
  if (!key.ok) {
    return { kind: 'no_key', reason: key.reason };
  }

  try {
    const data = await client.lookup(config.endpoint, key.value, {
      timeoutMs: config.timeoutMs,
      signal,
    });
    return { kind: 'found', key: key.value, data };
  } catch (err: unknown) {
    const error = err instanceof LookupError
      ? err
      : new LookupError(config.endpoint, errorMessage(err), { cause: err });
    return { kind: 'failed', key: key.value, error };
  }
}
