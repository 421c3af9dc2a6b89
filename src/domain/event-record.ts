import { randomUUID } from 'node:crypto';
import type { JsonObject, JsonValue } from './value.js';
import { cloneJsonObject, getObject, getString, isJsonObject } from './value.js';

/** Metadata key holding the time an event entered the ingestion buffer. */
export const RECEIVED_AT_KEY = 'http.received_at';

/** Serializable form handed to sinks. */
export interface SinkRecord {
  readonly body: JsonValue;
  readonly metadata: Record<string, string>;
}

/**
 * One in-flight event: its JSON body plus a metadata sidecar.
 *
 * The body is mutated in place by units. The sidecar behaves like
 * message headers: string keys to string values, written by units,
 * carried to the sink, never part of the body itself.
 *
 * `id` is `metadata.uid` when the body carries one, otherwise a
 * generated UUID used only for log correlation.
 */
export class EventRecord {
  readonly id: string;
  body: JsonValue;
  private readonly meta: Map<string, string>;

  constructor(body: JsonValue, metadata?: Iterable<readonly [string, string]>) {
    this.body = body;
    this.meta = new Map(metadata);
    this.id = eventUid(body) ?? randomUUID();
  }

  /** The body when it is a mapping, otherwise `undefined`. */
  objectBody(): JsonObject | undefined {
    return isJsonObject(this.body) ? this.body : undefined;
  }

  setMeta(key: string, value: string): void {
    this.meta.set(key, value);
  }

  getMeta(key: string): string | undefined {
    return this.meta.get(key);
  }

  metadata(): Record<string, string> {
    return Object.fromEntries(this.meta);
  }

  /** Independent copy (body and sidecar); used to replay a record from its ingested state. */
  clone(): EventRecord {
    const body = isJsonObject(this.body) ? cloneJsonObject(this.body) : this.body;
    return new EventRecord(body, this.meta);
  }

  toJSON(): SinkRecord {
    return { body: this.body, metadata: this.metadata() };
  }
}

/** `metadata.uid` of an OCSF event, when present as a string. */
export function eventUid(body: JsonValue): string | undefined {
  if (!isJsonObject(body)) return undefined;
  const metadata = getObject(body, 'metadata');
  if (!metadata.ok) return undefined;
  const uid = getString(metadata.value, 'uid');
  return uid.ok ? uid.value : undefined;
}

/**
 * Appends tags to the body's `tags` array.
 *
 * Existing entries are kept in order; a `tags` value that is not an
 * array is replaced by a fresh array.
 */
export function appendTags(body: JsonObject, tags: readonly string[]): void {
  if (tags.length === 0) return;
  const existing = body['tags'];
  const next: JsonValue[] = Array.isArray(existing) ? existing : [];
  next.push(...tags);
  body['tags'] = next;
}
