import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { LookupClient, LookupOptions } from '../src/domain/lookup.js';
import type { EventSink } from '../src/domain/sink.js';
import type { EventRecord } from '../src/domain/event-record.js';
import type { JsonObject } from '../src/domain/value.js';
import { LookupError } from '../src/domain/errors.js';

/** vi.fn()-backed logger; `child()` returns the same instance so calls stay observable. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export interface LookupCall {
  endpoint: string;
  key: string;
  options: LookupOptions;
}

/**
 * In-memory lookup service keyed by `<endpoint>/<key>`.
 * Unknown keys reject with a 404-style LookupError.
 */
export class FakeLookupClient implements LookupClient {
  readonly calls: LookupCall[] = [];
  private readonly entries = new Map<string, JsonObject | Error>();

  set(endpoint: string, key: string, value: JsonObject | Error): this {
    this.entries.set(`${endpoint}/${key}`, value);
    return this;
  }

  async lookup(endpoint: string, key: string, options: LookupOptions): Promise<JsonObject> {
    this.calls.push({ endpoint, key, options });
    const url = `${endpoint}/${key}`;
    const entry = this.entries.get(url);
    if (entry === undefined) {
      throw new LookupError(url, 'http status 404: not found', { status: 404 });
    }
    if (entry instanceof Error) throw entry;
    return structuredClone(entry);
  }
}

/** Collects written records; optionally fails every write. */
export class MemorySink implements EventSink {
  readonly name = 'memory';
  readonly records: EventRecord[] = [];
  failWith: Error | undefined;
  closed = false;

  async write(record: EventRecord): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Fixed clock for deterministic `http.received_at` values. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00.250Z');
