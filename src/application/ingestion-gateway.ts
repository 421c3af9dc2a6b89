import type { Logger } from 'pino';
import { EventRecord, RECEIVED_AT_KEY } from '../domain/event-record.js';
import {
  BatchTooLargeError,
  GatewayClosedError,
  QueueFullError,
} from '../domain/errors.js';
import { BoundedBuffer } from './event-buffer.js';
import type { PollResult } from './event-buffer.js';
import { decodeSubmission } from './submission-schema.js';

export interface IngestionGatewayOptions {
  /** Max events per submission; larger submissions are rejected whole. */
  maxBatchSize: number;
  /** Bounded buffer capacity. */
  capacity: number;
  /** Injectable clock for deterministic tests. */
  now?: () => Date;
}

export interface SubmissionResult {
  readonly accepted: number;
  /** RFC 3339 time the submission was accepted. */
  readonly received: string;
}

export type RecordPollResult = PollResult<EventRecord>;

/**
 * Front door of the pipeline.
 *
 * Decodes submissions, enforces the batch limit and feeds the bounded
 * buffer that chain workers drain. Backpressure is synchronous: a full
 * buffer makes `submit()` throw `QueueFullError` immediately.
 *
 * Partial acceptance is kept: events of a submission that made it into
 * the buffer before it filled up are not rolled back.
 */
export class IngestionGateway {
  private readonly buffer: BoundedBuffer<EventRecord>;
  private readonly maxBatchSize: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private closing = false;

  constructor(options: IngestionGatewayOptions, log: Logger) {
    if (!Number.isInteger(options.maxBatchSize) || options.maxBatchSize < 1) {
      throw new RangeError(`maxBatchSize must be a positive integer, got ${options.maxBatchSize}`);
    }
    this.buffer = new BoundedBuffer<EventRecord>(options.capacity);
    this.maxBatchSize = options.maxBatchSize;
    this.now = options.now ?? (() => new Date());
    this.log = log;
  }

  get size(): number {
    return this.buffer.size;
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  get accepting(): boolean {
    return !this.closing;
  }

  /**
   * Decode → size check → enqueue, in that order.
   *
   * @throws MalformedInputError  body is not an object or array of objects
   * @throws BatchTooLargeError   more events than `maxBatchSize`; nothing enqueued
   * @throws QueueFullError       buffer filled up; `accepted` events stay enqueued
   * @throws GatewayClosedError   shutdown has begun
   */
  submit(payload: string | Buffer): SubmissionResult {
    if (this.closing) throw new GatewayClosedError();

    const events = decodeSubmission(payload);

    if (events.length > this.maxBatchSize) {
      this.log.warn(
        { count: events.length, max_batch_size: this.maxBatchSize },
        'Batch size exceeds maximum',
      );
      throw new BatchTooLargeError(this.maxBatchSize, events.length);
    }

    let accepted = 0;
    for (const body of events) {
      // Timestamp reflects entry into the buffer, not decode time
      const record = new EventRecord(body, [[RECEIVED_AT_KEY, toRfc3339(this.now())]]);
      if (!this.buffer.offer(record)) {
        this.log.warn(
          { accepted, total: events.length, capacity: this.buffer.capacity },
          `Event queue full, accepted ${accepted}/${events.length} events`,
        );
        throw new QueueFullError(accepted, events.length);
      }
      accepted++;
    }

    this.log.debug({ accepted }, 'Events accepted');
    return { accepted, received: toRfc3339(this.now()) };
  }

  /** Next record, `empty` after `timeoutMs`, or `cancelled`. */
  poll(timeoutMs: number, signal?: AbortSignal): Promise<RecordPollResult> {
    return this.buffer.poll(timeoutMs, signal);
  }

  /**
   * Stops accepting, lets consumers drain for up to `drainTimeoutMs`, then
   * releases the buffer. Returns how many events were left undrained.
   */
  async shutdown(drainTimeoutMs: number): Promise<number> {
    if (this.closing && this.buffer.isClosed) return 0;
    this.closing = true;
    this.log.info({ pending: this.buffer.size }, 'Ingestion gateway shutting down');

    const drained = await this.buffer.waitUntilEmpty(drainTimeoutMs);
    this.buffer.close();
    const leftover = this.buffer.clear();

    if (drained) {
      this.log.info('Ingestion buffer drained');
    } else {
      this.log.warn({ leftover, drain_timeout_ms: drainTimeoutMs }, 'Ingestion buffer not drained before timeout');
    }
    return leftover;
  }
}

/** RFC 3339 with second precision and `Z`, e.g. `2026-02-18T12:00:00Z`. */
export function toRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
