import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { EventRecord } from '../../domain/event-record.js';
import type { EventSink } from '../../domain/sink.js';
import { getNumber } from '../../domain/value.js';

/** The slice of an ioredis client the sink uses. */
export interface StreamClient {
  xadd(key: string, ...args: Array<string | number>): Promise<string | null>;
  quit(): Promise<unknown>;
}

export interface RedisStreamSinkOptions {
  stream: string;
  /** Approximate stream length cap (`MAXLEN ~`); 0 disables trimming. */
  maxLen: number;
}

/**
 * Appends finished records to a Redis Stream.
 *
 * Uses `XADD` with auto-generated IDs. Stream values must be strings, so
 * the body and the metadata sidecar are JSON-serialized; `event_id` and
 * `class_uid` are copied out as plain fields so consumers can route
 * without decoding the body.
 */
export class RedisStreamSink implements EventSink {
  readonly name = 'redis_stream';
  private readonly client: StreamClient;
  private readonly options: RedisStreamSinkOptions;
  private readonly log: Logger;

  constructor(client: StreamClient, options: RedisStreamSinkOptions, log: Logger) {
    this.client = client;
    this.options = options;
    this.log = log;
  }

  async write(record: EventRecord): Promise<void> {
    const trim = this.options.maxLen > 0 ? ['MAXLEN', '~', this.options.maxLen] : [];
    const body = record.objectBody();
    const classUid = body ? getNumber(body, 'class_uid') : undefined;

    const entryId = await this.client.xadd(
      this.options.stream,
      ...trim,
      '*',
      'event_id', record.id,
      'class_uid', classUid?.ok ? String(classUid.value) : '',
      'body', JSON.stringify(record.body),
      'metadata', JSON.stringify(record.metadata()),
    );

    this.log.debug({ event_id: record.id, stream: this.options.stream, entryId }, 'Event appended to stream');
  }

  async close(): Promise<void> {
    await this.client.quit();
    this.log.info('Redis sink disconnected');
  }
}

/**
 * Connects a dedicated ioredis client and wraps it in a sink.
 */
export async function createRedisStreamSink(
  redisUrl: string,
  options: RedisStreamSinkOptions,
  log: Logger,
): Promise<RedisStreamSink> {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  log.info({ stream: options.stream }, 'Redis sink connected');

  return new RedisStreamSink(redis, options, log);
}
