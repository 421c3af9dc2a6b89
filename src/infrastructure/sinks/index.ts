import type { Logger } from 'pino';
import type { EventSink } from '../../domain/sink.js';
import type { SinkConfig } from '../config/pipeline-config.js';
import { LogSink } from './log-sink.js';
import { createRedisStreamSink } from './redis-stream-sink.js';

export { LogSink } from './log-sink.js';
export { RedisStreamSink, createRedisStreamSink } from './redis-stream-sink.js';
export type { StreamClient, RedisStreamSinkOptions } from './redis-stream-sink.js';

/** Builds the configured sink. */
export async function createSink(config: SinkConfig, log: Logger): Promise<EventSink> {
  const sinkLog = log.child({ sink: config.type });
  if (config.type === 'redis') {
    return createRedisStreamSink(config.url, { stream: config.stream, maxLen: config.maxLen }, sinkLog);
  }
  return new LogSink(sinkLog);
}
