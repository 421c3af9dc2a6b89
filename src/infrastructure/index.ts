export { loadPipelineConfig, ConfigError, parseSections } from './config/index.js';
export type { PipelineConfig, SinkConfig, LoadConfigOptions, ConfigSections } from './config/index.js';
export { HttpLookupClient, buildLookupUrl } from './http/lookup-client.js';
export type { HttpLookupClientOptions, LookupFetch, LookupRequestInit, LookupResponse } from './http/lookup-client.js';
export { createSink, LogSink, RedisStreamSink, createRedisStreamSink } from './sinks/index.js';
export type { StreamClient, RedisStreamSinkOptions } from './sinks/index.js';
