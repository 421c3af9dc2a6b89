import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { ChainConfig } from '../../application/units/registry.js';
import { UNIT_NAMES } from '../../application/units/registry.js';
import { DEFAULT_TAG_FIELDS } from '../../application/units/payload-tagger.js';
import type { WorkerPoolOptions } from '../../application/pipeline-worker.js';
import type { ConfigSections } from './sections.js';
import { parseSections } from './sections.js';

export type SinkConfig =
  | { readonly type: 'log' }
  | { readonly type: 'redis'; readonly url: string; readonly stream: string; readonly maxLen: number };

export interface PipelineConfig {
  server: { host: string; port: number; bodyLimit: number; logLevel: string };
  ingest: {
    path: string;
    maxBatchSize: number;
    capacity: number;
    pollTimeoutMs: number;
    drainTimeoutMs: number;
  };
  workers: WorkerPoolOptions;
  lookup: { connections: number; keepAliveTimeoutMs: number };
  chain: ChainConfig;
  sink: SinkConfig;
}

const positiveInt = z.coerce.number().int().positive();

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((v) => v === 'true'),
]);

const stringList = z.array(z.string());

const enricherSection = z.object({
  endpoint: z.string().default(''),
  id_field: z.string().min(1).optional(),
  timeout_ms: positiveInt.default(5000),
});

const rawConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(8080),
    body_limit: positiveInt.default(1_048_576),
    log_level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }).default({}),
  ingest: z.object({
    path: z.string().startsWith('/').default('/events'),
    max_batch_size: positiveInt.default(100),
    capacity: positiveInt.default(100),
    poll_timeout_ms: positiveInt.default(30_000),
    drain_timeout_ms: positiveInt.default(10_000),
  }).default({}),
  pipeline: z.object({
    workers: positiveInt.default(4),
    failure_policy: z.enum(['drop', 'retry']).default('drop'),
    max_retries: z.coerce.number().int().min(0).default(2),
    propagate_cancellation: booleanish.default(false),
    processors: z.array(z.enum(UNIT_NAMES)).default(['category_filter', 'payload_tagger']),
  }).default({}),
  lookup: z.object({
    connections: positiveInt.default(10),
    keep_alive_timeout_ms: positiveInt.default(30_000),
  }).default({}),
  asset_enricher: enricherSection.default({}),
  user_enricher: enricherSection.default({}),
  threat_intel_enricher: enricherSection.omit({ id_field: true }).extend({
    types: z.array(z.coerce.number().int().nonnegative()).optional(),
  }).default({}),
  category_filter: z.object({
    field: z.string().min(1).default('category'),
    include: stringList.default([]),
    exclude: stringList.default([]),
  }).default({}),
  payload_tagger: z.object({
    tag_fields: stringList.default([...DEFAULT_TAG_FIELDS]),
    add_timestamp_tag: booleanish.default(true),
    add_source_tag: booleanish.default(false),
  }).default({}),
  sink: z.object({
    type: z.enum(['log', 'redis']).default('log'),
    redis_url: z.string().default(''),
    stream: z.string().min(1).default('events_processed'),
    max_len: z.coerce.number().int().min(0).default(0),
  }).default({}),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

/** Environment variables that override file settings: env name → [section, key]. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string, string]> = [
  ['HOST', 'server', 'host'],
  ['PORT', 'server', 'port'],
  ['LOG_LEVEL', 'server', 'log_level'],
  ['INGEST_MAX_BATCH_SIZE', 'ingest', 'max_batch_size'],
  ['INGEST_CAPACITY', 'ingest', 'capacity'],
  ['PIPELINE_WORKERS', 'pipeline', 'workers'],
  ['REDIS_URL', 'sink', 'redis_url'],
];

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Config file path (default: `$PIPELINE_CONFIG` or `config/pipeline.yaml`). */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads config/pipeline.yaml, applies environment overrides and validates.
 *
 * A missing file means "all defaults". Invalid values throw `ConfigError`
 * listing every zod issue.
 */
export function loadPipelineConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const filePath = options.path
    ?? env['PIPELINE_CONFIG']
    ?? resolve(process.cwd(), 'config', 'pipeline.yaml');

  const sections = applyEnvOverrides(readSections(filePath), env);
  const parsed = rawConfigSchema.safeParse(sections);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid pipeline config (${filePath}): ${issues}`, { cause: parsed.error });
  }

  return toPipelineConfig(parsed.data);
}

function readSections(filePath: string): ConfigSections {
  try {
    return parseSections(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    if (isNotFound(err)) return {};
    throw new ConfigError(`Failed to read pipeline config (${filePath})`, { cause: err });
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function applyEnvOverrides(sections: ConfigSections, env: NodeJS.ProcessEnv): ConfigSections {
  const merged: ConfigSections = {};
  for (const [name, values] of Object.entries(sections)) {
    merged[name] = { ...values };
  }

  for (const [envName, sectionName, key] of ENV_OVERRIDES) {
    const value = env[envName];
    if (value === undefined || value === '') continue;
    const section = merged[sectionName] ?? {};
    section[key] = value;
    merged[sectionName] = section;
  }

  // A Redis URL alone is enough to switch the sink over
  const sink = merged['sink'];
  if (sink && typeof sink['redis_url'] === 'string' && sink['redis_url'] !== '' && sink['type'] === undefined) {
    sink['type'] = 'redis';
  }

  return merged;
}

function toPipelineConfig(raw: RawConfig): PipelineConfig {
  const sink: SinkConfig = raw.sink.type === 'redis'
    ? { type: 'redis', url: raw.sink.redis_url || 'redis://localhost:6379', stream: raw.sink.stream, maxLen: raw.sink.max_len }
    : { type: 'log' };

  return {
    server: {
      host: raw.server.host,
      port: raw.server.port,
      bodyLimit: raw.server.body_limit,
      logLevel: raw.server.log_level,
    },
    ingest: {
      path: raw.ingest.path,
      maxBatchSize: raw.ingest.max_batch_size,
      capacity: raw.ingest.capacity,
      pollTimeoutMs: raw.ingest.poll_timeout_ms,
      drainTimeoutMs: raw.ingest.drain_timeout_ms,
    },
    workers: {
      workers: raw.pipeline.workers,
      pollTimeoutMs: raw.ingest.poll_timeout_ms,
      failurePolicy: raw.pipeline.failure_policy,
      maxRetries: raw.pipeline.max_retries,
      propagateCancellation: raw.pipeline.propagate_cancellation,
    },
    lookup: {
      connections: raw.lookup.connections,
      keepAliveTimeoutMs: raw.lookup.keep_alive_timeout_ms,
    },
    chain: {
      processors: raw.pipeline.processors,
      asset_enricher: keyedSection(raw.asset_enricher, 'device.uid'),
      user_enricher: keyedSection(raw.user_enricher, 'user.uid'),
      threat_intel_enricher: raw.threat_intel_enricher.endpoint === ''
        ? undefined
        : {
          endpoint: raw.threat_intel_enricher.endpoint,
          timeoutMs: raw.threat_intel_enricher.timeout_ms,
          types: raw.threat_intel_enricher.types,
        },
      category_filter: {
        field: raw.category_filter.field,
        include: raw.category_filter.include,
        exclude: raw.category_filter.exclude,
      },
      payload_tagger: {
        tagFields: raw.payload_tagger.tag_fields,
        addTimestampTag: raw.payload_tagger.add_timestamp_tag,
        addSourceTag: raw.payload_tagger.add_source_tag,
      },
    },
    sink,
  };
}

function keyedSection(
  section: RawConfig['asset_enricher'],
  defaultIdField: string,
): ChainConfig['asset_enricher'] {
  if (section.endpoint === '') return undefined;
  return {
    endpoint: section.endpoint,
    idField: section.id_field ?? defaultIdField,
    timeoutMs: section.timeout_ms,
  };
}
