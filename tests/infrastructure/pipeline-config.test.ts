import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, loadPipelineConfig } from '../../src/infrastructure/config/pipeline-config.js';
import { parseSections } from '../../src/infrastructure/config/sections.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../config/pipeline.yaml', import.meta.url));

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'pipeline-config-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

// ── parseSections ────────────────────────────────────────

describe('parseSections', () => {
  it('reads sections, scalars and both list styles', () => {
    const sections = parseSections([
      '# comment',
      'server:',
      '  port: 8080',
      '  host: "127.0.0.1"',
      'pipeline:',
      '  propagate_cancellation: true',
      '  processors:',
      '    - category_filter',
      '    - payload_tagger',
      'category_filter:',
      "  include: [security, 'audit']",
      '  exclude: []',
    ].join('\n'));

    expect(sections).toEqual({
      server: { port: '8080', host: '127.0.0.1' },
      pipeline: { propagate_cancellation: true, processors: ['category_filter', 'payload_tagger'] },
      category_filter: { include: ['security', 'audit'], exclude: [] },
    });
  });
});

// ── loadPipelineConfig ───────────────────────────────────

describe('loadPipelineConfig', () => {
  it('falls back to defaults when the file is missing', () => {
    const config = loadPipelineConfig({ path: join(dir, 'absent.yaml'), env: {} });

    expect(config.server).toEqual({ host: '0.0.0.0', port: 8080, bodyLimit: 1_048_576, logLevel: 'info' });
    expect(config.ingest).toEqual({
      path: '/events',
      maxBatchSize: 100,
      capacity: 100,
      pollTimeoutMs: 30_000,
      drainTimeoutMs: 10_000,
    });
    expect(config.workers).toEqual({
      workers: 4,
      pollTimeoutMs: 30_000,
      failurePolicy: 'drop',
      maxRetries: 2,
      propagateCancellation: false,
    });
    expect(config.chain.processors).toEqual(['category_filter', 'payload_tagger']);
    expect(config.chain.asset_enricher).toBeUndefined();
    expect(config.sink).toEqual({ type: 'log' });
  });

  it('loads the shipped config', () => {
    const config = loadPipelineConfig({ path: SHIPPED_CONFIG, env: {} });

    expect(config.chain.processors).toEqual([
      'asset_enricher',
      'user_enricher',
      'threat_intel_enricher',
      'category_filter',
      'payload_tagger',
    ]);
    expect(config.chain.asset_enricher).toEqual({
      endpoint: 'http://localhost:1080/api/assets',
      idField: 'device.uid',
      timeoutMs: 5000,
    });
    expect(config.chain.threat_intel_enricher?.types).toEqual([1, 2, 4, 5, 7, 8, 23]);
    expect(config.chain.payload_tagger).toEqual({
      tagFields: ['class_uid', 'severity_id', 'category_uid'],
      addTimestampTag: true,
      addSourceTag: true,
    });
    expect(config.sink).toEqual({ type: 'log' });
  });

  it('defaults enricher id fields', () => {
    const path = writeConfig('ids.yaml', [
      'asset_enricher:',
      '  endpoint: http://assets.test',
      'user_enricher:',
      '  endpoint: http://users.test',
    ].join('\n'));
    const config = loadPipelineConfig({ path, env: {} });

    expect(config.chain.asset_enricher?.idField).toBe('device.uid');
    expect(config.chain.user_enricher?.idField).toBe('user.uid');
  });

  it('applies environment overrides', () => {
    const path = writeConfig('env.yaml', 'server:\n  port: 8080\n');
    const config = loadPipelineConfig({
      path,
      env: { PORT: '9090', INGEST_MAX_BATCH_SIZE: '50', PIPELINE_WORKERS: '8', LOG_LEVEL: 'debug' },
    });

    expect(config.server.port).toBe(9090);
    expect(config.server.logLevel).toBe('debug');
    expect(config.ingest.maxBatchSize).toBe(50);
    expect(config.workers.workers).toBe(8);
  });

  it('switches to the Redis sink when only REDIS_URL is given', () => {
    const config = loadPipelineConfig({
      path: join(dir, 'absent.yaml'),
      env: { REDIS_URL: 'redis://cache.test:6379' },
    });

    expect(config.sink).toEqual({
      type: 'redis',
      url: 'redis://cache.test:6379',
      stream: 'events_processed',
      maxLen: 0,
    });
  });

  it('keeps an explicit log sink even when REDIS_URL is set', () => {
    const path = writeConfig('log-sink.yaml', 'sink:\n  type: log\n');
    const config = loadPipelineConfig({ path, env: { REDIS_URL: 'redis://cache.test:6379' } });
    expect(config.sink).toEqual({ type: 'log' });
  });

  it('reads the path from PIPELINE_CONFIG', () => {
    const path = writeConfig('from-env.yaml', 'ingest:\n  capacity: 7\n');
    expect(loadPipelineConfig({ env: { PIPELINE_CONFIG: path } }).ingest.capacity).toBe(7);
  });

  it('rejects invalid values with every issue listed', () => {
    const path = writeConfig('bad.yaml', [
      'ingest:',
      '  max_batch_size: 0',
      'pipeline:',
      '  processors: [category_filter, enrich_everything]',
    ].join('\n'));

    expect(() => loadPipelineConfig({ path, env: {} })).toThrow(ConfigError);
    expect(() => loadPipelineConfig({ path, env: {} })).toThrow(/ingest\.max_batch_size/);
    expect(() => loadPipelineConfig({ path, env: {} })).toThrow(/pipeline\.processors\.1/);
  });
});
