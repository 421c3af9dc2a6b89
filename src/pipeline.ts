import type { Logger } from 'pino';
import type { PipelineConfig } from './infrastructure/config/index.js';
import type { LookupClient } from './domain/lookup.js';
import type { EventSink } from './domain/sink.js';
import { IngestionGateway } from './application/ingestion-gateway.js';
import { ProcessorChain } from './application/processor-chain.js';
import { PipelineStats } from './application/pipeline-stats.js';
import { PipelineWorkerPool } from './application/pipeline-worker.js';
import { buildUnits } from './application/units/registry.js';
import { HttpLookupClient } from './infrastructure/http/lookup-client.js';
import { createSink } from './infrastructure/sinks/index.js';

export interface PipelineOverrides {
  /** Replaces the pooled HTTP lookup client. */
  client?: LookupClient;
  /** Replaces the configured sink. */
  sink?: EventSink;
}

export interface Pipeline {
  readonly gateway: IngestionGateway;
  readonly chain: ProcessorChain;
  readonly pool: PipelineWorkerPool;
  readonly stats: PipelineStats;
  start(): void;
  /**
   * Stops intake, drains the buffer, stops workers and releases
   * units, lookup client and sink, in that order. Safe to call twice.
   */
  shutdown(): Promise<void>;
}

/**
 * Wires gateway → workers → chain → sink from a loaded config.
 *
 * Nothing runs until `start()`; the lookup client and sink are the only
 * resources opened here.
 */
export async function createPipeline(
  config: PipelineConfig,
  log: Logger,
  overrides: PipelineOverrides = {},
): Promise<Pipeline> {
  const client = overrides.client ?? new HttpLookupClient({
    connections: config.lookup.connections,
    keepAliveTimeout: config.lookup.keepAliveTimeoutMs,
  });

  const units = buildUnits(config.chain, { client, log });
  const chain = new ProcessorChain(units, log.child({ component: 'chain' }));
  const sink = overrides.sink ?? await createSink(config.sink, log);
  const stats = new PipelineStats();

  const gateway = new IngestionGateway(
    { maxBatchSize: config.ingest.maxBatchSize, capacity: config.ingest.capacity },
    log.child({ component: 'gateway' }),
  );

  const pool = new PipelineWorkerPool(config.workers, {
    source: gateway,
    chain,
    sink,
    stats,
    log: log.child({ component: 'workers' }),
  });

  let shuttingDown: Promise<void> | undefined;

  const shutdown = async (): Promise<void> => {
    const leftover = await gateway.shutdown(config.ingest.drainTimeoutMs);
    await pool.stop();
    await chain.close();

    try {
      await client.close?.();
    } catch (err: unknown) {
      log.error({ err }, 'Failed to close lookup client');
    }

    try {
      await sink.close();
    } catch (err: unknown) {
      log.error({ err, sink: sink.name }, 'Failed to close sink');
    }

    log.info({ leftover, stats: stats.snapshot() }, 'Pipeline stopped');
  };

  return {
    gateway,
    chain,
    pool,
    stats,
    start: () => pool.start(),
    shutdown: () => {
      shuttingDown ??= shutdown();
      return shuttingDown;
    },
  };
}
