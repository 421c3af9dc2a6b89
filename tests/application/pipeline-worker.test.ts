import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PipelineWorkerPool } from '../../src/application/pipeline-worker.js';
import type { WorkerPoolOptions } from '../../src/application/pipeline-worker.js';
import { ProcessorChain } from '../../src/application/processor-chain.js';
import { PipelineStats } from '../../src/application/pipeline-stats.js';
import { IngestionGateway } from '../../src/application/ingestion-gateway.js';
import { EventRecord } from '../../src/domain/event-record.js';
import { CONTINUE, DROP, fail } from '../../src/domain/units/index.js';
import type { TransformUnit, UnitContext } from '../../src/domain/units/index.js';
import { MemorySink, fakeLogger } from '../helpers.js';

const defaults: WorkerPoolOptions = {
  workers: 2,
  pollTimeoutMs: 20,
  failurePolicy: 'drop',
  maxRetries: 2,
  propagateCancellation: false,
};

/** Appends a mark to the body, then fails the first `failures` calls. */
function flaky(failures: number): TransformUnit & { calls: number } {
  const unit: TransformUnit & { calls: number } = {
    name: 'flaky',
    calls: 0,
    async apply(record: EventRecord) {
      unit.calls++;
      const body = record.objectBody();
      if (body) {
        const marks = body['marks'];
        body['marks'] = Array.isArray(marks) ? [...marks, unit.calls] : [unit.calls];
      }
      return unit.calls <= failures ? fail(new Error(`attempt ${unit.calls} failed`)) : CONTINUE;
    },
  };
  return unit;
}

describe('PipelineWorkerPool', () => {
  let sink: MemorySink;
  let stats: PipelineStats;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    sink = new MemorySink();
    stats = new PipelineStats();
    log = fakeLogger();
  });

  function pool(units: TransformUnit[], options: Partial<WorkerPoolOptions> = {}, source?: IngestionGateway) {
    return new PipelineWorkerPool({ ...defaults, ...options }, {
      source: source ?? new IngestionGateway({ capacity: 10, maxBatchSize: 10 }, log),
      chain: new ProcessorChain(units, log),
      sink,
      stats,
      log,
    });
  }

  // ── processRecord ──────────────────────────────────────

  it('delivers forwarded records to the sink', async () => {
    const record = new EventRecord({ a: 1 });
    const result = await pool([]).processRecord(record);

    expect(result.status).toBe('forwarded');
    expect(sink.records).toEqual([record]);
    expect(stats.snapshot()).toMatchObject({ forwarded: 1, dropped: 0, failed: 0 });
  });

  it('discards dropped records', async () => {
    const dropAll: TransformUnit = { name: 'drop_all', apply: async () => DROP };
    await pool([dropAll]).processRecord(new EventRecord({}));

    expect(sink.records).toEqual([]);
    expect(stats.snapshot().dropped).toBe(1);
  });

  it('logs and discards failed records under the drop policy', async () => {
    const unit = flaky(1);
    await pool([unit]).processRecord(new EventRecord({}));

    expect(unit.calls).toBe(1);
    expect(sink.records).toEqual([]);
    expect(stats.snapshot()).toMatchObject({ failed: 1, retried: 0 });
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ unit: 'flaky' }),
      'Transform chain failed, dropping event',
    );
  });

  it('retries from the ingested state under the retry policy', async () => {
    const unit = flaky(1);
    const result = await pool([unit], { failurePolicy: 'retry' }).processRecord(new EventRecord({ a: 1 }));

    expect(result.status).toBe('forwarded');
    // The failed attempt's mutation is not carried into the retry
    expect(sink.records[0]?.body).toEqual({ a: 1, marks: [2] });
    expect(stats.snapshot()).toMatchObject({ forwarded: 1, retried: 1, failed: 0 });
  });

  it('gives up after maxRetries', async () => {
    const unit = flaky(10);
    const result = await pool([unit], { failurePolicy: 'retry', maxRetries: 2 }).processRecord(new EventRecord({}));

    expect(result.status).toBe('failed');
    expect(unit.calls).toBe(3);
    expect(stats.snapshot()).toMatchObject({ retried: 2, failed: 1 });
  });

  it('counts sink errors without throwing', async () => {
    sink.failWith = new Error('sink down');
    const result = await pool([]).processRecord(new EventRecord({}));

    expect(result.status).toBe('forwarded');
    expect(stats.snapshot()).toMatchObject({ forwarded: 1, sink_errors: 1 });
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ sink: 'memory' }),
      'Failed to deliver event to sink',
    );
  });

  it('passes no signal to units unless cancellation is propagated', async () => {
    const seen: Array<AbortSignal | undefined> = [];
    const probe: TransformUnit = {
      name: 'probe',
      apply: async (_record: EventRecord, ctx: UnitContext) => {
        seen.push(ctx.signal);
        return CONTINUE;
      },
    };

    await pool([probe]).processRecord(new EventRecord({}));
    await pool([probe], { propagateCancellation: true }).processRecord(new EventRecord({}));

    expect(seen[0]).toBeUndefined();
    expect(seen[1]).toBeInstanceOf(AbortSignal);
  });

  // ── Loops ──────────────────────────────────────────────

  it('drains the source until stopped', async () => {
    const gateway = new IngestionGateway({ capacity: 10, maxBatchSize: 10 }, log);
    gateway.submit('[{"n":1},{"n":2},{"n":3}]');

    const workers = pool([], {}, gateway);
    workers.start();
    expect(workers.running).toBe(true);

    await vi.waitFor(() => expect(sink.records).toHaveLength(3));
    await workers.stop();

    expect(workers.running).toBe(false);
    expect(stats.snapshot()).toMatchObject({ received: 3, forwarded: 3 });
    expect(sink.records.map((r) => r.body)).toEqual(expect.arrayContaining([{ n: 1 }, { n: 2 }, { n: 3 }]));
  });

  it('exits loops once the gateway shuts down', async () => {
    const gateway = new IngestionGateway({ capacity: 10, maxBatchSize: 10 }, log);
    const workers = pool([], {}, gateway);
    workers.start();

    gateway.submit('{"n":1}');
    await gateway.shutdown(1000);
    await workers.stop();

    expect(sink.records).toHaveLength(1);
  });
});
