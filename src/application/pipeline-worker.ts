import type { Logger } from 'pino';
import type { EventRecord } from '../domain/event-record.js';
import type { EventSink } from '../domain/sink.js';
import type { PollResult } from './event-buffer.js';
import type { ChainResult, ProcessorChain } from './processor-chain.js';
import type { PipelineStats } from './pipeline-stats.js';

/**
 * What to do with a record the chain failed.
 *
 * `drop`  — log and discard.
 * `retry` — run the chain again on a fresh copy of the ingested record,
 *           up to `maxRetries` times, then log and discard.
 */
export type FailurePolicy = 'drop' | 'retry';

/** Anything the workers can pull records from; the ingestion gateway in production. */
export interface RecordSource {
  poll(timeoutMs: number, signal?: AbortSignal): Promise<PollResult<EventRecord>>;
}

export interface WorkerPoolOptions {
  workers: number;
  /** How long one poll waits before returning `empty`. */
  pollTimeoutMs: number;
  failurePolicy: FailurePolicy;
  maxRetries: number;
  /**
   * Pass the pool's stop signal into units so in-flight lookups abort on
   * stop. Off by default: lookups end at their own timeout.
   */
  propagateCancellation: boolean;
}

export interface WorkerPoolDeps {
  source: RecordSource;
  chain: ProcessorChain;
  sink: EventSink;
  stats: PipelineStats;
  log: Logger;
}

/**
 * N concurrent loops, each: poll → run chain → hand to sink.
 *
 * One record is traversed by exactly one worker, so units never see the
 * same record twice at once. Across records there is no ordering.
 *
 * Loops end when the source reports `cancelled` (gateway closed and
 * drained) or when `stop()` is called.
 */
export class PipelineWorkerPool {
  private readonly options: WorkerPoolOptions;
  private readonly deps: WorkerPoolDeps;
  private readonly ac = new AbortController();
  private loops: Promise<void>[] = [];

  constructor(options: WorkerPoolOptions, deps: WorkerPoolDeps) {
    this.options = options;
    this.deps = deps;
  }

  get running(): boolean {
    return this.loops.length > 0;
  }

  start(): void {
    if (this.loops.length > 0) return;

    for (let i = 0; i < this.options.workers; i++) {
      const workerId = `worker-${i + 1}`;
      this.loops.push(this.runLoop(workerId));
    }
    this.deps.log.info(
      { workers: this.options.workers, units: this.deps.chain.unitNames },
      'Pipeline workers started',
    );
  }

  /** Stops polling and waits for every loop to finish its current record. */
  async stop(): Promise<void> {
    this.ac.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.deps.log.info('Pipeline workers stopped');
  }

  /**
   * Runs one record through the chain (with retries per policy) and
   * delivers it to the sink when forwarded.
   */
  async processRecord(record: EventRecord): Promise<ChainResult> {
    const { chain, stats, log } = this.deps;
    const unitSignal = this.options.propagateCancellation ? this.ac.signal : undefined;
    const pristine = this.options.failurePolicy === 'retry' ? record.clone() : undefined;

    let result = await chain.run(record, unitSignal);
    let attempt = 0;

    while (result.status === 'failed' && pristine && attempt < this.options.maxRetries) {
      attempt++;
      stats.increment('retried');
      log.warn(
        { err: result.error, event_id: record.id, unit: result.unit, attempt },
        'Transform chain failed, retrying',
      );
      result = await chain.run(pristine.clone(), unitSignal);
    }

    switch (result.status) {
      case 'forwarded':
        stats.increment('forwarded');
        await this.deliver(result.record);
        break;
      case 'dropped':
        stats.increment('dropped');
        break;
      case 'failed':
        stats.increment('failed');
        log.error(
          { err: result.error, event_id: result.record.id, unit: result.unit },
          'Transform chain failed, dropping event',
        );
        break;
    }

    return result;
  }

  private async runLoop(workerId: string): Promise<void> {
    const { source, stats, log } = this.deps;
    const signal = this.ac.signal;

    while (!signal.aborted) {
      const polled = await source.poll(this.options.pollTimeoutMs, signal);
      if (polled.kind === 'empty') continue;
      if (polled.kind === 'cancelled') break;

      stats.increment('received');
      try {
        await this.processRecord(polled.item);
      } catch (err: unknown) {
        log.error({ err, worker: workerId, event_id: polled.item.id }, 'Worker failed to process event');
      }
    }

    log.debug({ worker: workerId }, 'Worker loop exited');
  }

  private async deliver(record: EventRecord): Promise<void> {
    const { sink, stats, log } = this.deps;
    try {
      await sink.write(record);
    } catch (err: unknown) {
      stats.increment('sink_errors');
      log.error({ err, event_id: record.id, sink: sink.name }, 'Failed to deliver event to sink');
    }
  }
}
