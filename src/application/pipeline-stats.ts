export interface PipelineStatsSnapshot {
  readonly received: number;
  readonly forwarded: number;
  readonly dropped: number;
  readonly failed: number;
  readonly retried: number;
  readonly sink_errors: number;
}

export type PipelineCounter = keyof PipelineStatsSnapshot;

/**
 * Process-wide outcome counters for the worker pool.
 *
 * Increments are synchronous, so interleaved workers never lose an update.
 */
export class PipelineStats {
  private readonly counters: Record<PipelineCounter, number> = {
    received: 0,
    forwarded: 0,
    dropped: 0,
    failed: 0,
    retried: 0,
    sink_errors: 0,
  };

  increment(counter: PipelineCounter): void {
    this.counters[counter]++;
  }

  snapshot(): PipelineStatsSnapshot {
    return { ...this.counters };
  }
}
