import type { Logger } from 'pino';
import type { EventRecord } from '../domain/event-record.js';
import type { TransformUnit, UnitOutcome } from '../domain/units/index.js';
import { fail } from '../domain/units/index.js';

/**
 * Terminal state of one traversal.
 *
 * `dropped` and `failed` name the unit that stopped the record.
 */
export type ChainResult =
  | { readonly status: 'forwarded'; readonly record: EventRecord }
  | { readonly status: 'dropped'; readonly record: EventRecord; readonly unit: string }
  | { readonly status: 'failed'; readonly record: EventRecord; readonly unit: string; readonly error: Error };

/**
 * Fixed, declared-order sequence of transform units.
 *
 * Each record visits the units one at a time in order. `continue` moves
 * to the next unit, `drop` and `fail` end the traversal. A unit that
 * throws is treated as `fail`.
 *
 * The chain holds no per-record state, so several workers may run it on
 * different records at once.
 */
export class ProcessorChain {
  readonly units: readonly TransformUnit[];
  private readonly log: Logger;

  constructor(units: readonly TransformUnit[], log: Logger) {
    this.units = [...units];
    this.log = log;
  }

  get unitNames(): string[] {
    return this.units.map((u) => u.name);
  }

  async run(record: EventRecord, signal?: AbortSignal): Promise<ChainResult> {
    for (const unit of this.units) {
      const outcome = await this.applyUnit(unit, record, signal);

      if (outcome.kind === 'drop') {
        this.log.debug({ event_id: record.id, unit: unit.name }, 'Event dropped');
        return { status: 'dropped', record, unit: unit.name };
      }

      if (outcome.kind === 'fail') {
        return { status: 'failed', record, unit: unit.name, error: outcome.error };
      }
    }

    return { status: 'forwarded', record };
  }

  /** Closes every unit that holds resources. Errors are logged per unit. */
  async close(): Promise<void> {
    for (const unit of this.units) {
      if (!unit.close) continue;
      try {
        await unit.close();
      } catch (err: unknown) {
        this.log.error({ err, unit: unit.name }, 'Failed to close transform unit');
      }
    }
  }

  private async applyUnit(
    unit: TransformUnit,
    record: EventRecord,
    signal: AbortSignal | undefined,
  ): Promise<UnitOutcome> {
    try {
      return await unit.apply(record, { signal });
    } catch (err: unknown) {
      return fail(err instanceof Error ? err : new Error(String(err)));
    }
  }
}
