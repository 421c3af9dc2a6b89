import type { EventRecord } from '../event-record.js';

/**
 * What a unit decided for a record.
 *
 * `continue` — the (possibly mutated) record moves to the next unit.
 * `drop`     — traversal stops; the record is discarded silently.
 * `fail`     — traversal stops; the error goes to the chain's caller.
 */
export type UnitOutcome =
  | { readonly kind: 'continue' }
  | { readonly kind: 'drop' }
  | { readonly kind: 'fail'; readonly error: Error };

export const CONTINUE: UnitOutcome = { kind: 'continue' };
export const DROP: UnitOutcome = { kind: 'drop' };

export function fail(error: Error): UnitOutcome {
  return { kind: 'fail', error };
}

/** Per-invocation context handed to every unit. */
export interface UnitContext {
  /** Aborts in-flight lookups when the owning worker stops. */
  readonly signal?: AbortSignal | undefined;
}

/**
 * A transform unit.
 *
 * Never invoked concurrently on the same record. Different records may
 * be in flight at the same time, so any per-unit state must tolerate
 * interleaving at `await` points.
 */
export interface TransformUnit {
  readonly name: string;
  apply(record: EventRecord, context: UnitContext): Promise<UnitOutcome>;
  close?(): Promise<void>;
}
