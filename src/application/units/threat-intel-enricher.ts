import type { Logger } from 'pino';
import type { EventRecord } from '../../domain/event-record.js';
import type { LookupClient } from '../../domain/lookup.js';
import type { JsonObject } from '../../domain/value.js';
import { getArray, getField, getNonEmptyString, isJsonObject } from '../../domain/value.js';
import { THREAT_INTEL_TYPES } from '../../domain/ocsf.js';
import { RecordFormatError, errorMessage } from '../../domain/errors.js';
import type { TransformUnit, UnitContext, UnitOutcome } from '../../domain/units/index.js';
import { CONTINUE, fail } from '../../domain/units/index.js';

export const ENRICHED_COUNT_KEY = 'threat_intel.enriched_count';
export const THREAT_INTEL_ERROR_KEY = 'threat_intel_error';

export interface ThreatIntelEnricherConfig {
  endpoint: string;
  timeoutMs: number;
  /** Observable type ids eligible for lookup (default: hostname, IP, domain, email, file name, hash, URL). */
  types?: readonly number[];
}

/**
 * Reads an observable's `type_id`. Integral numbers and numeric strings
 * such as `"7"` are accepted; anything else is treated as absent.
 */
export function observableTypeId(observable: JsonObject): number | undefined {
  const field = getField(observable, 'type_id');
  if (!field.ok) return undefined;

  const raw = field.value;
  if (typeof raw === 'number') return Number.isInteger(raw) ? raw : undefined;
  if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) return Number(raw.trim());
  return undefined;
}

/**
 * Looks up each eligible observable by its `name` and attaches the result
 * as that observable's `threat_intel`.
 *
 * Lookups run one after another in observable order. A failed lookup is
 * logged and the observable stays unenriched; the record always continues.
 */
export class ThreatIntelEnricher implements TransformUnit {
  readonly name = 'threat_intel_enricher';
  private readonly config: ThreatIntelEnricherConfig;
  private readonly eligible: ReadonlySet<number>;
  private readonly client: LookupClient;
  private readonly log: Logger;

  constructor(config: ThreatIntelEnricherConfig, client: LookupClient, log: Logger) {
    this.config = config;
    this.eligible = config.types ? new Set(config.types) : THREAT_INTEL_TYPES;
    this.client = client;
    this.log = log;
  }

  async apply(record: EventRecord, context: UnitContext): Promise<UnitOutcome> {
    const body = record.objectBody();
    if (!body) {
      return fail(new RecordFormatError(this.name, 'threat_intel_enricher expects object'));
    }

    const observables = getArray(body, 'observables');
    if (!observables.ok || observables.value.length === 0) {
      return CONTINUE;
    }

    const enriched = await this.enrichObservables(record, observables.value, context);
    record.setMeta(ENRICHED_COUNT_KEY, String(enriched));

    if (enriched > 0) {
      this.log.debug({ event_id: record.id, enriched }, 'Observables enriched with threat intel');
    }
    return CONTINUE;
  }

  /** Returns how many observables gained `threat_intel`. */
  private async enrichObservables(
    record: EventRecord,
    observables: readonly unknown[],
    context: UnitContext,
  ): Promise<number> {
    let enriched = 0;

    for (const [index, observable] of observables.entries()) {
      if (!isJsonObject(observable)) {
        this.log.debug({ event_id: record.id, index }, 'Observable is not an object, skipping');
        continue;
      }

      const typeId = observableTypeId(observable);
      if (typeId === undefined || !this.eligible.has(typeId)) continue;

      const name = getNonEmptyString(observable, 'name');
      if (!name.ok) continue;

      try {
        observable['threat_intel'] = await this.client.lookup(this.config.endpoint, name.value, {
          timeoutMs: this.config.timeoutMs,
          signal: context.signal,
        });
        enriched++;
      } catch (err: unknown) {
        this.log.warn(
          { err, observable: name.value, type_id: typeId, event_id: record.id },
          `threat_intel lookup failed for ${name.value}`,
        );
        record.setMeta(THREAT_INTEL_ERROR_KEY, errorMessage(err));
      }
    }

    return enriched;
  }
}
