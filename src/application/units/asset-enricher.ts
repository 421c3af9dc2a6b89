import type { Logger } from 'pino';
import type { EventRecord } from '../../domain/event-record.js';
import { appendTags } from '../../domain/event-record.js';
import type { LookupClient } from '../../domain/lookup.js';
import type { JsonObject } from '../../domain/value.js';
import { getArray, getNonEmptyString, getNumber, getObject, getString } from '../../domain/value.js';
import { ClassUid } from '../../domain/ocsf.js';
import { RecordFormatError } from '../../domain/errors.js';
import type { TransformUnit, UnitContext, UnitOutcome } from '../../domain/units/index.js';
import { CONTINUE, fail } from '../../domain/units/index.js';
import type { KeyedEnricherConfig } from './keyed-lookup.js';
import { lookupByField } from './keyed-lookup.js';

export const ASSET_ENRICH_ERROR_KEY = 'asset_enrich_error';

/**
 * Contextual tags from the event's OCSF classification and the fetched asset.
 *
 * Pure: depends only on the body and the asset mapping.
 */
export function deriveAssetTags(body: JsonObject, asset: JsonObject): string[] {
  const tags: string[] = [];
  const classUid = getNumber(body, 'class_uid');

  if (classUid.ok && classUid.value === ClassUid.DetectionFinding) {
    tags.push('ocsf_detection_finding');

    const severity = getNumber(body, 'severity_id');
    if (severity.ok) {
      if (severity.value >= 4) tags.push('high_severity');
      if (severity.value === 5) tags.push('critical_severity');
    }

    const finding = getObject(body, 'finding');
    if (finding.ok && getNonEmptyString(finding.value, 'title').ok) {
      tags.push('has_finding_title');
    }
  }

  if (classUid.ok && classUid.value === ClassUid.ProcessActivity) {
    tags.push('ocsf_process_activity', 'edr_event');
  }

  const observables = getArray(body, 'observables');
  if (observables.ok && observables.value.length > 0) {
    tags.push('has_observables');
  }

  const owner = getString(asset, 'owner');
  if (owner.ok && owner.value === 'IT') tags.push('it_asset');

  const criticality = getString(asset, 'criticality');
  if (criticality.ok && criticality.value === 'high') tags.push('critical_asset');

  return tags;
}

/**
 * Attaches asset metadata under `asset` and appends contextual tags.
 *
 * A missing, empty or wrong-typed key skips the lookup. That and a
 * failed lookup both leave the body untouched and set `asset_enrich_error`.
 */
export class AssetEnricher implements TransformUnit {
  readonly name = 'asset_enricher';
  private readonly config: KeyedEnricherConfig;
  private readonly client: LookupClient;
  private readonly log: Logger;

  constructor(config: KeyedEnricherConfig, client: LookupClient, log: Logger) {
    this.config = config;
    this.client = client;
    this.log = log;
  }

  async apply(record: EventRecord, context: UnitContext): Promise<UnitOutcome> {
    const body = record.objectBody();
    if (!body) {
      return fail(new RecordFormatError(this.name, 'asset_enricher expects object'));
    }

    const result = await lookupByField(this.client, this.config, body, context.signal);

    switch (result.kind) {
      case 'no_key':
        record.setMeta(
          ASSET_ENRICH_ERROR_KEY,
          result.reason === 'type_mismatch'
            ? `field "${this.config.idField}" is not a string`
            : `field "${this.config.idField}" not found`,
        );
        return CONTINUE;

      case 'failed':
        this.log.warn(
          { err: result.error, asset_id: result.key, event_id: record.id },
          `asset_enrich failed for ${result.key}`,
        );
        record.setMeta(ASSET_ENRICH_ERROR_KEY, result.error.message);
        return CONTINUE;

      case 'found':
        body['asset'] = result.data;
        appendTags(body, deriveAssetTags(body, result.data));
        this.log.debug({ asset_id: result.key, event_id: record.id }, 'Asset enriched');
        return CONTINUE;
    }
  }
}
