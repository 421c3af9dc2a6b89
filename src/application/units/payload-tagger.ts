import type { EventRecord } from '../../domain/event-record.js';
import { RECEIVED_AT_KEY } from '../../domain/event-record.js';
import type { JsonObject, JsonValue } from '../../domain/value.js';
import { formatTagValue, getArray, getField, getNumber, getObject, getString, isJsonObject } from '../../domain/value.js';
import type { SemanticTags } from '../../domain/ocsf.js';
import { categoryLabels, classLabels, severityLabels } from '../../domain/ocsf.js';
import type { TransformUnit, UnitOutcome } from '../../domain/units/index.js';
import { CONTINUE } from '../../domain/units/index.js';

export interface PayloadTaggerConfig {
  /** Fields copied into `tag.<field>` when present. */
  tagFields: readonly string[];
  /** Copy `http.received_at` into `tag.ingested_at`. */
  addTimestampTag: boolean;
  /** Write `tag.source=http_receiver`. */
  addSourceTag: boolean;
}

export const DEFAULT_TAG_FIELDS = ['class_uid', 'severity_id', 'category_uid'] as const;

const SOURCE_TAG_VALUE = 'http_receiver';

/** Lookup tables for the three well-known classifier fields. */
const SEMANTIC_TABLES: ReadonlyMap<string, (code: number) => SemanticTags> = new Map([
  ['class_uid', classLabels],
  ['severity_id', severityLabels],
  ['category_uid', categoryLabels],
]);

/**
 * Derives every `tag.*` entry for a body.
 *
 * Pure and deterministic. The same body yields the same map, so writing
 * it into the sidecar twice is a no-op.
 */
export function deriveTags(body: JsonObject, tagFields: readonly string[]): Map<string, string> {
  const tags = new Map<string, string>();

  for (const field of tagFields) {
    const value = getField(body, field);
    if (!value.ok) continue;

    tags.set(`tag.${field}`, formatTagValue(value.value));
    addSemanticTags(tags, field, value.value);
  }

  addContentTags(tags, body);
  return tags;
}

function addSemanticTags(tags: Map<string, string>, field: string, value: JsonValue): void {
  const table = SEMANTIC_TABLES.get(field);
  if (table === undefined || typeof value !== 'number') return;

  for (const [key, label] of Object.entries(table(Math.trunc(value)))) {
    tags.set(`tag.${key}`, label);
  }
}

function addContentTags(tags: Map<string, string>, body: JsonObject): void {
  const observables = getArray(body, 'observables');
  if (observables.ok && observables.value.length > 0) {
    tags.set('tag.has_observables', 'true');
    tags.set('tag.observable_count', String(observables.value.length));

    const threatDetected = observables.value.some(
      (obs) => isJsonObject(obs) && getField(obs, 'threat_intel').ok,
    );
    if (threatDetected) {
      tags.set('tag.has_threat_intel', 'true');
      tags.set('tag.threat_detected', 'true');
    }
  }

  if (getField(body, 'asset').ok) {
    tags.set('tag.enriched', 'asset');
  }

  const status = getNumber(body, 'status_id');
  if (status.ok) {
    tags.set('tag.status', status.value === 1 ? 'success' : 'failure');
  }

  const metadata = getObject(body, 'metadata');
  if (metadata.ok) {
    const uid = getString(metadata.value, 'uid');
    if (uid.ok) tags.set('tag.event_id', uid.value);
  }
}

/**
 * Writes derived tags into the metadata sidecar. Never touches the body,
 * never does I/O, never fails; a non-object body just yields no tags.
 */
export class PayloadTagger implements TransformUnit {
  readonly name = 'payload_tagger';
  private readonly config: PayloadTaggerConfig;

  constructor(config: PayloadTaggerConfig) {
    this.config = config;
  }

  async apply(record: EventRecord): Promise<UnitOutcome> {
    if (this.config.addSourceTag) {
      record.setMeta('tag.source', SOURCE_TAG_VALUE);
    }

    if (this.config.addTimestampTag) {
      const receivedAt = record.getMeta(RECEIVED_AT_KEY);
      if (receivedAt !== undefined) record.setMeta('tag.ingested_at', receivedAt);
    }

    const body = record.objectBody();
    if (!body) return CONTINUE;

    for (const [key, value] of deriveTags(body, this.config.tagFields)) {
      record.setMeta(key, value);
    }
    return CONTINUE;
  }
}
