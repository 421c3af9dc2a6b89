import type { Logger } from 'pino';
import type { EventRecord } from '../../domain/event-record.js';
import type { LookupClient } from '../../domain/lookup.js';
import { RecordFormatError } from '../../domain/errors.js';
import type { TransformUnit, UnitContext, UnitOutcome } from '../../domain/units/index.js';
import { CONTINUE, fail } from '../../domain/units/index.js';
import type { KeyedEnricherConfig } from './keyed-lookup.js';
import { lookupByField } from './keyed-lookup.js';

export const USER_ENRICH_ERROR_KEY = 'user_enrich_error';

/** Attaches user metadata under `user` when the configured id resolves. */
export class UserEnricher implements TransformUnit {
  readonly name = 'user_enricher';
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
      return fail(new RecordFormatError(this.name, 'user_enricher expects object'));
    }

    const result = await lookupByField(this.client, this.config, body, context.signal);

    switch (result.kind) {
      case 'no_key':
        record.setMeta(
          USER_ENRICH_ERROR_KEY,
          result.reason === 'type_mismatch'
            ? `field "${this.config.idField}" is not a string`
            : `field "${this.config.idField}" not found`,
        );
        return CONTINUE;

      case 'failed':
        this.log.warn(
          { err: result.error, user_id: result.key, event_id: record.id },
          `user_enrich failed for ${result.key}`,
        );
        record.setMeta(USER_ENRICH_ERROR_KEY, result.error.message);
        return CONTINUE;

      case 'found':
        // Replaces any `user` sub-record the id was read from
        body['user'] = result.data;
        return CONTINUE;
    }
  }
}
