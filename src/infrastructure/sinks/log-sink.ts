import type { Logger } from 'pino';
import type { EventRecord } from '../../domain/event-record.js';
import type { EventSink } from '../../domain/sink.js';

/** Writes every finished record to the log. Default when no Redis sink is configured. */
export class LogSink implements EventSink {
  readonly name = 'log';
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  async write(record: EventRecord): Promise<void> {
    this.log.info(
      { event_id: record.id, body: record.body, metadata: record.metadata() },
      'Event processed',
    );
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
