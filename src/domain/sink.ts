import type { EventRecord } from './event-record.js';

/**
 * Downstream collaborator that takes ownership of finished records.
 *
 * Routing among several outputs (e.g. by `class_uid` or derived tags)
 * is the sink's concern, not the chain's.
 */
export interface EventSink {
  readonly name: string;
  write(record: EventRecord): Promise<void>;
  close(): Promise<void>;
}
