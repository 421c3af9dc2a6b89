/**
 * Error taxonomy for the ingestion gateway and transform chain.
 *
 * Ingestion errors are thrown synchronously to the submitter.
 * LookupError never leaves the enrichment unit that hit it.
 * RecordFormatError surfaces through the chain's `failed` result.
 */

export type PipelineErrorCode =
  | 'MALFORMED_INPUT'
  | 'BATCH_TOO_LARGE'
  | 'QUEUE_FULL'
  | 'GATEWAY_CLOSED'
  | 'LOOKUP_FAILURE'
  | 'RECORD_FORMAT';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export class MalformedInputError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super('MALFORMED_INPUT', message, options);
    this.name = 'MalformedInputError';
  }
}

export class BatchTooLargeError extends PipelineError {
  readonly limit: number;
  readonly count: number;

  constructor(limit: number, count: number) {
    super('BATCH_TOO_LARGE', `Batch size exceeds maximum of ${limit}`);
    this.name = 'BatchTooLargeError';
    this.limit = limit;
    this.count = count;
  }
}

/**
 * The bounded buffer had no room. `accepted` events of the same
 * submission were already enqueued and stay enqueued.
 */
export class QueueFullError extends PipelineError {
  readonly accepted: number;
  readonly total: number;

  constructor(accepted: number, total: number) {
    super('QUEUE_FULL', `Event queue full, accepted ${accepted}/${total} events`);
    this.name = 'QueueFullError';
    this.accepted = accepted;
    this.total = total;
  }
}

export class GatewayClosedError extends PipelineError {
  constructor() {
    super('GATEWAY_CLOSED', 'Ingestion gateway is shutting down');
    this.name = 'GatewayClosedError';
  }
}

export class LookupError extends PipelineError {
  readonly url: string;
  readonly status: number | undefined;

  constructor(url: string, message: string, options?: ErrorOptions & { status?: number }) {
    super('LOOKUP_FAILURE', message, options);
    this.name = 'LookupError';
    this.url = url;
    this.status = options?.status;
  }
}

export class RecordFormatError extends PipelineError {
  readonly unit: string;

  constructor(unit: string, message: string) {
    super('RECORD_FORMAT', message);
    this.name = 'RecordFormatError';
    this.unit = unit;
  }
}

/** Message text for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
