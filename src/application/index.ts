export { BoundedBuffer } from './event-buffer.js';
export type { PollResult } from './event-buffer.js';
export { decodeSubmission, eventObjectSchema } from './submission-schema.js';
export { IngestionGateway, toRfc3339 } from './ingestion-gateway.js';
export type { IngestionGatewayOptions, SubmissionResult, RecordPollResult } from './ingestion-gateway.js';
export { ProcessorChain } from './processor-chain.js';
export type { ChainResult } from './processor-chain.js';
export { PipelineStats } from './pipeline-stats.js';
export type { PipelineStatsSnapshot, PipelineCounter } from './pipeline-stats.js';
export { PipelineWorkerPool } from './pipeline-worker.js';
export type { FailurePolicy, RecordSource, WorkerPoolOptions, WorkerPoolDeps } from './pipeline-worker.js';
export * from './units/index.js';
