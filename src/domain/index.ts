export type { JsonPrimitive, JsonValue, JsonObject, FieldMiss, FieldResult } from './value.js';
export {
  isJsonObject,
  isJsonValue,
  getField,
  getString,
  getNonEmptyString,
  getNumber,
  getObject,
  getArray,
  splitFieldPath,
  resolvePath,
  resolveStringPath,
  formatTagValue,
  cloneJsonObject,
} from './value.js';
export { EventRecord, RECEIVED_AT_KEY, eventUid, appendTags } from './event-record.js';
export type { SinkRecord } from './event-record.js';
export {
  PipelineError,
  MalformedInputError,
  BatchTooLargeError,
  QueueFullError,
  GatewayClosedError,
  LookupError,
  RecordFormatError,
  errorMessage,
} from './errors.js';
export type { PipelineErrorCode } from './errors.js';
export { ObservableType, THREAT_INTEL_TYPES, ClassUid, classLabels, severityLabels, categoryLabels } from './ocsf.js';
export type { ObservableTypeId, SemanticTags } from './ocsf.js';
export type { LookupClient, LookupOptions } from './lookup.js';
export type { EventSink } from './sink.js';
export type { UnitOutcome, UnitContext, TransformUnit } from './units/index.js';
export { CONTINUE, DROP, fail } from './units/index.js';
