/**
 * Semi-structured JSON values and typed field access.
 *
 * Event bodies arrive as arbitrary JSON. Units never index into them
 * blindly; every read goes through an accessor that reports whether
 * the field was missing or held the wrong type.
 */

export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Why a field read did not produce a value. */
export type FieldMiss = 'missing' | 'type_mismatch';

/**
 * Result of a typed field read.
 *
 * `ok === false` carries the reason so callers can treat
 * "absent" and "present but wrong type" differently when they need to.
 */
export type FieldResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: FieldMiss };

const MISSING: FieldResult<never> = { ok: false, reason: 'missing' };
const MISMATCH: FieldResult<never> = { ok: false, reason: 'type_mismatch' };

function found<T>(value: T): FieldResult<T> {
  return { ok: true, value };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Raw read of a key, distinguishing absence from an explicit `null`. */
export function getField(obj: JsonObject, key: string): FieldResult<JsonValue> {
  if (!Object.prototype.hasOwnProperty.call(obj, key)) return MISSING;
  const value = obj[key];
  return value === undefined ? MISSING : found(value);
}

export function getString(obj: JsonObject, key: string): FieldResult<string> {
  const field = getField(obj, key);
  if (!field.ok) return field;
  return typeof field.value === 'string' ? found(field.value) : MISMATCH;
}

/** Like `getString`, but an empty string counts as missing. */
export function getNonEmptyString(obj: JsonObject, key: string): FieldResult<string> {
  const field = getString(obj, key);
  if (field.ok && field.value === '') return MISSING;
  return field;
}

export function getNumber(obj: JsonObject, key: string): FieldResult<number> {
  const field = getField(obj, key);
  if (!field.ok) return field;
  return typeof field.value === 'number' ? found(field.value) : MISMATCH;
}

export function getObject(obj: JsonObject, key: string): FieldResult<JsonObject> {
  const field = getField(obj, key);
  if (!field.ok) return field;
  return isJsonObject(field.value) ? found(field.value) : MISMATCH;
}

export function getArray(obj: JsonObject, key: string): FieldResult<JsonValue[]> {
  const field = getField(obj, key);
  if (!field.ok) return field;
  return Array.isArray(field.value) ? found(field.value) : MISMATCH;
}

/**
 * Splits a dotted path into segments, ignoring empty ones
 * (`"a..b"` and `".a."` behave like `"a.b"` and `"a"`).
 */
export function splitFieldPath(path: string): string[] {
  return path.split('.').filter((segment) => segment !== '');
}

/**
 * Resolves a dotted path by descending one mapping level per segment.
 *
 * A non-mapping intermediate value or an absent segment yields `missing`,
 * exactly as if the leaf itself were absent. An empty path is `missing`.
 */
export function resolvePath(obj: JsonObject, path: string): FieldResult<JsonValue> {
  const segments = splitFieldPath(path);
  if (segments.length === 0) return MISSING;

  let current: JsonValue = obj;
  for (const segment of segments) {
    if (!isJsonObject(current)) return MISSING;
    const next = getField(current, segment);
    if (!next.ok) return next;
    current = next.value;
  }
  return found(current);
}

/** Resolves a dotted path to a non-empty string. */
export function resolveStringPath(obj: JsonObject, path: string): FieldResult<string> {
  const field = resolvePath(obj, path);
  if (!field.ok) return field;
  if (typeof field.value !== 'string') return MISMATCH;
  return field.value === '' ? MISSING : found(field.value);
}

/**
 * Narrows unknown input (e.g. `JSON.parse` output) to a JsonValue.
 * Rejects `undefined`, functions, non-finite numbers and the like.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** String form used for tag values: strings verbatim, everything else as JSON. */
export function formatTagValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Deep copy of a JSON object; used when a record must be replayed from scratch. */
export function cloneJsonObject(obj: JsonObject): JsonObject {
  return structuredClone(obj);
}
