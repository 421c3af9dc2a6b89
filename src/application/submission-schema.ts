import { z } from 'zod';
import type { JsonObject } from '../domain/value.js';
import { isJsonObject } from '../domain/value.js';
import { MalformedInputError } from '../domain/errors.js';

/**
 * A single event: any JSON object.
 *
 * Only the top level is checked. `JSON.parse` output is already a JSON
 * value, so nested members are kept exactly as parsed (own `__proto__`
 * keys included) and nesting depth is not limited.
 */
export const eventObjectSchema = z.custom<JsonObject>(isJsonObject, {
  message: 'expected JSON object',
});

/**
 * Decodes a raw submission body into its events.
 *
 * - A JSON array contributes one event per element.
 * - Any other JSON value is exactly one event.
 * - Every event must be an object; otherwise the whole submission is
 *   rejected with `MalformedInputError`.
 */
export function decodeSubmission(payload: string | Buffer): JsonObject[] {
  const text = typeof payload === 'string' ? payload : payload.toString('utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    throw new MalformedInputError('Invalid JSON', { cause: err });
  }

  const candidates: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  const events: JsonObject[] = [];

  for (const [index, candidate] of candidates.entries()) {
    const result = eventObjectSchema.safeParse(candidate);
    if (!result.success) {
      throw new MalformedInputError(
        `Invalid event at index ${index}: expected JSON object`,
        { cause: result.error },
      );
    }
    events.push(result.data);
  }

  return events;
}
