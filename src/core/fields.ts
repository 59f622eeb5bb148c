import { z } from 'zod';
import type { JsonObject, JsonValue } from '../cli/types';

/** A place a logical field may live: the container and the key inside it. */
export type FieldCandidate = readonly [container: JsonValue | undefined, key: string];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const jsonObject = z.custom<JsonObject>(isJsonObject);
export const jsonArray = z.custom<JsonValue[]>((value) => Array.isArray(value));

/**
 * Reads `key` off `container`. Returns undefined for non-objects, missing keys
 * and inherited properties rather than throwing.
 */
export function field(
  container: JsonValue | undefined,
  key: string,
): JsonValue | undefined {
  if (!isJsonObject(container)) return undefined;
  if (!Object.prototype.hasOwnProperty.call(container, key)) return undefined;
  return container[key];
}

/**
 * Returns the first candidate value that is present and matches `schema`.
 * Candidates of the wrong type are skipped, so a legacy location is still
 * consulted when the preferred one holds garbage.
 */
export function firstOf<T>(
  candidates: readonly FieldCandidate[],
  schema: z.ZodType<T>,
): T | undefined {
  for (const [container, key] of candidates) {
    const value = field(container, key);
    if (value === undefined) continue;

    const parsed = schema.safeParse(value);
    if (parsed.success) return parsed.data;
  }
  return undefined;
}

/** Shorthand for a single string lookup. */
export function stringField(
  container: JsonValue | undefined,
  key: string,
): string | undefined {
  return firstOf([[container, key]], z.string());
}
