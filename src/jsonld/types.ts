/**
 * Types for JSON-LD context payloads.
 *
 * Payloads are plain JSON; nothing here expands or compacts documents.
 */

import { z } from 'zod';

/**
 * Any JSON value.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON object (mapping).
 */
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

/**
 * A document carrying only a context, ready to embed.
 */
export interface ContextDocument {
  '@context': JsonValue;
}

/**
 * Check whether a JSON value is a mapping.
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
