/**
 * Run metadata types
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Descriptive fields attached to a run at upload time.
 * Keys are serialized in insertion order.
 */
export type RunMetadata = Record<string, JsonValue>;
