/**
 * JSON-safe value types shared by the cache, the executor and the API.
 */

export type JsonPrimitive = string | number | boolean | null;

/**
 * Anything JSON.stringify round-trips without loss.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

export interface JsonObject {
	[key: string]: JsonValue;
}

export interface JsonArray extends Array<JsonValue> {}

/**
 * One result row keyed by column name, driver values already converted.
 */
export type ResultRow = Record<string, JsonValue>;

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
