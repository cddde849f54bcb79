/**
 * Asset types and JSON value helpers
 */

/**
 * Any value JSON.parse can produce
 */
export type JsonValue =
    | null
    | boolean
    | number
    | string
    | JsonValue[]
    | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

/**
 * A single asset record. No fixed schema; only the lookup keys matter.
 */
export type AssetRecord = JsonObject;

/**
 * Download target derived from one asset record
 */
export interface AssetEntry {
    index: number;
    url: string;
    filename: string;
    outputPath: string;
}

export type SkipReason = 'not_an_object' | 'missing_url' | 'empty_filename';

export interface SkippedAsset {
    index: number;
    reason: SkipReason;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonValue[] {
    return Array.isArray(value);
}

/**
 * Return the first key from `keys` that is present on `record`, in order.
 * Presence is what counts, not the value.
 */
export function firstPresentKey<K extends string>(
    record: JsonObject,
    keys: readonly K[]
): K | undefined {
    return keys.find(key => Object.prototype.hasOwnProperty.call(record, key));
}

export function hasKey(record: JsonObject, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Render a JSON value for use inside a filename
 */
export function formatJsonValue(value: JsonValue): string {
    if (typeof value === 'string') return value;
    if (value === null || typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    return JSON.stringify(value);
}
