/**
 * Asset extraction
 * Turns loosely shaped JSON into download entries
 */
import { join } from 'path';
import { decodeHTML } from 'entities';
import {
    type AssetEntry,
    type JsonValue,
    type SkippedAsset,
    firstPresentKey,
    formatJsonValue,
    hasKey,
    isJsonArray,
    isJsonObject,
} from './types.js';

// Keys that may hold the asset array, in priority order
export const COLLECTION_KEYS = ['assets', 'items', 'data', 'results'] as const;

// Keys that may hold the download URL, in priority order
export const URL_KEYS = ['downloadLink', 'download_link', 'url', 'link', 'downloadUrl'] as const;

const DEFAULT_EXTENSION = '.zip';

/**
 * Locate the asset array inside parsed JSON.
 * An object is scanned for the collection keys; an array is used as is.
 */
export function findAssetArray(value: JsonValue): JsonValue[] | undefined {
    if (isJsonObject(value)) {
        for (const key of COLLECTION_KEYS) {
            const candidate = value[key];
            if (isJsonArray(candidate)) {
                return candidate;
            }
        }
    }

    return isJsonArray(value) ? value : undefined;
}

/**
 * First present URL key wins, even when its value is unusable
 */
export function findDownloadUrl(record: JsonValue): string | undefined {
    if (!isJsonObject(record)) return undefined;

    const key = firstPresentKey(record, URL_KEYS);
    if (key === undefined) return undefined;

    const value = record[key];
    if (typeof value !== 'string' || value.trim() === '') return undefined;

    return decodeHTML(value);
}

/**
 * Last path segment of a URL with the query string removed
 */
export function urlBasename(url: string): string {
    const path = url.split('?')[0];
    return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Extension of a filename including the dot; leading dots do not count.
 * `y.tar.gz` gives `.gz`.
 */
export function extensionOf(filename: string): string {
    const stripped = filename.replace(/^\.+/, '');
    const dot = stripped.lastIndexOf('.');
    return dot === -1 ? '' : stripped.slice(dot);
}

/**
 * Pick a filename from record metadata, falling back to the URL
 */
export function deriveFilename(record: JsonValue, url: string): string {
    const fromUrl = urlBasename(url);
    if (!isJsonObject(record)) return fromUrl;

    if (hasKey(record, 'name') && hasKey(record, 'type')) {
        const ext = extensionOf(fromUrl) || DEFAULT_EXTENSION;
        return `${formatJsonValue(record.name)}.${formatJsonValue(record.type)}${ext}`;
    }

    if (hasKey(record, 'filename')) {
        return formatJsonValue(record.filename);
    }

    if (hasKey(record, 'name')) {
        return `${formatJsonValue(record.name)}${DEFAULT_EXTENSION}`;
    }

    return fromUrl;
}

/**
 * Keep letters, digits, `.`, `_`, `-` and space. Everything else is dropped.
 */
export function sanitizeFilename(filename: string): string {
    return filename.replace(/[^\p{L}\p{N}._\- ]/gu, '');
}

/**
 * Resolve one element of the asset array into a download entry,
 * or the reason it has to be skipped
 */
export function resolveAssetEntry(
    element: JsonValue,
    index: number,
    outputDir: string
): AssetEntry | SkippedAsset {
    if (!isJsonObject(element)) {
        return { index, reason: 'not_an_object' };
    }

    const url = findDownloadUrl(element);
    if (url === undefined) {
        return { index, reason: 'missing_url' };
    }

    // `.` and `..` would resolve outside the file itself
    const filename = sanitizeFilename(deriveFilename(element, url));
    if (/^\.*$/.test(filename)) {
        return { index, reason: 'empty_filename' };
    }

    return {
        index,
        url,
        filename,
        outputPath: join(outputDir, filename),
    };
}

export function isSkipped(result: AssetEntry | SkippedAsset): result is SkippedAsset {
    return 'reason' in result;
}
