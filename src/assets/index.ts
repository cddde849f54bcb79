/**
 * Assets module exports
 */
export {
    COLLECTION_KEYS,
    URL_KEYS,
    findAssetArray,
    findDownloadUrl,
    deriveFilename,
    sanitizeFilename,
    resolveAssetEntry,
    isSkipped,
} from './extractor.js';

export type {
    JsonValue,
    JsonObject,
    AssetRecord,
    AssetEntry,
    SkippedAsset,
    SkipReason,
} from './types.js';
