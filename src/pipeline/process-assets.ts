/**
 * Asset processing pipeline
 * Extract → download each asset → publish the written files
 */
import { mkdir } from 'fs/promises';
import {
    findAssetArray,
    isSkipped,
    resolveAssetEntry,
    type JsonValue,
    type SkippedAsset,
} from '../assets/index.js';
import { downloadFile, type DownloadOptions } from '../media/index.js';
import { createLogger, type Logger } from '../observability/logger.js';
import { assetsSkipped } from '../observability/metrics.js';
import { GitClient, publishFiles, type GitIdentity, type VersionControl } from '../publish/index.js';

export interface ProcessOptions {
    outputDir: string;
    // null disables publishing
    repoPath: string | null;
    branch: string;
    commitMessage?: string | null;
    mock: boolean;
    managedRunner: boolean;
    userAgent?: string;
    timeoutMs?: number | null;
    gitIdentity?: GitIdentity;
    runId?: string;
}

export interface ProcessDeps {
    download: (url: string, outputPath: string, options: DownloadOptions) => Promise<boolean>;
    createVersionControl: (repoPath: string, identity: GitIdentity) => VersionControl;
    now: () => Date;
}

export interface ProcessResult {
    success: boolean;
    downloadedFiles: string[];
    skipped: SkippedAsset[];
    failed: number;
    // null when publishing was not attempted
    published: boolean | null;
}

const defaultDeps: ProcessDeps = {
    download: downloadFile,
    createVersionControl: (repoPath, identity) => new GitClient(repoPath, identity),
    now: () => new Date(),
};

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:mm:ss`
 */
export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function defaultCommitMessage(fileCount: number, date: Date): string {
    return `Added ${fileCount} assets on ${formatTimestamp(date)}`;
}

function failure(partial: Partial<ProcessResult> = {}): ProcessResult {
    return {
        success: false,
        downloadedFiles: [],
        skipped: [],
        failed: 0,
        published: null,
        ...partial,
    };
}

function logSkip(log: Logger, skip: SkippedAsset, element: JsonValue): void {
    switch (skip.reason) {
        case 'not_an_object':
            log.warn('Asset entry is not an object, skipping', { asset: element });
            break;
        case 'missing_url':
            log.warn('No download link found in asset', { asset: element });
            break;
        case 'empty_filename':
            log.warn('Could not derive a usable filename for asset', { asset: element });
            break;
    }
}

/**
 * Download every asset in `data` and publish the results.
 * Per-asset problems are logged and skipped; input and publish
 * problems fail the whole run.
 */
export async function processAssets(
    data: JsonValue | null,
    options: ProcessOptions,
    deps: Partial<ProcessDeps> = {}
): Promise<ProcessResult> {
    const { download, createVersionControl, now } = { ...defaultDeps, ...deps };
    const log = createLogger({ runId: options.runId, stage: 'extract' });

    if (data === null) {
        log.error('No valid JSON data to process');
        return failure();
    }

    const downloadedFiles: string[] = [];
    const skipped: SkippedAsset[] = [];
    let failed = 0;

    try {
        await mkdir(options.outputDir, { recursive: true });

        const assets = findAssetArray(data);
        if (!assets) {
            log.error('Could not find asset array in JSON data');
            return failure();
        }

        log.info(`Found ${assets.length} asset records`);

        const downloadOptions: DownloadOptions = {
            mock: options.mock,
            userAgent: options.userAgent,
            timeoutMs: options.timeoutMs,
        };

        for (const [index, element] of assets.entries()) {
            const entry = resolveAssetEntry(element, index, options.outputDir);

            if (isSkipped(entry)) {
                logSkip(log.child({ assetIndex: index }), entry, element);
                assetsSkipped.inc({ reason: entry.reason });
                skipped.push(entry);
                continue;
            }

            if (await download(entry.url, entry.outputPath, downloadOptions)) {
                downloadedFiles.push(entry.outputPath);
            } else {
                failed++;
            }
        }
    } catch (error) {
        log.error('Error processing assets', error);
        return failure({ downloadedFiles, skipped, failed });
    }

    log.info(`Downloaded ${downloadedFiles.length} assets`, {
        skipped: skipped.length,
        failed,
    });

    if (options.repoPath !== null && downloadedFiles.length > 0) {
        const message = options.commitMessage || defaultCommitMessage(downloadedFiles.length, now());
        const published = await publishFiles(createVersionControl(options.repoPath, options.gitIdentity ?? {}), {
            files: downloadedFiles,
            branch: options.branch,
            message,
            managedRunner: options.managedRunner,
        });

        return { success: published, downloadedFiles, skipped, failed, published };
    }

    return {
        success: downloadedFiles.length > 0,
        downloadedFiles,
        skipped,
        failed,
        published: null,
    };
}
