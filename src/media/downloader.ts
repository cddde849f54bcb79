/**
 * Asset Downloader
 * Streams assets over HTTP, or writes placeholders in mock mode
 */
import { createWriteStream } from 'fs';
import { mkdir, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { logger } from '../observability/logger.js';
import { assetsDownloaded, downloadBytes, downloadFailures } from '../observability/metrics.js';

export interface DownloadOptions {
    mock: boolean;
    userAgent?: string;
    timeoutMs?: number | null;
}

/**
 * Placeholder written instead of the real asset in mock mode
 */
export function mockContent(url: string): string {
    return [
        `Placeholder content for ${url}`,
        'This file was generated in mock mode; no network request was made.',
        `A live run would store the content downloaded from ${url}.`,
        '',
    ].join('\n');
}

/**
 * Write a placeholder file
 */
async function writeMockFile(url: string, outputPath: string): Promise<void> {
    await writeFile(outputPath, mockContent(url), 'utf-8');
    assetsDownloaded.inc({ mode: 'mock' });
    logger.info('Mock downloaded', { outputPath });
}

/**
 * Stream a URL to disk. Returns false on any non-2xx status.
 */
async function writeHttpFile(
    url: string,
    outputPath: string,
    options: DownloadOptions
): Promise<boolean> {
    logger.info('Downloading', { url });

    const response = await fetch(url, {
        headers: {
            'User-Agent': options.userAgent || 'asset-sync/1.0',
        },
        signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
    });

    if (!response.ok) {
        if (response.status === 404) {
            logger.error(`URL not found: ${url}`);
            logger.info('If you are testing with example URLs, use the --mock flag to create placeholder files.');
            downloadFailures.inc({ reason: 'not_found' });
        } else {
            logger.error(`Failed to download ${url}: ${response.status} ${response.statusText}`, undefined, {
                status: response.status,
            });
            downloadFailures.inc({ reason: 'http_status' });
        }
        // Release the connection; the error body is never read
        await response.body?.cancel();
        return false;
    }

    if (response.body) {
        await pipeline(Readable.fromWeb(response.body), createWriteStream(outputPath));
    } else {
        await writeFile(outputPath, '');
    }

    const fileStats = await stat(outputPath);
    downloadBytes.inc(fileStats.size);
    assetsDownloaded.inc({ mode: 'live' });

    logger.info('Downloaded', { outputPath, size: fileStats.size });
    return true;
}

/**
 * Download one asset to `outputPath`.
 * Never throws: every failure is logged and reported as false.
 */
export async function downloadFile(
    url: string,
    outputPath: string,
    options: DownloadOptions
): Promise<boolean> {
    try {
        await mkdir(dirname(outputPath), { recursive: true });

        if (options.mock) {
            await writeMockFile(url, outputPath);
            return true;
        }

        return await writeHttpFile(url, outputPath, options);
    } catch (error) {
        const reason = error instanceof Error && error.name === 'TimeoutError' ? 'timeout' : 'transport';
        downloadFailures.inc({ reason });
        logger.error(`Failed to download ${url}`, error);
        return false;
    }
}
