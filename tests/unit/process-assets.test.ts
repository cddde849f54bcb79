/**
 * Asset Pipeline Tests
 * Orchestration with a stubbed downloader and in-memory git
 */
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/observability/logger.js', () => {
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
    log.child.mockReturnValue(log);
    return { logger: log, createLogger: () => log };
});

import {
    defaultCommitMessage,
    formatTimestamp,
    processAssets,
    type ProcessOptions,
} from '../../src/pipeline/process-assets.js';
import type { JsonValue } from '../../src/assets/types.js';
import { logger } from '../../src/observability/logger.js';
import { InMemoryGit } from '../fakes/in-memory-git.js';

describe('processAssets', () => {
    let workDir: string;
    let outputDir: string;
    let options: ProcessOptions;
    const download = vi.fn(async (_url: string, _outputPath: string) => true);

    beforeEach(async () => {
        workDir = await mkdtemp(join(tmpdir(), 'asset-sync-pipeline-'));
        outputDir = join(workDir, 'downloaded_assets');
        options = {
            outputDir,
            repoPath: null,
            branch: 'main',
            mock: true,
            managedRunner: false,
        };
        download.mockReset();
        download.mockResolvedValue(true);
    });

    afterEach(async () => {
        vi.clearAllMocks();
        await rm(workDir, { recursive: true, force: true });
    });

    it('should fail without data', async () => {
        const result = await processAssets(null, options, { download });

        expect(result.success).toBe(false);
        expect(download).not.toHaveBeenCalled();
        expect(logger.error).toHaveBeenCalledWith('No valid JSON data to process');
    });

    it('should fail when no asset array is found', async () => {
        const result = await processAssets({ meta: { total: 0 } }, options, { download });

        expect(result.success).toBe(false);
        expect(logger.error).toHaveBeenCalledWith('Could not find asset array in JSON data');
    });

    it('should download from results when it is the only array-valued key', async () => {
        const data = { data: 'n/a', results: [{ url: 'https://cdn.example.com/r.zip' }] };

        const result = await processAssets(data, options, { download });

        expect(result.success).toBe(true);
        expect(download).toHaveBeenCalledWith(
            'https://cdn.example.com/r.zip',
            join(outputDir, 'r.zip'),
            { mock: true, userAgent: undefined, timeoutMs: undefined }
        );
        expect(result.downloadedFiles).toEqual([join(outputDir, 'r.zip')]);
    });

    it('should skip records without a URL and still succeed', async () => {
        const data: JsonValue = [{ name: 'orphan' }, { link: 'https://cdn.example.com/b.tgz' }];

        const result = await processAssets(data, options, { download });

        expect(result.success).toBe(true);
        expect(result.skipped).toEqual([{ index: 0, reason: 'missing_url' }]);
        expect(result.downloadedFiles).toEqual([join(outputDir, 'b.tgz')]);
        expect(logger.warn).toHaveBeenCalledWith('No download link found in asset', { asset: { name: 'orphan' } });
    });

    it('should keep going after a failed download', async () => {
        download.mockResolvedValueOnce(false).mockResolvedValueOnce(true);
        const data = [
            { url: 'https://cdn.example.com/missing.zip' },
            { url: 'https://cdn.example.com/present.zip' },
        ];

        const result = await processAssets(data, options, { download });

        expect(result).toMatchObject({
            success: true,
            failed: 1,
            downloadedFiles: [join(outputDir, 'present.zip')],
            published: null,
        });
    });

    it('should fail when nothing was downloaded', async () => {
        download.mockResolvedValue(false);
        const createVersionControl = vi.fn();

        const result = await processAssets(
            [{ url: 'https://cdn.example.com/a.zip' }],
            { ...options, repoPath: workDir },
            { download, createVersionControl }
        );

        expect(result.success).toBe(false);
        expect(result.published).toBeNull();
        expect(createVersionControl).not.toHaveBeenCalled();
    });

    it('should publish the downloaded files with a generated message', async () => {
        const git = new InMemoryGit(workDir);
        const data: JsonValue = {
            items: [
                { name: 'flow', type: 'pkg', downloadLink: 'https://cdn.example.com/x.jar?sig=1' },
                { filename: 'notes.txt', url: 'https://cdn.example.com/n' },
            ],
        };

        const result = await processAssets(
            data,
            { ...options, repoPath: workDir },
            { download, createVersionControl: () => git, now: () => new Date(2024, 0, 2, 3, 4, 5) }
        );

        expect(result).toMatchObject({ success: true, published: true });
        expect(git.commits).toEqual([
            {
                branch: 'main',
                message: 'Added 2 assets on 2024-01-02 03:04:05',
                files: ['downloaded_assets/flow.pkg.jar', 'downloaded_assets/notes.txt'],
            },
        ]);
    });

    it('should use the supplied commit message', async () => {
        const git = new InMemoryGit(workDir);

        await processAssets(
            [{ url: 'https://cdn.example.com/a.zip' }],
            { ...options, repoPath: workDir, commitMessage: 'Nightly asset refresh' },
            { download, createVersionControl: () => git }
        );

        expect(git.commits[0].message).toBe('Nightly asset refresh');
    });

    it('should report a publish failure but keep the downloaded files list', async () => {
        const git = new InMemoryGit(workDir, { failOn: 'init' });

        const result = await processAssets(
            [{ url: 'https://cdn.example.com/a.zip' }],
            { ...options, repoPath: workDir },
            { download, createVersionControl: () => git }
        );

        expect(result).toMatchObject({
            success: false,
            published: false,
            downloadedFiles: [join(outputDir, 'a.zip')],
        });
    });

    it('should turn unexpected errors into a batch failure', async () => {
        const crash = new Error('disk vanished');
        download.mockResolvedValueOnce(true).mockRejectedValueOnce(crash);

        const result = await processAssets(
            [{ url: 'https://cdn.example.com/a.zip' }, { url: 'https://cdn.example.com/b.zip' }],
            options,
            { download }
        );

        expect(result.success).toBe(false);
        expect(result.downloadedFiles).toEqual([join(outputDir, 'a.zip')]);
        expect(logger.error).toHaveBeenCalledWith('Error processing assets', crash);
    });
});

describe('commit message helpers', () => {
    it('should format local time with zero padding', () => {
        expect(formatTimestamp(new Date(2025, 8, 7, 6, 5, 4))).toBe('2025-09-07 06:05:04');
    });

    it('should include the file count', () => {
        expect(defaultCommitMessage(3, new Date(2025, 11, 31, 23, 59, 58))).toBe('Added 3 assets on 2025-12-31 23:59:58');
    });
});
