/**
 * One sync run: load input, process assets, report
 */
import { v4 as uuid } from 'uuid';
import { config, getRedactedConfig, type Config } from '../config/index.js';
import { loadJsonInput } from '../input/loader.js';
import { createLogger } from '../observability/logger.js';
import { recordRunFinished, writeMetricsTextfile } from '../observability/metrics.js';
import { processAssets, type ProcessDeps } from '../pipeline/process-assets.js';
import type { RunOptions } from './program.js';

/**
 * Execute a run and return whether it succeeded
 */
export async function run(
    options: RunOptions,
    deps: Partial<ProcessDeps> = {},
    cfg: Config = config
): Promise<boolean> {
    const runId = uuid();
    const log = createLogger({ runId });

    log.info('Starting asset sync', {
        outputDir: options.outputDir,
        gitRepo: options.skipPublish ? null : options.gitRepo,
        gitBranch: options.gitBranch,
        mock: options.mock,
        config: getRedactedConfig(cfg),
    });

    const data = await loadJsonInput({ file: options.jsonFile, json: options.jsonString });

    const result = await processAssets(
        data,
        {
            outputDir: options.outputDir,
            repoPath: options.skipPublish ? null : options.gitRepo,
            branch: options.gitBranch,
            commitMessage: options.commitMessage,
            mock: options.mock,
            managedRunner: cfg.managedRunner,
            userAgent: cfg.downloadUserAgent,
            timeoutMs: cfg.downloadTimeoutMs,
            gitIdentity: { name: cfg.gitUserName, email: cfg.gitUserEmail },
            runId,
        },
        deps
    );

    recordRunFinished(result.success);

    if (cfg.metricsTextfile) {
        try {
            await writeMetricsTextfile(cfg.metricsTextfile);
        } catch (error) {
            log.error('Failed to write metrics textfile', error, { path: cfg.metricsTextfile });
        }
    }

    if (result.success) {
        log.info('Asset download and Git operations completed successfully', {
            downloaded: result.downloadedFiles.length,
        });
    } else {
        log.error('Asset download or Git operations failed');
    }

    return result.success;
}
