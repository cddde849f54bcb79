/**
 * Prometheus metrics for a sync run
 * Batch jobs have no scrape endpoint, so the registry is written to a textfile
 */
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// ============================================================================
// ASSET METRICS
// ============================================================================

/**
 * Counter: Assets written to disk by download mode
 */
export const assetsDownloaded = new client.Counter({
    name: 'asset_sync_assets_downloaded_total',
    help: 'Total number of assets written to the output directory',
    labelNames: ['mode'] as const,
    registers: [registry],
});

/**
 * Counter: Records skipped before any download was attempted
 */
export const assetsSkipped = new client.Counter({
    name: 'asset_sync_assets_skipped_total',
    help: 'Asset records skipped during extraction',
    labelNames: ['reason'] as const,
    registers: [registry],
});

/**
 * Counter: Download failures by reason
 */
export const downloadFailures = new client.Counter({
    name: 'asset_sync_download_failures_total',
    help: 'Asset downloads that failed',
    labelNames: ['reason'] as const,
    registers: [registry],
});

/**
 * Counter: Bytes written by live downloads
 */
export const downloadBytes = new client.Counter({
    name: 'asset_sync_download_bytes_total',
    help: 'Total bytes written by live downloads',
    registers: [registry],
});

// ============================================================================
// PUBLISH METRICS
// ============================================================================

/**
 * Gauge: Outcome of the publish step (1 = success, 0 = failure)
 */
export const publishOutcome = new client.Gauge({
    name: 'asset_sync_publish_success',
    help: 'Whether the last publish step succeeded (1) or failed (0)',
    labelNames: ['mode'] as const,
    registers: [registry],
});

/**
 * Gauge: Unix time of the last completed run
 */
export const lastRunTimestamp = new client.Gauge({
    name: 'asset_sync_last_run_timestamp_seconds',
    help: 'Unix time the last run finished',
    labelNames: ['status'] as const,
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}

/**
 * Write the registry to a file for the node-exporter textfile collector
 */
export async function writeMetricsTextfile(filePath: string): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, await getMetrics(), 'utf-8');
}

/**
 * Record the end of a run
 */
export function recordRunFinished(success: boolean, nowMs: number = Date.now()): void {
    lastRunTimestamp.set({ status: success ? 'success' : 'failure' }, Math.floor(nowMs / 1000));
}
