#!/usr/bin/env node
/**
 * asset-sync - Main entry point
 *
 * Downloads the assets referenced by a JSON document into a local
 * directory and commits them to a git repository. Exits 0 on success
 * and 1 on any failure.
 */
import { parseRunOptions } from './cli/program.js';
import { run } from './cli/run.js';
import { logger } from './observability/logger.js';

async function main(): Promise<void> {
    const options = parseRunOptions(process.argv);
    const success = await run(options);
    process.exit(success ? 0 : 1);
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

main().catch((error) => {
    logger.error('Asset sync crashed', error);
    process.exit(1);
});
