/**
 * Repository Publisher
 *
 * Two modes:
 * - Managed runner: the CI job already checked out and configured the
 *   repository, so only stage, commit and push to the tracked upstream.
 * - Standalone: initialise the repository if needed, switch to the target
 *   branch, commit, and push to `origin` when that remote exists.
 */
import { isAbsolute, relative, resolve } from 'path';
import { createLogger, type Logger } from '../observability/logger.js';
import { publishOutcome } from '../observability/metrics.js';
import type { VersionControl } from './git-client.js';

export interface PublishRequest {
    files: string[];
    branch: string;
    message: string;
    managedRunner: boolean;
}

const DEFAULT_REMOTE = 'origin';

/**
 * Path of `file` relative to the repository root
 */
export function toRepoRelative(repoPath: string, file: string): string {
    const absolute = isAbsolute(file) ? file : resolve(file);
    return relative(resolve(repoPath), absolute);
}

/**
 * Stage the files and commit them if anything is staged.
 * Returns false when there was nothing to commit.
 */
async function stageAndCommit(
    git: VersionControl,
    request: PublishRequest,
    log: Logger
): Promise<boolean> {
    for (const file of request.files) {
        await git.add(toRepoRelative(git.repoPath, file));
    }

    const staged = await git.stagedChanges();
    if (staged.length === 0) {
        log.info('No changes to commit');
        return false;
    }

    await git.commit(request.message);
    log.info(`Committed changes with message: ${request.message}`, { files: staged.length });
    return true;
}

async function publishManaged(git: VersionControl, request: PublishRequest, log: Logger): Promise<void> {
    log.info('Running in managed runner environment');

    if (await stageAndCommit(git, request, log)) {
        await git.push();
        log.info('Pushed changes to remote repository');
    }
}

async function publishStandalone(git: VersionControl, request: PublishRequest, log: Logger): Promise<void> {
    if (!(await git.isRepository())) {
        await git.init();
        log.info(`Initialized new Git repository at ${git.repoPath}`);
    }

    if (await git.branchExists(request.branch)) {
        await git.checkout(request.branch);
        log.info(`Checked out existing branch: ${request.branch}`);
    } else {
        await git.checkout(request.branch, true);
        log.info(`Created and checked out new branch: ${request.branch}`);
    }

    if (!(await stageAndCommit(git, request, log))) {
        return;
    }

    const remotes = await git.remotes();
    if (remotes.includes(DEFAULT_REMOTE)) {
        await git.push(DEFAULT_REMOTE, request.branch);
        log.info('Pushed changes to remote repository', { remote: DEFAULT_REMOTE, branch: request.branch });
    } else {
        log.warn('No remote repository configured, skipping push');
    }
}

/**
 * Commit (and where possible push) the downloaded files.
 * Any git failure is logged and reported as false.
 */
export async function publishFiles(git: VersionControl, request: PublishRequest): Promise<boolean> {
    const mode = request.managedRunner ? 'managed' : 'standalone';
    const log = createLogger({ stage: 'publish', repoPath: git.repoPath });

    try {
        if (request.managedRunner) {
            await publishManaged(git, request, log);
        } else {
            await publishStandalone(git, request, log);
        }
        publishOutcome.set({ mode }, 1);
        return true;
    } catch (error) {
        log.error('Git operation failed', error);
        publishOutcome.set({ mode }, 0);
        return false;
    }
}
