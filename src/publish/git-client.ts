/**
 * Git client
 * Thin wrapper over the git CLI. Every command runs with the repository
 * as its working directory; the process cwd is never touched.
 */
import { execFile } from 'child_process';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/**
 * The version-control operations the publisher needs
 */
export interface VersionControl {
    readonly repoPath: string;
    isRepository(): Promise<boolean>;
    init(): Promise<void>;
    add(path: string): Promise<void>;
    stagedChanges(): Promise<string[]>;
    commit(message: string): Promise<void>;
    branchExists(branch: string): Promise<boolean>;
    checkout(branch: string, create?: boolean): Promise<void>;
    remotes(): Promise<string[]>;
    push(remote?: string, branch?: string): Promise<void>;
}

export interface GitIdentity {
    name?: string | null;
    email?: string | null;
}

export class GitCommandError extends Error {
    constructor(
        public readonly args: string[],
        public readonly exitCode: number | null,
        public readonly stderr: string
    ) {
        super(`git ${args.join(' ')} failed${exitCode === null ? '' : ` with exit code ${exitCode}`}: ${stderr || 'no output'}`);
        this.name = 'GitCommandError';
    }
}

interface ExecFailure {
    code?: number | string;
    stderr?: string;
    message?: string;
}

function toExecFailure(err: unknown): ExecFailure {
    if (typeof err !== 'object' || err === null) {
        return { message: String(err) };
    }

    const failure: ExecFailure = {};
    if ('code' in err && (typeof err.code === 'number' || typeof err.code === 'string')) {
        failure.code = err.code;
    }
    if ('stderr' in err && typeof err.stderr === 'string') {
        failure.stderr = err.stderr;
    }
    if (err instanceof Error) {
        failure.message = err.message;
    }
    return failure;
}

export class GitClient implements VersionControl {
    readonly repoPath: string;

    constructor(repoPath: string, private readonly identity: GitIdentity = {}) {
        this.repoPath = resolve(repoPath);
    }

    async isRepository(): Promise<boolean> {
        return existsSync(join(this.repoPath, '.git'));
    }

    async init(): Promise<void> {
        await this.exec(['init', this.repoPath], process.cwd());
    }

    async add(path: string): Promise<void> {
        await this.exec(['add', '--', path]);
    }

    /**
     * Paths with staged changes, from `git status --porcelain`
     */
    async stagedChanges(): Promise<string[]> {
        const output = await this.exec(['status', '--porcelain']);
        return parseStagedPaths(output);
    }

    async commit(message: string): Promise<void> {
        await this.exec([...this.identityArgs(), 'commit', '-m', message]);
    }

    async branchExists(branch: string): Promise<boolean> {
        try {
            await this.exec(['rev-parse', '--verify', '--quiet', branch]);
            return true;
        } catch (error) {
            if (error instanceof GitCommandError && error.exitCode !== null) {
                return false;
            }
            throw error;
        }
    }

    async checkout(branch: string, create?: boolean): Promise<void> {
        await this.exec(create ? ['checkout', '-b', branch] : ['checkout', branch]);
    }

    async remotes(): Promise<string[]> {
        const output = await this.exec(['remote']);
        return output.split('\n').map(line => line.trim()).filter(Boolean);
    }

    async push(remote?: string, branch?: string): Promise<void> {
        const args = ['push'];
        if (remote) args.push(remote);
        if (branch) args.push(branch);
        await this.exec(args);
    }

    private identityArgs(): string[] {
        const args: string[] = [];
        if (this.identity.name) args.push('-c', `user.name=${this.identity.name}`);
        if (this.identity.email) args.push('-c', `user.email=${this.identity.email}`);
        return args;
    }

    private async exec(args: string[], cwd: string = this.repoPath): Promise<string> {
        try {
            const { stdout } = await execFileAsync('git', args, {
                cwd,
                maxBuffer: 10 * 1024 * 1024,
            });
            return stdout;
        } catch (err) {
            const failure = toExecFailure(err);
            // A string code means git never ran (e.g. ENOENT)
            const exitCode = typeof failure.code === 'number' ? failure.code : null;
            throw new GitCommandError(args, exitCode, failure.stderr?.trim() || failure.message || 'Unknown git error');
        }
    }
}

/**
 * Staged entries have a non-blank index column that is not `?` (untracked) or `!` (ignored)
 */
export function parseStagedPaths(porcelain: string): string[] {
    const staged: string[] = [];

    for (const line of porcelain.split('\n')) {
        if (line.length < 4) continue;
        const indexStatus = line[0];
        if (indexStatus === ' ' || indexStatus === '?' || indexStatus === '!') continue;
        staged.push(line.slice(3));
    }

    return staged;
}
