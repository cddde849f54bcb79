/**
 * CLI Option Parsing Tests
 */
import { describe, it, expect } from 'vitest';
import { parseRunOptions, runOptionsSchema } from '../../src/cli/program.js';

const argv = (...args: string[]) => ['node', 'asset-sync', ...args];

describe('parseRunOptions', () => {
    it('should apply defaults', () => {
        expect(parseRunOptions(argv('--json-file', 'assets.json'))).toEqual({
            jsonFile: 'assets.json',
            outputDir: './downloaded_assets',
            gitRepo: '.',
            gitBranch: 'main',
            mock: false,
            skipPublish: false,
        });
    });

    it('should read every flag', () => {
        const options = parseRunOptions(argv(
            '--json-string', '[]',
            '--output-dir', 'out',
            '--git-repo', '../repo',
            '--git-branch', 'assets',
            '--commit-message', 'Refresh assets',
            '--mock',
            '--skip-publish',
        ));

        expect(options).toEqual({
            jsonString: '[]',
            outputDir: 'out',
            gitRepo: '../repo',
            gitBranch: 'assets',
            commitMessage: 'Refresh assets',
            mock: true,
            skipPublish: true,
        });
    });

    it('should reject an empty branch name', () => {
        expect(runOptionsSchema.safeParse({ gitBranch: '' }).success).toBe(false);
    });
});
