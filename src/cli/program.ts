/**
 * Command-line definition
 */
import { Command } from 'commander';
import { z } from 'zod';

const VERSION = '1.0.0';

export const DEFAULT_OUTPUT_DIR = './downloaded_assets';
export const DEFAULT_BRANCH = 'main';

// Options as commander hands them over, validated before use
export const runOptionsSchema = z.object({
    jsonFile: z.string().min(1).optional(),
    jsonString: z.string().optional(),
    outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
    gitRepo: z.string().min(1).default('.'),
    gitBranch: z.string().min(1).default(DEFAULT_BRANCH),
    commitMessage: z.string().min(1).optional(),
    mock: z.boolean().default(false),
    skipPublish: z.boolean().default(false),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
    return new Command()
        .name('asset-sync')
        .description('Download assets listed in a JSON document and commit them to a git repository')
        .version(VERSION, '-V, --version', 'Output the version number')
        .option('--json-file <path>', 'Path to JSON file containing assets')
        .option('--json-string <json>', 'JSON string containing assets')
        .option('--output-dir <dir>', 'Directory to save downloaded assets', DEFAULT_OUTPUT_DIR)
        .option('--git-repo <path>', 'Git repository path', '.')
        .option('--git-branch <name>', 'Git branch name', DEFAULT_BRANCH)
        .option('--commit-message <message>', 'Git commit message (defaults to a timestamped summary)')
        .option('--mock', 'Write placeholder files instead of downloading', false)
        .option('--skip-publish', 'Download only; do not touch the git repository', false)
        .addHelpText(
            'after',
            `
Examples:
  $ asset-sync --json-file assets.json --mock --skip-publish
  $ asset-sync --json-file assets.json --git-repo ../artifacts --git-branch assets
`
        );
}

/**
 * Parse process-style argv (node, script, ...args) into run options
 */
export function parseRunOptions(argv: string[], program: Command = createProgram()): RunOptions {
    program.parse(argv);
    return runOptionsSchema.parse(program.opts());
}
