/**
 * Configuration module with Zod schema validation
 * Environment-driven settings; per-run options come from the CLI
 */
import { z } from 'zod';

const positiveIntSchema = z.coerce.number().int().positive();
const optionalString = z.string().trim().min(1).nullable().default(null);

// Configuration schema
const configSchema = z.object({
    // Logging & Metrics
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    metricsTextfile: optionalString,

    // Set by GitHub Actions; the repository is already checked out and configured
    managedRunner: z.preprocess(
        (val) => val === 'true',
        z.boolean()
    ),

    // Downloads
    downloadUserAgent: z.string().min(1).default('asset-sync/1.0'),
    downloadTimeoutMs: positiveIntSchema.nullable().default(null),

    // Committer identity for repositories without one
    gitUserName: optionalString,
    gitUserEmail: z.string().trim().email().nullable().default(null),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
    return {
        logLevel: env.LOG_LEVEL || undefined,
        metricsTextfile: env.METRICS_TEXTFILE || null,

        managedRunner: env.GITHUB_ACTIONS,

        downloadUserAgent: env.DOWNLOAD_USER_AGENT || undefined,
        downloadTimeoutMs: env.DOWNLOAD_TIMEOUT_MS || null,

        gitUserName: env.GIT_USER_NAME || null,
        gitUserEmail: env.GIT_USER_EMAIL || null,
    };
}

/**
 * Convert config path to environment variable name
 */
function pathToEnvVar(path: string): string {
    const overrides: Record<string, string> = {
        managedRunner: 'GITHUB_ACTIONS',
        metricsTextfile: 'METRICS_TEXTFILE',
    };
    return overrides[path] ?? path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

/**
 * Parse configuration from an environment map.
 * Returns the list of problems instead of exiting so callers decide what to do.
 */
export function parseConfig(env: NodeJS.ProcessEnv): { config: Config } | { errors: string[] } {
    const result = configSchema.safeParse(mapEnvToConfig(env));

    if (!result.success) {
        return {
            errors: result.error.issues.map(issue => {
                const envVar = pathToEnvVar(issue.path.join('.'));
                return `  - ${envVar}: ${issue.message}`;
            }),
        };
    }

    return { config: result.data };
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    const parsed = parseConfig(process.env);

    if ('errors' in parsed) {
        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are invalid:\n');
        console.error(parsed.errors.join('\n'));
        console.error('\nSee .env.example for the supported configuration.\n');

        process.exit(1);
    }

    return parsed.config;
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        logLevel: cfg.logLevel,
        managedRunner: cfg.managedRunner,
        downloadUserAgent: cfg.downloadUserAgent,
        downloadTimeoutMs: cfg.downloadTimeoutMs,
        gitUserName: cfg.gitUserName,
        gitUserEmail: cfg.gitUserEmail ? '[CONFIGURED]' : null,
        metricsTextfile: cfg.metricsTextfile,
    };
}

// Export singleton config
export const config = loadConfig();
