/**
 * Publish module exports
 */
export {
    GitClient,
    GitCommandError,
    parseStagedPaths,
    type VersionControl,
    type GitIdentity,
} from './git-client.js';

export {
    publishFiles,
    toRepoRelative,
    type PublishRequest,
} from './publisher.js';
