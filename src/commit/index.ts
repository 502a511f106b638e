/**
 * Commit Module — Public API
 */

export { commitResults, commitMessage, readCommittedManifest } from './commit-stage.js';
export type { CommitOptions, CommitOutcome } from './commit-stage.js';
export { createGitRunner, GitCommandError } from './git.js';
export type { GitRunner } from './git.js';
