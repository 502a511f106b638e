/**
 * Commit Stage
 *
 * Commits the results directory when, and only when, the snapshot changed.
 * "Changed" is decided by comparing the fingerprint in the working
 * manifest.json with the one committed at HEAD, not by asking git whether the
 * tree is dirty. An unchanged snapshot is a successful no-op.
 *
 * Only the results directory is staged and committed. The commit message
 * carries the run date: "Update event data - YYYY-MM-DD".
 */

import path from 'node:path';
import { consoleLogger, type Logger } from '../logger.js';
import { MANIFEST_FILE, isoDay, parseManifest, readManifest, type SnapshotManifest } from '../snapshot/index.js';
import { GitCommandError, type GitRunner } from './git.js';

export type CommitOutcome =
  | { status: 'committed'; message: string; pushed: boolean; fingerprint: string }
  | { status: 'unchanged'; fingerprint: string }
  | { status: 'no-snapshot' };

export interface CommitOptions {
  git: GitRunner;
  /** Results directory; relative paths are taken from the git runner's working directory */
  resultsDir: string;
  authorName: string;
  authorEmail: string;
  push: boolean;
  now?: () => Date;
  log?: Logger;
}

export function commitMessage(runDate: Date): string {
  return `Update event data - ${isoDay(runDate)}`;
}

/**
 * Results directory as a path inside the repository, with forward slashes.
 *
 * @throws Error if the directory lies outside the git working directory
 */
export function repoRelativePath(repoDir: string, resultsDir: string): string {
  const relative = path.relative(repoDir, path.resolve(repoDir, resultsDir));
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new Error(`Results directory ${resultsDir} is outside the repository at ${repoDir}`);
  }
  return relative === '' ? '.' : relative.split(path.sep).join('/');
}

/**
 * Reads the manifest as committed at HEAD. Null when there is no HEAD yet or
 * the manifest was never committed.
 */
export async function readCommittedManifest(git: GitRunner, resultsDir: string): Promise<SnapshotManifest | null> {
  const objectPath = `HEAD:./${path.posix.join(repoRelativePath(git.cwd, resultsDir), MANIFEST_FILE)}`;
  let raw: string;
  try {
    raw = await git.run(['show', objectPath]);
  } catch (err) {
    if (err instanceof GitCommandError) return null;
    throw err;
  }
  return parseManifest(raw, objectPath);
}

export async function commitResults(options: CommitOptions): Promise<CommitOutcome> {
  const log = options.log ?? consoleLogger;
  const now = options.now ?? (() => new Date());
  const { git } = options;
  const resultsDir = repoRelativePath(git.cwd, options.resultsDir);

  const working = await readManifest(path.join(git.cwd, resultsDir));
  if (!working) {
    log.info('[commit] No snapshot in results directory; nothing to commit', { resultsDir });
    return { status: 'no-snapshot' };
  }

  const committed = await readCommittedManifest(git, resultsDir);
  if (committed && committed.fingerprint === working.fingerprint) {
    log.info('[commit] No changes to commit', { resultsDir, snapshot: working.latest });
    return { status: 'unchanged', fingerprint: working.fingerprint };
  }

  const message = commitMessage(now());
  await git.run(['add', '--', resultsDir]);
  await git.run([
    '-c', `user.name=${options.authorName}`,
    '-c', `user.email=${options.authorEmail}`,
    'commit', '-m', message, '--', resultsDir,
  ]);
  log.info('[commit] Committed results', { message, snapshot: working.latest, events: working.eventCount });

  if (options.push) {
    await git.run(['push']);
    log.info('[commit] Pushed');
  }

  return { status: 'committed', message, pushed: options.push, fingerprint: working.fingerprint };
}
