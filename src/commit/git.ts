/**
 * Git Runner
 *
 * Thin wrapper over the git CLI. The commit stage depends on the GitRunner
 * interface only; tests supply an in-memory repository instead.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface GitRunner {
  /** Working directory git runs in */
  readonly cwd: string;

  /**
   * Runs `git <args>` and resolves with stdout.
   * @throws GitCommandError on a non-zero exit
   */
  run(args: readonly string[]): Promise<string>;
}

/** The git subcommand in an argument list, past any leading `-c key=value` pairs and flags */
export function gitSubcommand(args: readonly string[]): string {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '-c') {
      i++;
      continue;
    }
    if (!args[i].startsWith('-')) return args[i];
  }
  return '';
}

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | null, stderr: string) {
    super(`git ${gitSubcommand(args)} failed${exitCode !== null ? ` (exit ${exitCode})` : ''}: ${stderr.trim() || 'no output'}`);
    this.name = 'GitCommandError';
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

function toGitCommandError(args: readonly string[], err: unknown): GitCommandError {
  if (typeof err !== 'object' || err === null) return new GitCommandError(args, null, String(err));

  const exitCode = 'code' in err && typeof err.code === 'number' ? err.code : null;
  const stderr = 'stderr' in err && typeof err.stderr === 'string' && err.stderr
    ? err.stderr
    : err instanceof Error ? err.message : '';
  return new GitCommandError(args, exitCode, stderr);
}

export function createGitRunner(cwd: string): GitRunner {
  return {
    cwd,
    async run(args) {
      try {
        const { stdout } = await execFileAsync('git', [...args], { cwd, maxBuffer: 16 * 1024 * 1024 });
        return stdout;
      } catch (err) {
        throw toGitCommandError(args, err);
      }
    },
  };
}
