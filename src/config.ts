/**
 * Shared Application Configuration
 *
 * Env helpers plus the run-level settings (results directory, run lock, git
 * author). Module-specific settings live beside their module:
 * src/scraper/config.ts and src/sheets/config.ts follow the same pattern.
 *
 * Loaders take an explicit env object and return plain config values; nothing
 * below src/index.ts reads process.env directly.
 *
 * Environment variables:
 * - RESULTS_DIR: Directory holding snapshots (default: scraper_results)
 * - RUN_LOCK_PATH: Lease file guarding against overlapping runs (default: .scraper-run.lock)
 * - RUN_LOCK_TTL_MS: Lease lifetime before another run may take it over (default: 2h)
 * - GIT_AUTHOR_NAME / GIT_AUTHOR_EMAIL: Identity for the results commit
 * - COMMIT_PUSH: Set to 'false' to commit without pushing
 */

import { z } from 'zod';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  resultsDir: string;
  lock: {
    path: string;
    ttlMs: number;
  };
  git: {
    authorName: string;
    authorEmail: string;
    push: boolean;
  };
}

export function optionalEnv(env: Env, key: string, fallback = ''): string {
  const value = env[key];
  return value === undefined || value === '' ? fallback : value;
}

const nonNegativeInt = z.coerce.number().int().nonnegative();

/**
 * Parses a non-negative integer env var, throwing with the variable name on junk input.
 */
export function intEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const parsed = nonNegativeInt.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid value for ${key}: expected a non-negative integer, got "${raw}"`);
  }
  return parsed.data;
}

export function boolEnv(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  return raw.toLowerCase() === 'true';
}

export function loadAppConfig(env: Env): AppConfig {
  return {
    resultsDir: optionalEnv(env, 'RESULTS_DIR', 'scraper_results'),
    lock: {
      path: optionalEnv(env, 'RUN_LOCK_PATH', '.scraper-run.lock'),
      ttlMs: intEnv(env, 'RUN_LOCK_TTL_MS', 2 * 60 * 60 * 1000),
    },
    git: {
      authorName: optionalEnv(env, 'GIT_AUTHOR_NAME', 'GitHub Actions Bot'),
      authorEmail: optionalEnv(env, 'GIT_AUTHOR_EMAIL', 'actions@github.com'),
      push: boolEnv(env, 'COMMIT_PUSH', true),
    },
  };
}
