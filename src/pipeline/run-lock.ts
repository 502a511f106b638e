/**
 * Run Lock — lease file guarding against overlapping runs
 *
 * A run creates the lease file exclusively before touching the results
 * directory or the sheet. The lease is written to a private temp file and
 * hard-linked into place, so the lock file never exists half-written. A second
 * run finding a live lease fails with RunLockedError; a lease past its expiry
 * (a crashed run) is taken over.
 * Release only removes the file if it still holds this run's token.
 *
 * Takeover renames the stale file aside before creating a new one. If the
 * file moved aside turns out to be a fresh lease written by a concurrent
 * takeover, it is put back and this run backs off.
 */

import { randomUUID } from 'node:crypto';
import { link, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { z } from 'zod';

const LeaseInfoSchema = z.object({
  token: z.string(),
  pid: z.number(),
  acquiredAt: z.string(),
  expiresAt: z.string(),
});

export type LeaseInfo = z.infer<typeof LeaseInfoSchema>;

export interface RunLease {
  readonly path: string;
  readonly info: LeaseInfo;
  release(): Promise<void>;
}

export class RunLockedError extends Error {
  readonly lockPath: string;
  readonly holder: LeaseInfo | null;

  constructor(lockPath: string, holder: LeaseInfo | null) {
    super(
      holder
        ? `Another run holds ${lockPath} (pid ${holder.pid}, since ${holder.acquiredAt}, expires ${holder.expiresAt})`
        : `Could not acquire ${lockPath}`,
    );
    this.name = 'RunLockedError';
    this.lockPath = lockPath;
    this.holder = holder;
  }
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Reads the current lease. Null if the file is gone or unparseable; an
 * unparseable lease is treated as stale.
 */
export async function readLease(lockPath: string): Promise<LeaseInfo | null> {
  let raw: string;
  try {
    raw = await readFile(lockPath, 'utf-8');
  } catch (err) {
    if (hasCode(err, 'ENOENT')) return null;
    throw err;
  }

  try {
    const parsed = LeaseInfoSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Links a file into place; false if something already holds the path */
async function linkExclusive(fromPath: string, lockPath: string): Promise<boolean> {
  try {
    await link(fromPath, lockPath);
    return true;
  } catch (err) {
    if (hasCode(err, 'EEXIST')) return false;
    throw err;
  }
}

async function createLease(lockPath: string, info: LeaseInfo): Promise<boolean> {
  const tmpPath = `${lockPath}.${info.token}.tmp`;
  await writeFile(tmpPath, JSON.stringify(info), 'utf-8');
  try {
    return await linkExclusive(tmpPath, lockPath);
  } finally {
    await rm(tmpPath, { force: true });
  }
}

export async function acquireRunLock(
  lockPath: string,
  ttlMs: number,
  now: () => Date = () => new Date(),
): Promise<RunLease> {
  const acquiredAt = now();
  const info: LeaseInfo = {
    token: randomUUID(),
    pid: process.pid,
    acquiredAt: acquiredAt.toISOString(),
    expiresAt: new Date(acquiredAt.getTime() + ttlMs).toISOString(),
  };

  for (let attempt = 0; attempt < 3; attempt++) {
    if (await createLease(lockPath, info)) {
      return {
        path: lockPath,
        info,
        release: async () => {
          const current = await readLease(lockPath);
          if (current?.token === info.token) await rm(lockPath, { force: true });
        },
      };
    }

    const holder = await readLease(lockPath);
    if (holder && Date.parse(holder.expiresAt) > acquiredAt.getTime()) {
      throw new RunLockedError(lockPath, holder);
    }
    await takeOver(lockPath, holder, info.token);
  }

  throw new RunLockedError(lockPath, await readLease(lockPath));
}

/**
 * Moves an expired or unreadable lease out of the way.
 *
 * @throws RunLockedError if what got moved was not the lease judged stale
 */
async function takeOver(lockPath: string, stale: LeaseInfo | null, token: string): Promise<void> {
  const asidePath = `${lockPath}.${token}.stale`;
  try {
    await rename(lockPath, asidePath);
  } catch (err) {
    // Already moved by another run
    if (hasCode(err, 'ENOENT')) return;
    throw err;
  }

  try {
    const moved = await readLease(asidePath);
    if (moved === null || moved.token === stale?.token) return;

    // A concurrent run's fresh lease: put it back and back off
    await linkExclusive(asidePath, lockPath);
    throw new RunLockedError(lockPath, moved);
  } finally {
    await rm(asidePath, { force: true });
  }
}
