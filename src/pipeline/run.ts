/**
 * Pipeline Runner
 *
 * One run = scrape -> publish -> commit, strictly in that order, under the
 * run lock. The first failing stage aborts the run: later stages never see
 * its output. In sheet-only mode the scrape and commit stages are skipped and
 * the latest committed snapshot is republished.
 *
 * Stages are passed in as functions so the runner knows nothing about
 * websites, Google or git.
 */

import type { CommitOutcome } from '../commit/index.js';
import { consoleLogger, errorMessage, type Logger } from '../logger.js';
import type { ScrapeResult } from '../scraper/index.js';
import type { PublishResult } from '../sheets/index.js';
import { acquireRunLock, type RunLease } from './run-lock.js';

export type RunMode = 'full' | 'sheet-only';

export type StageName = 'scrape' | 'publish' | 'commit';

export interface PipelineStages {
  scrape(): Promise<ScrapeResult>;
  publish(): Promise<PublishResult>;
  commit(): Promise<CommitOutcome>;
}

export interface RunOptions {
  mode: RunMode;
  stages: PipelineStages;
  /** Omit to run without the overlap lock */
  lock?: { path: string; ttlMs: number };
  now?: () => Date;
  log?: Logger;
}

export interface RunReport {
  mode: RunMode;
  startedAt: string;
  finishedAt: string;
  scrape: ScrapeResult | null;
  publish: PublishResult | null;
  commit: CommitOutcome | null;
}

async function runStage<T>(name: StageName, stage: () => Promise<T>, log: Logger): Promise<T> {
  log.info(`[pipeline] Stage ${name} starting`);
  try {
    const result = await stage();
    log.info(`[pipeline] Stage ${name} done`);
    return result;
  } catch (err) {
    log.error(`[pipeline] Stage ${name} failed; aborting run`, { error: errorMessage(err) });
    throw err;
  }
}

/** A failed release is logged, not thrown, so it never masks the stage error */
async function releaseLease(lease: RunLease, log: Logger): Promise<void> {
  try {
    await lease.release();
  } catch (err) {
    log.error('[pipeline] Failed to release run lock', { path: lease.path, error: errorMessage(err) });
  }
}

export async function runPipeline(options: RunOptions): Promise<RunReport> {
  const log = options.log ?? consoleLogger;
  const now = options.now ?? (() => new Date());
  const { mode, stages } = options;

  const startedAt = now();
  const lease = options.lock ? await acquireRunLock(options.lock.path, options.lock.ttlMs, now) : null;

  const report: RunReport = {
    mode,
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    scrape: null,
    publish: null,
    commit: null,
  };

  try {
    if (mode === 'full') {
      report.scrape = await runStage('scrape', () => stages.scrape(), log);
    }
    report.publish = await runStage('publish', () => stages.publish(), log);
    if (mode === 'full') {
      report.commit = await runStage('commit', () => stages.commit(), log);
    }
  } finally {
    if (lease) await releaseLease(lease, log);
  }

  report.finishedAt = now().toISOString();
  log.info('[pipeline] Run complete', {
    mode,
    events: report.scrape?.events.length ?? null,
    rowsWritten: report.publish?.rowsWritten ?? null,
    commit: report.commit?.status ?? null,
  });
  return report;
}
