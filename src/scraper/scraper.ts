/**
 * Scrape Stage
 *
 * Crawls every configured trust site in turn, merges and orders the findings,
 * and persists them as a snapshot. Fails loudly, before anything is written,
 * when the source is unreachable or nothing could be parsed:
 *
 *   - SourceUnavailableError: every homepage failed (strict mode: any homepage failed)
 *   - EmptySnapshotError: pages loaded but no events were extracted
 *
 * Main export: runScrape(config, resultsDir, deps)
 */

import { setTimeout as delay } from 'node:timers/promises';
import { consoleLogger, type Logger } from '../logger.js';
import { writeSnapshot, type EventRecord } from '../snapshot/index.js';
import type { ScraperConfig } from './config.js';
import { crawlSite } from './crawler.js';
import { EventDeduplicator } from './dedup.js';
import { EmptySnapshotError, SourceUnavailableError } from './errors.js';
import { createPageFetcher, type PageFetcher } from './fetcher.js';
import type { ScrapeResult, SiteCrawlResult } from './types.js';

export interface ScrapeDeps {
  /** Defaults to a fetch-based fetcher built from the config */
  fetchPage?: PageFetcher;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  log?: Logger;
}

/**
 * Orders records by date, undated ones last; records sharing a date keep crawl order.
 */
export function sortByDate(events: readonly EventRecord[]): EventRecord[] {
  return [...events].sort((a, b) => {
    if (a.date === b.date) return 0;
    if (a.date === null) return 1;
    if (b.date === null) return -1;
    return a.date < b.date ? -1 : 1;
  });
}

export async function runScrape(config: ScraperConfig, resultsDir: string, deps: ScrapeDeps = {}): Promise<ScrapeResult> {
  const log = deps.log ?? consoleLogger;
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const fetchPage = deps.fetchPage ?? createPageFetcher({
    timeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
  });

  if (config.sites.length === 0) {
    throw new Error('No trust sites configured. Check SCRAPER_SITES.');
  }

  const startedAt = now();
  const dedup = new EventDeduplicator();
  const results: SiteCrawlResult[] = [];

  log.info('[scraper] Searching for events', { sites: config.sites.length, maxDepth: config.maxDepth });

  for (const site of config.sites) {
    log.info(`[scraper] Examining ${site.url}`, { site: site.abbrev });
    const result = await crawlSite(
      site,
      {
        maxDepth: config.maxDepth,
        maxPagesPerSite: config.maxPagesPerSite,
        requestDelayMs: config.requestDelayMs,
        referenceYear: startedAt.getUTCFullYear(),
      },
      { fetchPage, sleep, dedup, log },
    );
    results.push(result);
    log.info('[scraper] Site done', {
      site: site.abbrev,
      pagesVisited: result.pagesVisited,
      events: result.events.length,
      pageErrors: result.pageErrors,
      failed: result.failure !== null,
    });
  }

  const failed = results.filter(r => r.failure !== null);
  if (failed.length === results.length || (config.strict && failed.length > 0)) {
    const detail = failed.map(r => `${r.site.url} (${r.failure ?? 'unknown error'})`).join('; ');
    throw new SourceUnavailableError(
      `${failed.length} of ${results.length} trust site(s) unreachable: ${detail}`,
      failed.map(r => r.site.url).join(', '),
    );
  }

  const pagesVisited = results.reduce((n, r) => n + r.pagesVisited, 0);
  const events = sortByDate(results.flatMap(r => r.events));
  if (events.length === 0) {
    throw new EmptySnapshotError(pagesVisited);
  }

  const snapshot = await writeSnapshot(resultsDir, events, startedAt);
  const elapsedMs = now().getTime() - startedAt.getTime();

  log.info('[scraper] Search complete', {
    elapsedSeconds: (elapsedMs / 1000).toFixed(2),
    pagesVisited,
    events: events.length,
    failedSites: failed.length,
    snapshot: snapshot.manifest.latest,
    written: snapshot.written,
  });

  return {
    events,
    pagesVisited,
    failedSites: failed.map(r => r.site.url),
    elapsedMs,
    snapshot,
  };
}
