/**
 * Site Crawler
 *
 * Depth-first crawl of one trust site, sequential, one request at a time:
 *
 *   - Starts at the homepage (depth 0); pages at depth >= maxDepth are not fetched.
 *   - Follows only links under the site's homepage URL, skipping fragments,
 *     javascript:/mailto:/tel: links and PDF/image files.
 *   - Event-looking links (/events, /calendar, ...) are always followed; other
 *     links only while fewer than maxPagesPerSite pages have been visited.
 *   - Extracts events from likely event pages at any depth, and from every
 *     depth-0 page whatever it looks like.
 *
 * A homepage that cannot be fetched marks the site as failed. Deeper pages
 * that fail are logged and counted but do not fail the site.
 */

import * as cheerio from 'cheerio';
import type { Logger } from '../logger.js';
import { errorMessage } from '../logger.js';
import type { EventRecord } from '../snapshot/index.js';
import type { EventDeduplicator } from './dedup.js';
import { PageParseError, SourceUnavailableError } from './errors.js';
import { extractEventDetails, resolveUrl } from './extractor.js';
import type { PageFetcher } from './fetcher.js';
import { hasEventUrlPattern, isLikelyEventPage } from './page-classifier.js';
import type { EventCandidate, SiteCrawlResult, TrustSite } from './types.js';

export interface CrawlOptions {
  maxDepth: number;
  maxPagesPerSite: number;
  requestDelayMs: number;
  /** Year assumed for dates written without one */
  referenceYear: number;
}

export interface CrawlDeps {
  fetchPage: PageFetcher;
  sleep: (ms: number) => Promise<void>;
  dedup: EventDeduplicator;
  log: Logger;
}

const SKIPPED_LINK_FRAGMENTS = ['#', 'javascript:', 'mailto:', 'tel:', '.pdf', '.jpg', '.png'];

export function isFollowableLink(url: string, siteUrl: string): boolean {
  return url.startsWith(siteUrl) && !SKIPPED_LINK_FRAGMENTS.some(fragment => url.includes(fragment));
}

export function toEventRecord(site: TrustSite, pageUrl: string, event: EventCandidate): EventRecord {
  return {
    trust_site: site.url,
    trust_abbrev: site.abbrev,
    trust_name: site.name,
    page_url: pageUrl,
    title: event.title,
    date: event.date,
    time: event.time,
    description: event.description,
    location: event.location,
    event_url: event.url,
  };
}

export async function crawlSite(site: TrustSite, options: CrawlOptions, deps: CrawlDeps): Promise<SiteCrawlResult> {
  const visited = new Set<string>();
  const events: EventRecord[] = [];
  let pageErrors = 0;
  let failure: string | null = null;

  const crawlPage = async (url: string, depth: number): Promise<void> => {
    if (depth >= options.maxDepth || visited.has(url)) return;
    visited.add(url);

    if (options.requestDelayMs > 0) await deps.sleep(options.requestDelayMs);

    let html: string;
    try {
      html = await deps.fetchPage(url);
    } catch (err) {
      if (!(err instanceof SourceUnavailableError || err instanceof PageParseError)) throw err;
      deps.log.warn('[scraper] Page skipped', { site: site.abbrev, url, depth, error: err.message });
      if (depth === 0) failure = err.message;
      else pageErrors++;
      return;
    }

    const $ = cheerio.load(html);
    const eventPage = isLikelyEventPage(url, $);

    if (eventPage || depth < 1) {
      const candidates = extractEventDetails($, url, options.referenceYear);
      let added = 0;
      for (const candidate of candidates) {
        if (!deps.dedup.add(candidate)) continue;
        events.push(toEventRecord(site, url, candidate));
        added++;
      }
      if (candidates.length > 0) {
        deps.log.info(`[scraper] Found ${candidates.length} events on ${eventPage ? '' : 'non-event page '}${url}`, {
          site: site.abbrev,
          new: added,
        });
      }
    }

    if (depth + 1 >= options.maxDepth) return;

    for (const anchor of $('a[href]').toArray()) {
      const href = $(anchor).attr('href');
      const target = href ? resolveUrl(href, url) : null;
      if (!target || !isFollowableLink(target, site.url)) continue;

      if (hasEventUrlPattern(target) || visited.size < options.maxPagesPerSite) {
        await crawlPage(target, depth + 1);
      }
    }
  };

  try {
    await crawlPage(site.url, 0);
  } catch (err) {
    deps.log.error('[scraper] Unexpected error while crawling', { site: site.abbrev, error: errorMessage(err) });
    throw err;
  }

  return { site, events, pagesVisited: visited.size, pageErrors, failure };
}
