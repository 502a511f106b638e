/**
 * Scraper Type Definitions
 *
 * - TrustSite: one crawl root with its labels
 * - EventCandidate: an event as extracted from a single page
 * - SiteCrawlResult: per-site bookkeeping for the run summary
 * - ScrapeResult: what runScrape hands to the pipeline
 *
 * The persisted record shape (EventRecord) lives in src/snapshot/types.ts.
 */

import type { EventRecord, SnapshotWriteResult } from '../snapshot/index.js';

export interface TrustSite {
  /** Homepage URL, also the crawl prefix */
  url: string;
  abbrev: string;
  name: string;
}

export interface EventCandidate {
  title: string;
  /** YYYY-MM-DD */
  date: string | null;
  /** HH:MM, 24h */
  time: string | null;
  description: string | null;
  location: string | null;
  /** Absolute link to the event, when one was found */
  url: string | null;
  /** Page the candidate was extracted from */
  source_url: string;
}

export interface SiteCrawlResult {
  site: TrustSite;
  events: EventRecord[];
  pagesVisited: number;
  pageErrors: number;
  /** Set when the homepage itself could not be fetched */
  failure: string | null;
}

export interface ScrapeResult {
  events: EventRecord[];
  pagesVisited: number;
  failedSites: string[];
  elapsedMs: number;
  snapshot: SnapshotWriteResult;
}
