/**
 * Scraper Module — Public API
 */

export { runScrape, sortByDate } from './scraper.js';
export type { ScrapeDeps } from './scraper.js';
export { loadScraperConfig, DEFAULT_USER_AGENT } from './config.js';
export type { ScraperConfig } from './config.js';
export { TRUST_SITES, lookupTrust } from './trusts.js';
export { fetchPage, createPageFetcher } from './fetcher.js';
export type { PageFetcher, FetchFn } from './fetcher.js';
export { SourceUnavailableError, PageParseError, EmptySnapshotError } from './errors.js';
export type { TrustSite, EventCandidate, ScrapeResult, SiteCrawlResult } from './types.js';
