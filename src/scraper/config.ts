/**
 * Scraper Configuration
 *
 * Follows the same pattern as src/config.ts.
 *
 * Environment variables:
 * - SCRAPER_SITES: Comma-separated homepage URLs to crawl (default: every registered trust)
 * - SCRAPER_MAX_DEPTH: Link depth limit; 2 = homepage plus one level (default: 2)
 * - SCRAPER_MAX_PAGES_PER_SITE: Non-event links are only followed below this count (default: 100)
 * - REQUEST_TIMEOUT_MS: Per-request timeout (default: 15000)
 * - REQUEST_DELAY_MS: Pause before every request (default: 1000)
 * - SCRAPER_STRICT: Fail the run if any homepage is unreachable (default: false)
 */

import { boolEnv, intEnv, optionalEnv, type Env } from '../config.js';
import { TRUST_SITES, lookupTrust } from './trusts.js';
import type { TrustSite } from './types.js';

export interface ScraperConfig {
  sites: TrustSite[];
  maxDepth: number;
  maxPagesPerSite: number;
  requestTimeoutMs: number;
  requestDelayMs: number;
  /** Any unreachable homepage fails the run, not only all of them */
  strict: boolean;
  userAgent: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export function loadScraperConfig(env: Env): ScraperConfig {
  const siteList = optionalEnv(env, 'SCRAPER_SITES');
  const sites = siteList
    ? siteList.split(',').map(s => s.trim()).filter(Boolean).map(lookupTrust)
    : [...TRUST_SITES];

  return {
    sites,
    maxDepth: intEnv(env, 'SCRAPER_MAX_DEPTH', 2),
    maxPagesPerSite: intEnv(env, 'SCRAPER_MAX_PAGES_PER_SITE', 100),
    requestTimeoutMs: intEnv(env, 'REQUEST_TIMEOUT_MS', 15000),
    requestDelayMs: intEnv(env, 'REQUEST_DELAY_MS', 1000),
    strict: boolEnv(env, 'SCRAPER_STRICT', false),
    userAgent: optionalEnv(env, 'SCRAPER_USER_AGENT', DEFAULT_USER_AGENT),
  };
}
