/**
 * Site Crawler Tests
 *
 * Runs crawlSite against an in-memory site: link filtering, depth and page
 * limits, de-duplication across nested containers, and failure accounting.
 */

import { describe, it, expect, vi } from 'vitest';
import { silentLogger, type Logger } from '../../logger.js';
import { crawlSite, isFollowableLink, type CrawlOptions } from '../crawler.js';
import { EventDeduplicator } from '../dedup.js';
import { SourceUnavailableError } from '../errors.js';
import { fetchPage as fetchLivePage } from '../fetcher.js';
import type { TrustSite } from '../types.js';

// ============================================================================
// Fixtures
// ============================================================================

const SITE: TrustSite = { url: 'https://gwexample.org/', abbrev: 'GWX', name: 'Example' };

const HOME = `
<html><head><title>Example Trust</title></head><body>
<h1>Welcome</h1>
<a href="/events">Events</a>
<a href="/about">About</a>
<a href="mailto:hi@gwexample.org">Mail</a>
<a href="https://elsewhere.org/events">Partner</a>
<a href="/flyer.pdf">Flyer</a>
</body></html>`;

const EVENTS = `
<html><head><title>Events</title></head><body>
<div class="events">
  <div class="event-item">
    <h3>Creek Cleanup Day</h3>
    <p>May 3, 2025</p>
  </div>
  <div class="event-item">
    <h3>Tree Planting</h3>
    <p>April 12, 2025</p>
  </div>
</div>
</body></html>`;

function inMemorySite(pages: Record<string, string>) {
  return vi.fn(async (url: string): Promise<string> => {
    const html = pages[url];
    if (html === undefined) {
      throw new SourceUnavailableError(`Error accessing ${url}: HTTP 404 Not Found`, url, 404);
    }
    return html;
  });
}

const OPTIONS: CrawlOptions = { maxDepth: 2, maxPagesPerSite: 100, requestDelayMs: 0, referenceYear: 2025 };

function deps(fetchPage: (url: string) => Promise<string>, log: Logger = silentLogger) {
  return {
    fetchPage,
    sleep: vi.fn(async (_ms: number) => {}),
    dedup: new EventDeduplicator(),
    log,
  };
}

// ============================================================================
// isFollowableLink
// ============================================================================

describe('isFollowableLink', () => {
  it('keeps links under the homepage', () => {
    expect(isFollowableLink('https://gwexample.org/events', SITE.url)).toBe(true);
  });

  it('skips other hosts, fragments, mail links and files', () => {
    expect(isFollowableLink('https://elsewhere.org/events', SITE.url)).toBe(false);
    expect(isFollowableLink('https://gwexample.org/#top', SITE.url)).toBe(false);
    expect(isFollowableLink('https://gwexample.org/flyer.pdf', SITE.url)).toBe(false);
    expect(isFollowableLink('mailto:hi@gwexample.org', SITE.url)).toBe(false);
  });
});

// ============================================================================
// crawlSite
// ============================================================================

describe('crawlSite', () => {
  it('crawls one level deep and records each event once', async () => {
    const fetchPage = inMemorySite({
      'https://gwexample.org/': HOME,
      'https://gwexample.org/events': EVENTS,
    });

    const result = await crawlSite(SITE, OPTIONS, deps(fetchPage));

    expect(fetchPage.mock.calls.map(([url]) => url)).toEqual([
      'https://gwexample.org/',
      'https://gwexample.org/events',
      'https://gwexample.org/about',
    ]);
    expect(result.pagesVisited).toBe(3);
    expect(result.pageErrors).toBe(1);
    expect(result.failure).toBeNull();
    expect(result.events).toEqual([
      {
        trust_site: 'https://gwexample.org/',
        trust_abbrev: 'GWX',
        trust_name: 'Example',
        page_url: 'https://gwexample.org/events',
        title: 'Creek Cleanup Day',
        date: '2025-05-03',
        time: null,
        description: null,
        location: null,
        event_url: null,
      },
      {
        trust_site: 'https://gwexample.org/',
        trust_abbrev: 'GWX',
        trust_name: 'Example',
        page_url: 'https://gwexample.org/events',
        title: 'Tree Planting',
        date: '2025-04-12',
        time: null,
        description: null,
        location: null,
        event_url: null,
      },
    ]);
  });

  it('logs how many candidates each page produced', async () => {
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const fetchPage = inMemorySite({
      'https://gwexample.org/': HOME,
      'https://gwexample.org/events': EVENTS,
    });

    await crawlSite(SITE, OPTIONS, deps(fetchPage, log));

    expect(log.info).toHaveBeenCalledWith('[scraper] Found 4 events on https://gwexample.org/events', { site: 'GWX', new: 2 });
    expect(log.warn).toHaveBeenCalledWith('[scraper] Page skipped', {
      site: 'GWX',
      url: 'https://gwexample.org/about',
      depth: 1,
      error: 'Error accessing https://gwexample.org/about: HTTP 404 Not Found',
    });
  });

  it('waits before every request', async () => {
    const fetchPage = inMemorySite({
      'https://gwexample.org/': HOME,
      'https://gwexample.org/events': EVENTS,
    });
    const d = deps(fetchPage);

    await crawlSite(SITE, { ...OPTIONS, requestDelayMs: 500 }, d);

    expect(d.sleep).toHaveBeenCalledTimes(3);
    expect(d.sleep).toHaveBeenCalledWith(500);
  });

  it('follows only event links once the page limit is reached', async () => {
    const fetchPage = inMemorySite({
      'https://gwexample.org/': HOME,
      'https://gwexample.org/events': EVENTS,
    });

    const result = await crawlSite(SITE, { ...OPTIONS, maxPagesPerSite: 1 }, deps(fetchPage));

    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(result.pagesVisited).toBe(2);
    expect(result.pageErrors).toBe(0);
  });

  it('does not follow links at the depth limit', async () => {
    const fetchPage = inMemorySite({ 'https://gwexample.org/': HOME });

    const result = await crawlSite(SITE, { ...OPTIONS, maxDepth: 1 }, deps(fetchPage));

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(result.pagesVisited).toBe(1);
  });

  it('marks the site failed when the homepage is unreachable', async () => {
    const fetchPage = inMemorySite({});

    const result = await crawlSite(SITE, OPTIONS, deps(fetchPage));

    expect(result.failure).toBe('Error accessing https://gwexample.org/: HTTP 404 Not Found');
    expect(result.pagesVisited).toBe(1);
    expect(result.events).toEqual([]);
  });

  it('rethrows errors that are not fetch failures', async () => {
    const fetchPage = vi.fn(async (_url: string): Promise<string> => {
      throw new Error('boom');
    });

    await expect(crawlSite(SITE, OPTIONS, deps(fetchPage))).rejects.toThrow('boom');
  });

  it('counts a page whose body breaks mid-read as a page error and keeps crawling', async () => {
    const bodies: Record<string, string> = {
      'https://gwexample.org/': HOME,
      'https://gwexample.org/events': EVENTS,
    };
    const fetchImpl = vi.fn(async (input: string | URL | Request): Promise<Response> => {
      const body = bodies[String(input)];
      if (body !== undefined) {
        return new Response(body, { status: 200, headers: { 'content-type': 'text/html' } });
      }
      return new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(new TypeError('terminated'));
          },
        }),
        { status: 200, headers: { 'content-type': 'text/html' } },
      );
    });
    const fetchPage = (url: string) => fetchLivePage(url, { timeoutMs: 1000, userAgent: 'test-agent', fetchImpl });

    const result = await crawlSite(SITE, OPTIONS, deps(fetchPage));

    expect(result.failure).toBeNull();
    expect(result.pagesVisited).toBe(3);
    expect(result.pageErrors).toBe(1);
    expect(result.events.map(e => e.title)).toEqual(['Creek Cleanup Day', 'Tree Planting']);
  });
});
