/**
 * Page Fetcher
 *
 * GETs one HTML page with a timeout that spans the headers and the body. Any
 * network failure, timeout, broken body stream or non-2xx status becomes a
 * SourceUnavailableError; a body that is not HTML becomes a
 * PageParseError. No retries.
 */

import { PageParseError, SourceUnavailableError } from './errors.js';

export type FetchFn = typeof fetch;

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchFn;
}

/** Signature the crawler depends on; tests substitute an in-memory site */
export type PageFetcher = (url: string) => Promise<string>;

/**
 * @returns The response body as text
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  const unavailable = (err: unknown): SourceUnavailableError => {
    const reason = controller.signal.aborted
      ? `timed out after ${options.timeoutMs}ms`
      : err instanceof Error ? err.message : String(err);
    return new SourceUnavailableError(`Error accessing ${url}: ${reason}`, url);
  };

  try {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: {
          'User-Agent': options.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (err) {
      throw unavailable(err);
    }

    if (!response.ok) {
      throw new SourceUnavailableError(
        `Error accessing ${url}: HTTP ${response.status} ${response.statusText}`,
        url,
        response.status,
      );
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType && !/html|xml/i.test(contentType)) {
      throw new PageParseError(`Expected an HTML page from ${url}, got ${contentType}`, url);
    }

    // The timeout covers the body as well as the headers
    try {
      return await response.text();
    } catch (err) {
      throw unavailable(err);
    }
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Binds fetch options into the PageFetcher shape the crawler takes.
 */
export function createPageFetcher(options: FetchPageOptions): PageFetcher {
  return (url: string) => fetchPage(url, options);
}
