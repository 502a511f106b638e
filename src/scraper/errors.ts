// ============================================================================
// Scraper Error Types
// ============================================================================

/**
 * A page (or, at run level, the whole source) could not be fetched.
 * Carries the HTTP status when the server answered at all.
 */
export class SourceUnavailableError extends Error {
  readonly url: string;
  readonly statusCode: number | null;

  constructor(message: string, url: string, statusCode: number | null = null) {
    super(message);
    this.name = 'SourceUnavailableError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * A response arrived but was not a parseable HTML page.
 */
export class PageParseError extends Error {
  readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = 'PageParseError';
    this.url = url;
  }
}

/**
 * The crawl finished without extracting a single event. Raised instead of
 * writing an empty snapshot, so the publish and commit stages never run on
 * stale or empty data.
 */
export class EmptySnapshotError extends Error {
  readonly pagesVisited: number;

  constructor(pagesVisited: number) {
    super(`No events extracted from ${pagesVisited} page(s); page structure may have changed`);
    this.name = 'EmptySnapshotError';
    this.pagesVisited = pagesVisited;
  }
}
