/**
 * Run-wide event de-duplication.
 *
 * Nested containers and the fallback strategies routinely surface the same
 * event twice from one page. Identity is title + date + page; the same event
 * listed on two different pages is kept twice, once per page.
 */

import type { EventCandidate } from './types.js';

export function eventKey(event: EventCandidate): string {
  return `${event.title}-${event.date ?? ''}-${event.source_url}`;
}

export class EventDeduplicator {
  private readonly seen = new Set<string>();

  /**
   * Records the event and reports whether it was new.
   */
  add(event: EventCandidate): boolean {
    const key = eventKey(event);
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}
