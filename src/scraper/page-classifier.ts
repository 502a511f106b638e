/**
 * Event keyword lists and the "is this an events page?" heuristic.
 */

import type { CheerioAPI } from 'cheerio';

/** Words that mark an element, title or heading as event-related */
export const EVENT_KEYWORDS: readonly string[] = [
  'event', 'events', 'workshop', 'webinar', 'conference', 'seminar',
  'meeting', 'meetup', 'calendar', 'upcoming', 'schedule',
  'register', 'registration', 'attend', 'join us',
];

/** URL fragments of typical event listing pages; such links are always followed */
export const EVENT_PAGE_PATTERNS: readonly string[] = [
  '/event', '/events', '/calendar', '/upcoming', '/schedule',
  '/workshop', '/webinar',
];

export function containsEventKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return EVENT_KEYWORDS.some(keyword => lower.includes(keyword));
}

export function hasEventUrlPattern(url: string): boolean {
  const lower = url.toLowerCase();
  return EVENT_PAGE_PATTERNS.some(pattern => lower.includes(pattern));
}

/**
 * A page is likely an events page when its URL, <title> or any h1-h3 says so.
 */
export function isLikelyEventPage(url: string, $: CheerioAPI): boolean {
  if (hasEventUrlPattern(url)) return true;

  const title = $('title').first().text();
  if (title && containsEventKeyword(title)) return true;

  return $('h1, h2, h3')
    .toArray()
    .some(heading => containsEventKeyword($(heading).text()));
}
