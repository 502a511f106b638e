/**
 * Event Extractor
 *
 * Turns one parsed page into EventCandidates. Strategies, in order:
 *
 *   1. Event containers: div/article/section/li whose class or id contains an
 *      event keyword. Each is mined for title, date, location, description, link.
 *   2. JSON-LD structured data (schema.org Event), when (1) found fewer than 3.
 *   3. Page structure: a heading followed by descriptive paragraphs, when
 *      (1)+(2) still found fewer than 3.
 *
 * Consumers: crawler.ts
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { extractDateAndTime, parseStartDate } from './date-time.js';
import { extractLocation } from './location.js';
import { containsEventKeyword } from './page-classifier.js';
import type { EventCandidate } from './types.js';

/** Below this many events a page is also mined with the fallback strategies */
const FALLBACK_THRESHOLD = 3;

const SUB_EVENT_CLASS_WORDS = ['event', 'item', 'card', 'entry'];
const TITLE_CLASS_WORDS = ['title', 'name', 'headline'];
const DATE_CLASS_WORDS = ['date', 'time', 'when'];
const DATE_TEXT_MARKERS = ['date:', 'when:', 'time:'];
const LOCATION_CLASS_WORDS = ['location', 'venue', 'place', 'where'];
const LOCATION_TEXT_MARKERS = ['location:', 'venue:', 'place:', 'where:'];
const DESCRIPTION_CLASS_WORDS = ['desc', 'content', 'text', 'detail'];
const NAVIGATION_HEADINGS = ['menu', 'navigation', 'main menu'];

const DESCRIPTION_MAX_LENGTH = 300;

// Calendar widget chrome on the Colorado site that otherwise parses as events
const COLORADO_HOST = 'groundworkcolorado.org';
const COLORADO_NOISE_PHRASES = ['0 events', 'events,', 'event search'];
const COLORADO_WEEKDAY_LABEL = /\b(sun|mon|tue|wed|thu|fri|sat)\b/i;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function classMatches($: CheerioAPI, el: Element, words: readonly string[]): boolean {
  const cls = ($(el).attr('class') ?? '').toLowerCase();
  return cls !== '' && words.some(word => cls.includes(word));
}

function descendantsWithClass($: CheerioAPI, $el: Cheerio<Element>, words: readonly string[]): Cheerio<Element> {
  return $el.find('*').filter((_i, child) => classMatches($, child, words));
}

function textsWithMarker($: CheerioAPI, $el: Cheerio<Element>, markers: readonly string[]): string[] {
  return $el
    .find('p, div, span')
    .toArray()
    .map(child => $(child).text().trim())
    .filter(text => markers.some(marker => text.toLowerCase().includes(marker)));
}

function blankCandidate(pageUrl: string): EventCandidate {
  return {
    title: '',
    date: null,
    time: null,
    description: null,
    location: null,
    url: null,
    source_url: pageUrl,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(data: Record<string, unknown>, key: string): string | null {
  const value = data[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

// ---------------------------------------------------------------------------
// Strategy 1: event containers
// ---------------------------------------------------------------------------

/**
 * Mines a single element believed to hold one event. Returns null unless a
 * title longer than 3 characters was found.
 */
export function extractSingleEvent(
  $: CheerioAPI,
  el: Element,
  pageUrl: string,
  referenceYear: number,
): EventCandidate | null {
  const $el = $(el);
  const event = blankCandidate(pageUrl);

  // Title priority: h1 4, h2 3, title-ish class 3, h3 2, h4 1, long <strong> 1, h5 0; ties keep the order collected
  const titleCandidates: { text: string; priority: number }[] = [];
  $el.find('h1, h2, h3, h4, h5').each((_i, heading) => {
    titleCandidates.push({ text: $(heading).text().trim(), priority: 5 - Number(heading.name.slice(1)) });
  });
  $el.find('strong, b').each((_i, strong) => {
    const text = $(strong).text().trim();
    if (text.length > 10) titleCandidates.push({ text, priority: 1 });
  });
  descendantsWithClass($, $el, TITLE_CLASS_WORDS).each((_i, titleEl) => {
    titleCandidates.push({ text: $(titleEl).text().trim(), priority: 3 });
  });

  const best = titleCandidates
    .filter(candidate => candidate.text !== '')
    .sort((a, b) => b.priority - a.priority)[0];
  if (best) event.title = best.text;

  // Date & time
  const dateTexts = [
    ...descendantsWithClass($, $el, DATE_CLASS_WORDS).toArray().map(d => $(d).text().trim()),
    ...textsWithMarker($, $el, DATE_TEXT_MARKERS),
  ];
  for (const text of dateTexts) {
    const found = extractDateAndTime(text, referenceYear);
    if (found.date) {
      event.date = found.date;
      event.time = found.time;
      break;
    }
  }
  if (!event.date) {
    const found = extractDateAndTime($el.text(), referenceYear);
    event.date = found.date;
    event.time = found.time;
  }

  // Location
  const locationTexts = [
    ...descendantsWithClass($, $el, LOCATION_CLASS_WORDS).toArray().map(l => $(l).text().trim()),
    ...textsWithMarker($, $el, LOCATION_TEXT_MARKERS),
  ];
  for (const text of locationTexts) {
    const location = extractLocation(text);
    if (location) {
      event.location = location;
      break;
    }
  }
  if (!event.location) {
    event.location = extractLocation($el.text());
  }

  // Description: longest paragraph or description-classed block that isn't the title
  const descriptions = [
    ...$el.find('p').toArray().map(p => $(p).text().trim()),
    ...descendantsWithClass($, $el, DESCRIPTION_CLASS_WORDS).toArray().map(d => $(d).text().trim()),
  ].filter(text => text.length > 20 && text !== event.title);
  if (descriptions.length > 0) {
    event.description = descriptions.sort((a, b) => b.length - a.length)[0];
  }

  // Link: the element itself, an anchor carrying the title, a "more/details" link, or the first link
  let link: Cheerio<Element> | null = null;
  if (el.name === 'a') {
    link = $el;
  } else {
    const anchors = $el.find('a').toArray().map(a => $(a));
    link =
      (event.title ? anchors.find(a => a.text().trim().includes(event.title)) : undefined) ??
      anchors.find(a => {
        const text = a.text().toLowerCase();
        return text.includes('more') || text.includes('details') || a.find('img').length > 0;
      }) ??
      anchors[0] ??
      null;
  }
  const href = link?.attr('href');
  if (href) event.url = resolveUrl(href, pageUrl);

  return event.title.length > 3 ? event : null;
}

function processEventContainer(
  $: CheerioAPI,
  container: Element,
  pageUrl: string,
  referenceYear: number,
): EventCandidate[] {
  if (container.name === 'li') {
    const event = extractSingleEvent($, container, pageUrl, referenceYear);
    return event ? [event] : [];
  }

  const subEvents = $(container)
    .find('div, article, li')
    .toArray()
    .filter(sub => classMatches($, sub, SUB_EVENT_CLASS_WORDS));

  const targets = subEvents.length > 0 ? subEvents : [container];
  const events: EventCandidate[] = [];
  for (const target of targets) {
    const event = extractSingleEvent($, target, pageUrl, referenceYear);
    if (event) events.push(event);
  }
  return events;
}

export function findEventContainers($: CheerioAPI): Element[] {
  return $('div, article, section, li')
    .toArray()
    .filter(el => {
      const cls = $(el).attr('class') ?? '';
      const id = $(el).attr('id') ?? '';
      return containsEventKeyword(cls) || containsEventKeyword(id);
    });
}

// ---------------------------------------------------------------------------
// Strategy 2: JSON-LD structured data
// ---------------------------------------------------------------------------

function isEventType(data: Record<string, unknown>): boolean {
  const type = data['@type'];
  if (typeof type === 'string') return type === 'Event';
  return Array.isArray(type) && type.includes('Event');
}

function structuredLocation(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (!isRecord(value)) return null;

  const name = stringField(value, 'name');
  if (name) return name;

  const address = value.address;
  if (typeof address === 'string') return address.trim() || null;
  if (isRecord(address)) {
    const parts = ['streetAddress', 'addressLocality', 'addressRegion', 'postalCode']
      .map(field => address[field])
      .filter((part): part is string | number => typeof part === 'string' || typeof part === 'number')
      .map(String);
    return parts.length > 0 ? parts.join(' ') : null;
  }
  return null;
}

export function processStructuredEvent(
  data: Record<string, unknown>,
  pageUrl: string,
  referenceYear: number,
): EventCandidate | null {
  const title = stringField(data, 'name');
  if (!title) return null;

  const event = blankCandidate(pageUrl);
  event.title = title;

  const startDate = stringField(data, 'startDate');
  if (startDate) {
    const found = parseStartDate(startDate, referenceYear);
    event.date = found.date;
    event.time = found.time;
  }

  event.description = stringField(data, 'description');
  event.location = structuredLocation(data.location);

  const url = stringField(data, 'url');
  if (url) event.url = resolveUrl(url, pageUrl);

  return event;
}

export function extractStructuredEvents($: CheerioAPI, pageUrl: string, referenceYear: number): EventCandidate[] {
  const events: EventCandidate[] = [];

  $('script[type="application/ld+json"]').each((_i, script) => {
    let data: unknown;
    try {
      data = JSON.parse($(script).html() ?? '');
    } catch {
      // Malformed block; skip it
      return;
    }

    let items: unknown[] = [];
    if (Array.isArray(data)) items = data;
    else if (isRecord(data) && Array.isArray(data['@graph'])) items = data['@graph'];
    else if (isRecord(data)) items = [data];

    for (const item of items) {
      if (!isRecord(item) || !isEventType(item)) continue;
      const event = processStructuredEvent(item, pageUrl, referenceYear);
      if (event) events.push(event);
    }
  });

  return events;
}

// ---------------------------------------------------------------------------
// Strategy 3: heading + content page structure
// ---------------------------------------------------------------------------

export function extractEventsFromPageStructure($: CheerioAPI, pageUrl: string, referenceYear: number): EventCandidate[] {
  const events: EventCandidate[] = [];

  $('h1, h2, h3, h4').each((_i, heading) => {
    const $heading = $(heading);
    const headingText = $heading.text().trim();
    if (headingText.length < 5 || NAVIGATION_HEADINGS.includes(headingText.toLowerCase())) return;

    // Up to 3 following p/div siblings with real content
    const content: Cheerio<Element>[] = [];
    let next = $heading.next();
    while (next.length > 0 && content.length < 3) {
      const tag = next.get(0)?.name;
      if ((tag === 'p' || tag === 'div') && next.text().trim().length > 20) {
        content.push(next);
      }
      next = next.next();
    }
    if (content.length === 0) return;

    const combined = content.map(c => c.text().trim()).join(' ');

    let found = extractDateAndTime(headingText, referenceYear);
    if (!found.date) found = extractDateAndTime(combined, referenceYear);

    if (!found.date && !containsEventKeyword(headingText)) return;

    let link = $heading.find('a').first();
    if (link.length === 0) link = content[0].find('a').first();
    const href = link.attr('href');

    events.push({
      title: headingText,
      date: found.date,
      time: found.time,
      description: combined.length > DESCRIPTION_MAX_LENGTH
        ? `${combined.slice(0, DESCRIPTION_MAX_LENGTH)}...`
        : combined,
      location: extractLocation(combined),
      url: href ? resolveUrl(href, pageUrl) : null,
      source_url: pageUrl,
    });
  });

  return events;
}

// ---------------------------------------------------------------------------
// Site-specific filtering
// ---------------------------------------------------------------------------

export function isColoradoCalendarNoise(title: string): boolean {
  const trimmed = title.trim();
  if (trimmed.length < 3 || /^\d+$/.test(trimmed)) return true;

  const lower = trimmed.toLowerCase();
  return COLORADO_NOISE_PHRASES.some(phrase => lower.includes(phrase)) || COLORADO_WEEKDAY_LABEL.test(lower);
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Extracts every event candidate from a parsed page.
 *
 * @param referenceYear - Year assumed for dates written without one
 */
export function extractEventDetails($: CheerioAPI, pageUrl: string, referenceYear: number): EventCandidate[] {
  const events: EventCandidate[] = [];

  for (const container of findEventContainers($)) {
    events.push(...processEventContainer($, container, pageUrl, referenceYear));
  }

  if (events.length < FALLBACK_THRESHOLD) {
    events.push(...extractStructuredEvents($, pageUrl, referenceYear));

    if (events.length < FALLBACK_THRESHOLD) {
      events.push(...extractEventsFromPageStructure($, pageUrl, referenceYear));
    }
  }

  if (hostOf(pageUrl).includes(COLORADO_HOST)) {
    return events.filter(event => !isColoradoCalendarNoise(event.title));
  }

  return events;
}
