/**
 * Event Extractor Tests
 *
 * Tests cover:
 * - Container strategy: title priority, class-marked date/location, link choice
 * - JSON-LD fallback (@graph, Place location, relative url, malformed blocks)
 * - Heading + paragraph fallback, navigation headings, description cut-off
 * - Colorado calendar noise filter
 */

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import {
  extractEventDetails,
  isColoradoCalendarNoise,
  resolveUrl,
} from '../extractor.js';

const PAGE_URL = 'https://gwexample.org/events';

// ============================================================================
// Container strategy
// ============================================================================

const CARD_PAGE = `
<html><head><title>Upcoming</title></head><body>
<section id="upcoming">
  <article class="card">
    <h3>Spring Tree Planting</h3>
    <span class="date">April 12, 2025 9:00 am</span>
    <p>Location: Lakeside Park</p>
    <p>Help us plant fifty new street trees along the river corridor.</p>
    <a href="/events/tree-planting">Learn more</a>
  </article>
  <article class="card">
    <h2>Creek Cleanup Day</h2>
    <div class="when">5/3/2025</div>
    <p>Bring gloves; we supply bags and grabbers for everyone.</p>
    <a href="https://other.org/signup">Creek Cleanup Day</a>
  </article>
  <article class="card">
    <h4>Pollinator Garden Tour</h4>
    <p>Walk the restored meadow with our ecologist on June 7 from 10am.</p>
  </article>
</section>
</body></html>`;

describe('extractEventDetails: containers', () => {
  const events = extractEventDetails(cheerio.load(CARD_PAGE), PAGE_URL, 2025);

  it('extracts one event per card', () => {
    expect(events.map(e => e.title)).toEqual([
      'Spring Tree Planting',
      'Creek Cleanup Day',
      'Pollinator Garden Tour',
    ]);
  });

  it('reads date, time and location from marked elements', () => {
    expect(events[0]).toEqual({
      title: 'Spring Tree Planting',
      date: '2025-04-12',
      time: '09:00',
      description: 'Help us plant fifty new street trees along the river corridor.',
      location: 'Lakeside Park',
      url: 'https://gwexample.org/events/tree-planting',
      source_url: PAGE_URL,
    });
  });

  it('prefers the anchor carrying the title', () => {
    expect(events[1].url).toBe('https://other.org/signup');
    expect(events[1].date).toBe('2025-05-03');
    expect(events[1].time).toBeNull();
    expect(events[1].location).toBeNull();
  });

  it('falls back to the whole card text for dates', () => {
    expect(events[2]).toMatchObject({
      date: '2025-06-07',
      time: '10:00',
      location: null,
      url: null,
    });
  });
});

// ============================================================================
// JSON-LD fallback
// ============================================================================

describe('extractEventDetails: structured data', () => {
  const html = `
<html><body>
<script type="application/ld+json">{"@context":"https://schema.org","@graph":[{"@type":"Event","name":"Native Plant Sale","startDate":"2025-05-17T08:00:00-04:00","location":{"@type":"Place","name":"Greenhouse Lot"},"url":"/plant-sale","description":"Annual fundraiser."},{"@type":"Organization","name":"Example Trust"}]}</script>
<script type="application/ld+json">{ not json</script>
</body></html>`;

  it('reads schema.org events and skips malformed blocks', () => {
    expect(extractEventDetails(cheerio.load(html), PAGE_URL, 2025)).toEqual([
      {
        title: 'Native Plant Sale',
        date: '2025-05-17',
        time: '08:00',
        description: 'Annual fundraiser.',
        location: 'Greenhouse Lot',
        url: 'https://gwexample.org/plant-sale',
        source_url: PAGE_URL,
      },
    ]);
  });
});

// ============================================================================
// Page structure fallback
// ============================================================================

describe('extractEventDetails: page structure', () => {
  it('pairs headings with the paragraphs that follow', () => {
    const html = `
<body>
<nav><h2>Main Menu</h2><p>Home About Donate Contact Volunteer Today</p></nav>
<div><h2>Youth Green Team Info Session</h2>
<p>Meet the crew on July 9, 2025 from 4:30 pm. Location: Boys and Girls Club.</p></div>
<div><h3>Our History</h3><p>Founded in 2002 to restore vacant lots across the city.</p></div>
</body>`;

    expect(extractEventDetails(cheerio.load(html), PAGE_URL, 2025)).toEqual([
      {
        title: 'Youth Green Team Info Session',
        date: '2025-07-09',
        time: '16:30',
        description: 'Meet the crew on July 9, 2025 from 4:30 pm. Location: Boys and Girls Club.',
        location: 'Boys and Girls Club',
        url: null,
        source_url: PAGE_URL,
      },
    ]);
  });

  it('cuts long descriptions to 300 characters', () => {
    const body = 'Lorem '.repeat(80).trim();
    const html = `<body><div><h2>Volunteer Workshop Series</h2><p>${body}</p></div></body>`;

    const [event] = extractEventDetails(cheerio.load(html), PAGE_URL, 2025);
    expect(event.title).toBe('Volunteer Workshop Series');
    expect(event.date).toBeNull();
    expect(event.description).toBe(`${body.slice(0, 300)}...`);
  });
});

// ============================================================================
// Colorado filter
// ============================================================================

describe('isColoradoCalendarNoise', () => {
  it('flags calendar chrome', () => {
    expect(isColoradoCalendarNoise('Sat')).toBe(true);
    expect(isColoradoCalendarNoise('12')).toBe(true);
    expect(isColoradoCalendarNoise('Ab')).toBe(true);
    expect(isColoradoCalendarNoise('Event Search')).toBe(true);
  });

  it('keeps real titles, including ones starting with a weekday word', () => {
    expect(isColoradoCalendarNoise('Monday Tree Walk')).toBe(false);
    expect(isColoradoCalendarNoise('Trail Day')).toBe(false);
  });
});

describe('extractEventDetails: Colorado host', () => {
  const html = `
<ul>
  <li class="event">Sat</li>
  <li class="event">
    <h3>Sat Trail Work</h3>
  </li>
  <li class="event">
    <h3>Trail Restoration Day</h3>
    <p>August 2, 2025</p>
  </li>
</ul>`;

  it('drops calendar noise on the Colorado site only', () => {
    const colorado = extractEventDetails(cheerio.load(html), 'https://groundworkcolorado.org/calendar', 2025);
    expect(colorado.map(e => [e.title, e.date])).toEqual([['Trail Restoration Day', '2025-08-02']]);

    const elsewhere = extractEventDetails(cheerio.load(html), PAGE_URL, 2025);
    expect(elsewhere.map(e => e.title)).toEqual(['Sat Trail Work', 'Trail Restoration Day']);
  });
});

// ============================================================================
// resolveUrl
// ============================================================================

describe('resolveUrl', () => {
  it('resolves relative links and rejects junk', () => {
    expect(resolveUrl('/a', 'https://gwexample.org/b/c')).toBe('https://gwexample.org/a');
    expect(resolveUrl('http://[', PAGE_URL)).toBeNull();
  });
});
