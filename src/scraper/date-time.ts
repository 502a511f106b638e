/**
 * Date & Time Extraction
 *
 * Pulls the first recognisable calendar date (and, if present, a clock time)
 * out of free text scraped from event listings. Trust sites format dates every
 * which way, so several patterns are tried in order:
 *
 *   1. ISO            2025-06-14, 2025-06-14T18:30
 *   2. US numeric     6/14/2025, 06-14-2025
 *   3. Month first    June 14, 2025 / Jun 14th 2025 / June 14 (year assumed)
 *   4. Day first      14 June 2025
 *
 * Output is always YYYY-MM-DD and 24h HH:MM. A time is only reported when a
 * date was found.
 */

export interface DateTimeMatch {
  date: string | null;
  time: string | null;
}

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

const MONTH_NAME = '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

const ISO_DATE = /\b(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}))?/;
const US_NUMERIC_DATE = /\b(\d{1,2})[/-](\d{1,2})[/-](20\d{2})\b/;
const MONTH_FIRST_DATE = new RegExp(`\\b${MONTH_NAME}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b(?:,?\\s+(\\d{4})\\b)?`, 'i');
const DAY_FIRST_DATE = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+${MONTH_NAME}\\.?,?\\s+(\\d{4})\\b`, 'i');

const CLOCK_TIME = /\b(\d{1,2}):(\d{2})(?:\s*([ap])\.?m\b\.?)?/i;
const HOUR_ONLY_TIME = /\b(\d{1,2})\s*([ap])\.?m\b/i;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function formatDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

function formatTime(hour: number, minute: number, meridiem: string | undefined): string | null {
  let h = hour;
  if (meridiem) {
    if (h < 1 || h > 12) return null;
    const pm = meridiem.toLowerCase() === 'p';
    if (pm && h < 12) h += 12;
    if (!pm && h === 12) h = 0;
  }
  if (h > 23 || minute > 59) return null;
  return `${pad2(h)}:${pad2(minute)}`;
}

function monthNumber(name: string): number {
  return MONTHS[name.toLowerCase()] ?? 0;
}

/**
 * Finds the earliest clock time in the text ("6:30 PM", "18:30", "7pm").
 */
export function extractTime(text: string): string | null {
  const clock = CLOCK_TIME.exec(text);
  const hourOnly = HOUR_ONLY_TIME.exec(text);

  if (clock && (!hourOnly || clock.index <= hourOnly.index)) {
    return formatTime(Number(clock[1]), Number(clock[2]), clock[3]);
  }
  if (hourOnly) {
    return formatTime(Number(hourOnly[1]), 0, hourOnly[2]);
  }
  return null;
}

interface DateHit {
  date: string;
  /** Set when the date carried its own clock; a midnight clock means "no time" */
  isoClock: { time: string | null } | null;
}

function extractDate(text: string, referenceYear: number): DateHit | null {
  const iso = ISO_DATE.exec(text);
  if (iso) {
    const date = formatDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (date) {
      if (iso[4] === undefined || iso[5] === undefined) return { date, isoClock: null };
      const midnight = iso[4] === '00' && iso[5] === '00';
      return { date, isoClock: { time: midnight ? null : formatTime(Number(iso[4]), Number(iso[5]), undefined) } };
    }
  }

  const numeric = US_NUMERIC_DATE.exec(text);
  if (numeric) {
    const date = formatDate(Number(numeric[3]), Number(numeric[1]), Number(numeric[2]));
    if (date) return { date, isoClock: null };
  }

  const monthFirst = MONTH_FIRST_DATE.exec(text);
  if (monthFirst) {
    const year = monthFirst[3] ? Number(monthFirst[3]) : referenceYear;
    const date = formatDate(year, monthNumber(monthFirst[1]), Number(monthFirst[2]));
    if (date) return { date, isoClock: null };
  }

  const dayFirst = DAY_FIRST_DATE.exec(text);
  if (dayFirst) {
    const date = formatDate(Number(dayFirst[3]), monthNumber(dayFirst[2]), Number(dayFirst[1]));
    if (date) return { date, isoClock: null };
  }

  return null;
}

/**
 * Extracts a date and optional time from free text.
 *
 * @param referenceYear - Year assumed for dates written without one ("June 14")
 */
export function extractDateAndTime(
  text: string | null | undefined,
  referenceYear: number = new Date().getFullYear(),
): DateTimeMatch {
  if (!text) return { date: null, time: null };

  const clean = text.replace(/\s+/g, ' ');
  const found = extractDate(clean, referenceYear);
  if (!found) return { date: null, time: null };

  return { date: found.date, time: found.isoClock ? found.isoClock.time : extractTime(clean) };
}

/**
 * Parses a machine-readable start date (JSON-LD `startDate`). ISO strings keep
 * their wall-clock time, dropped when it is exactly midnight; anything else
 * goes through the free-text extractor.
 */
export function parseStartDate(value: string, referenceYear: number = new Date().getFullYear()): DateTimeMatch {
  const iso = ISO_DATE.exec(value);
  if (iso && iso.index === 0) {
    const date = formatDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (date) {
      const midnight = iso[4] === undefined || (iso[4] === '00' && iso[5] === '00');
      return { date, time: midnight ? null : formatTime(Number(iso[4]), Number(iso[5]), undefined) };
    }
  }
  return extractDateAndTime(value, referenceYear);
}
