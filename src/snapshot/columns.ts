/**
 * Column layout shared by the CSV twin and the Google Sheet.
 */

import type { EventRecord } from './types.js';

export const SNAPSHOT_COLUMNS = [
  'Trust Abbrev',
  'Trust Name',
  'Trust Website',
  'Page URL',
  'Event Title',
  'Date',
  'Time',
  'Location',
  'Description',
  'Event URL',
  'Scan Date',
] as const;

/**
 * Flattens a record into one row in SNAPSHOT_COLUMNS order. Nulls become ''.
 *
 * @param scanDate - Used when the record carries no scan_date of its own
 */
export function toRow(record: EventRecord, scanDate: string): string[] {
  return [
    record.trust_abbrev,
    record.trust_name,
    record.trust_site,
    record.page_url,
    record.title,
    record.date ?? '',
    record.time ?? '',
    record.location ?? '',
    record.description ?? '',
    record.event_url ?? '',
    record.scan_date ?? scanDate,
  ];
}
