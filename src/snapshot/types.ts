/**
 * Snapshot Type Definitions
 *
 * - EventRecordSchema: one scraped event as persisted in scraper_results/*.json
 * - SnapshotSchema: the JSON file body (ordered array of records)
 * - SnapshotManifestSchema: scraper_results/manifest.json, pointer to the latest
 *   snapshot plus the fingerprint the commit stage compares
 *
 * Field names are snake_case because that is the on-disk format older
 * snapshots in scraper_results/ already use.
 */

import { z } from 'zod';

export const EventRecordSchema = z.object({
  trust_site: z.string(),
  trust_abbrev: z.string(),
  trust_name: z.string(),
  page_url: z.string(),
  title: z.string(),
  date: z.string().nullable(),
  time: z.string().nullable(),
  description: z.string().nullable(),
  location: z.string().nullable(),
  event_url: z.string().nullable(),
  /** YYYY-MM-DD; absent on freshly scraped records, the manifest's scanDate applies */
  scan_date: z.string().optional(),
});

export type EventRecord = z.infer<typeof EventRecordSchema>;

export const SnapshotSchema = z.array(EventRecordSchema);

export const SnapshotManifestSchema = z.object({
  /** File name (not path) of the latest JSON snapshot */
  latest: z.string(),
  /** File name of its CSV twin */
  csv: z.string(),
  /** ISO timestamp of the scrape */
  generatedAt: z.string(),
  /** YYYY-MM-DD, written into the Scan Date column */
  scanDate: z.string(),
  eventCount: z.number().int().nonnegative(),
  /** sha256 of the canonical record list */
  fingerprint: z.string(),
});

export type SnapshotManifest = z.infer<typeof SnapshotManifestSchema>;

export interface LoadedSnapshot {
  /** Absolute or results-dir-relative path the records were read from */
  path: string;
  events: EventRecord[];
  scanDate: string;
  manifest: SnapshotManifest | null;
}
