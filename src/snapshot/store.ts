/**
 * Snapshot Store — file-backed persistence for scrape results
 *
 * Layout of the results directory:
 *   events_findings_YYYYMMDD_HHMMSS.json   records (one file per changed scrape)
 *   events_findings_YYYYMMDD_HHMMSS.csv    same records, sheet column order
 *   manifest.json                          pointer to the latest pair + fingerprint
 *
 * Every file is written to a temp name and renamed into place, manifest last,
 * so a run that dies halfway leaves the previous snapshot as the latest one.
 *
 * Consumers: scraper.ts (write), sheets/publisher.ts (readLatestSnapshot),
 * commit/commit-stage.ts (readManifest, parseManifest)
 */

import { createHash } from 'node:crypto';
import { access, mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { SNAPSHOT_COLUMNS, toRow } from './columns.js';
import { toCsv } from './csv.js';
import { SnapshotFormatError, SnapshotNotFoundError } from './errors.js';
import {
  SnapshotManifestSchema,
  SnapshotSchema,
  type EventRecord,
  type LoadedSnapshot,
  type SnapshotManifest,
} from './types.js';

export const MANIFEST_FILE = 'manifest.json';

const SNAPSHOT_FILE_PATTERN = /^events_findings_(\d{4})(\d{2})(\d{2})_\d{6}\.json$/;

export interface SnapshotWriteResult {
  /** False when the scrape matched the current snapshot and nothing was rewritten */
  written: boolean;
  manifest: SnapshotManifest;
}

// ---------------------------------------------------------------------------
// Naming & fingerprinting
// ---------------------------------------------------------------------------

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** events_findings_YYYYMMDD_HHMMSS, UTC */
export function snapshotBaseName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad2(at.getUTCMonth() + 1)}${pad2(at.getUTCDate())}`;
  const time = `${pad2(at.getUTCHours())}${pad2(at.getUTCMinutes())}${pad2(at.getUTCSeconds())}`;
  return `events_findings_${date}_${time}`;
}

/** YYYY-MM-DD, UTC */
export function isoDay(at: Date): string {
  return at.toISOString().slice(0, 10);
}

/**
 * Content hash of a record list. scan_date is left out so an identical scrape
 * on a later day fingerprints the same.
 */
export function fingerprintEvents(events: readonly EventRecord[]): string {
  const canonical = JSON.stringify(
    events.map(e => [
      e.trust_site,
      e.trust_abbrev,
      e.trust_name,
      e.page_url,
      e.title,
      e.date,
      e.time,
      e.description,
      e.location,
      e.event_url,
    ]),
  );
  return createHash('sha256').update(canonical).digest('hex');
}

// ---------------------------------------------------------------------------
// Low-level IO
// ---------------------------------------------------------------------------

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.tmp-${process.pid}`;
  await writeFile(tmpPath, content, 'utf-8');
  await rename(tmpPath, filePath);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function parseJson(filePath: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new SnapshotFormatError(filePath, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Validates manifest JSON. Exported for the commit stage, which reads the
 * committed copy through git rather than from disk.
 */
export function parseManifest(raw: string, source: string): SnapshotManifest {
  const parsed = SnapshotManifestSchema.safeParse(parseJson(source, raw));
  if (!parsed.success) {
    throw new SnapshotFormatError(source, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

function parseSnapshot(raw: string, source: string): EventRecord[] {
  const parsed = SnapshotSchema.safeParse(parseJson(source, raw));
  if (!parsed.success) {
    throw new SnapshotFormatError(source, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Reads manifest.json, or null if the results directory has none yet.
 */
export async function readManifest(resultsDir: string): Promise<SnapshotManifest | null> {
  const manifestPath = path.join(resultsDir, MANIFEST_FILE);
  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  return parseManifest(raw, manifestPath);
}

function csvFor(events: readonly EventRecord[], scanDate: string): string {
  return toCsv([[...SNAPSHOT_COLUMNS], ...events.map(e => toRow(e, scanDate))]);
}

/**
 * Persists a scrape as a new JSON + CSV snapshot and repoints the manifest.
 *
 * When the records fingerprint the same as the current snapshot, the JSON file
 * is kept and only the run stamp moves: the manifest gets this run's
 * generatedAt/scanDate and the CSV twin is rewritten with the new Scan Date.
 * The fingerprint is untouched, so the commit stage still sees "unchanged".
 */
export async function writeSnapshot(
  resultsDir: string,
  events: readonly EventRecord[],
  scrapedAt: Date,
): Promise<SnapshotWriteResult> {
  await mkdir(resultsDir, { recursive: true });

  const fingerprint = fingerprintEvents(events);
  const scanDate = isoDay(scrapedAt);
  const current = await readManifest(resultsDir);

  if (current && current.fingerprint === fingerprint && await fileExists(path.join(resultsDir, current.latest))) {
    const restamped: SnapshotManifest = { ...current, generatedAt: scrapedAt.toISOString(), scanDate };
    await writeFileAtomic(path.join(resultsDir, current.csv), csvFor(events, scanDate));
    await writeFileAtomic(path.join(resultsDir, MANIFEST_FILE), JSON.stringify(restamped, null, 2) + '\n');
    return { written: false, manifest: restamped };
  }

  const baseName = snapshotBaseName(scrapedAt);
  const manifest: SnapshotManifest = {
    latest: `${baseName}.json`,
    csv: `${baseName}.csv`,
    generatedAt: scrapedAt.toISOString(),
    scanDate,
    eventCount: events.length,
    fingerprint,
  };

  await writeFileAtomic(path.join(resultsDir, manifest.latest), JSON.stringify(events, null, 2) + '\n');
  await writeFileAtomic(path.join(resultsDir, manifest.csv), csvFor(events, scanDate));
  await writeFileAtomic(path.join(resultsDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n');

  return { written: true, manifest };
}

/**
 * Loads the latest snapshot: the one the manifest points at, or failing that
 * the newest events_findings_*.json by file name.
 *
 * @throws SnapshotNotFoundError if the directory is missing or holds no snapshot
 */
export async function readLatestSnapshot(resultsDir: string): Promise<LoadedSnapshot> {
  const manifest = await readManifest(resultsDir);

  if (manifest) {
    const snapshotPath = path.join(resultsDir, manifest.latest);
    const raw = await readFile(snapshotPath, 'utf-8');
    return {
      path: snapshotPath,
      events: parseSnapshot(raw, snapshotPath),
      scanDate: manifest.scanDate,
      manifest,
    };
  }

  let files: string[];
  try {
    files = await readdir(resultsDir);
  } catch (err) {
    if (isNotFound(err)) throw new SnapshotNotFoundError(resultsDir);
    throw err;
  }

  const latest = files.filter(f => SNAPSHOT_FILE_PATTERN.test(f)).sort().reverse()[0];
  if (!latest) throw new SnapshotNotFoundError(resultsDir);

  const match = SNAPSHOT_FILE_PATTERN.exec(latest);
  const scanDate = match ? `${match[1]}-${match[2]}-${match[3]}` : isoDay(new Date());

  const snapshotPath = path.join(resultsDir, latest);
  const raw = await readFile(snapshotPath, 'utf-8');
  return {
    path: snapshotPath,
    events: parseSnapshot(raw, snapshotPath),
    scanDate,
    manifest: null,
  };
}
