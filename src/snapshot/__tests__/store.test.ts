/**
 * Snapshot Store Tests
 *
 * Tests cover:
 * - File naming and fingerprinting
 * - writeSnapshot: JSON + CSV twin + manifest, restamp when unchanged
 * - readLatestSnapshot: via manifest, via newest file name, missing/malformed input
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { SnapshotFormatError, SnapshotNotFoundError } from '../errors.js';
import {
  fingerprintEvents,
  readLatestSnapshot,
  readManifest,
  snapshotBaseName,
  writeSnapshot,
} from '../store.js';
import type { EventRecord } from '../types.js';

// ============================================================================
// Fixtures
// ============================================================================

const CLEANUP: EventRecord = {
  trust_site: 'https://gwexample.org/',
  trust_abbrev: 'GWX',
  trust_name: 'Example',
  page_url: 'https://gwexample.org/events',
  title: 'Creek Cleanup, Spring',
  date: '2025-05-03',
  time: '09:00',
  description: null,
  location: 'Mill Creek',
  event_url: null,
};

const SCRAPED_AT = new Date('2025-04-28T06:00:00Z');

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'snapshot-test-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ============================================================================
// Naming & fingerprinting
// ============================================================================

describe('snapshotBaseName', () => {
  it('formats the UTC timestamp', () => {
    expect(snapshotBaseName(new Date('2025-01-06T09:05:03Z'))).toBe('events_findings_20250106_090503');
  });
});

describe('fingerprintEvents', () => {
  it('ignores scan_date but not content', () => {
    const base = fingerprintEvents([CLEANUP]);
    expect(fingerprintEvents([{ ...CLEANUP, scan_date: '2025-05-05' }])).toBe(base);
    expect(fingerprintEvents([{ ...CLEANUP, title: 'Creek Cleanup' }])).not.toBe(base);
    expect(base).toMatch(/^[0-9a-f]{64}$/);
  });
});

// ============================================================================
// writeSnapshot
// ============================================================================

describe('writeSnapshot', () => {
  it('writes the JSON snapshot, its CSV twin and the manifest', async () => {
    const result = await writeSnapshot(dir, [CLEANUP], SCRAPED_AT);

    expect(result.written).toBe(true);
    expect(result.manifest).toEqual({
      latest: 'events_findings_20250428_060000.json',
      csv: 'events_findings_20250428_060000.csv',
      generatedAt: '2025-04-28T06:00:00.000Z',
      scanDate: '2025-04-28',
      eventCount: 1,
      fingerprint: fingerprintEvents([CLEANUP]),
    });

    const json: unknown = JSON.parse(await readFile(path.join(dir, result.manifest.latest), 'utf-8'));
    expect(json).toEqual([CLEANUP]);

    const csv = await readFile(path.join(dir, result.manifest.csv), 'utf-8');
    expect(csv).toBe(
      'Trust Abbrev,Trust Name,Trust Website,Page URL,Event Title,Date,Time,Location,Description,Event URL,Scan Date\r\n' +
      'GWX,Example,https://gwexample.org/,https://gwexample.org/events,"Creek Cleanup, Spring",2025-05-03,09:00,Mill Creek,,,2025-04-28\r\n',
    );

    expect(await readManifest(dir)).toEqual(result.manifest);
  });

  it('creates the results directory when missing', async () => {
    const nested = path.join(dir, 'scraper_results');
    await writeSnapshot(nested, [CLEANUP], SCRAPED_AT);
    expect((await readdir(nested)).sort()).toEqual([
      'events_findings_20250428_060000.csv',
      'events_findings_20250428_060000.json',
      'manifest.json',
    ]);
  });

  it('keeps the existing snapshot when the records did not change', async () => {
    const first = await writeSnapshot(dir, [CLEANUP], SCRAPED_AT);

    const again = await writeSnapshot(dir, [CLEANUP], new Date('2025-05-05T06:00:00Z'));

    expect(again.written).toBe(false);
    expect(again.manifest.latest).toBe('events_findings_20250428_060000.json');
    expect(again.manifest.fingerprint).toBe(first.manifest.fingerprint);
    expect(await readdir(dir)).toHaveLength(3);
  });

  it('stamps an unchanged snapshot with the latest scan date', async () => {
    await writeSnapshot(dir, [CLEANUP], SCRAPED_AT);

    await writeSnapshot(dir, [CLEANUP], new Date('2025-05-05T06:00:00Z'));

    expect(await readManifest(dir)).toMatchObject({
      generatedAt: '2025-05-05T06:00:00.000Z',
      scanDate: '2025-05-05',
    });
    expect((await readLatestSnapshot(dir)).scanDate).toBe('2025-05-05');
    expect(await readFile(path.join(dir, 'events_findings_20250428_060000.csv'), 'utf-8')).toBe(
      'Trust Abbrev,Trust Name,Trust Website,Page URL,Event Title,Date,Time,Location,Description,Event URL,Scan Date\r\n' +
      'GWX,Example,https://gwexample.org/,https://gwexample.org/events,"Creek Cleanup, Spring",2025-05-03,09:00,Mill Creek,,,2025-05-05\r\n',
    );
  });

  it('adds a new pair and repoints the manifest when records change', async () => {
    await writeSnapshot(dir, [CLEANUP], SCRAPED_AT);

    const changed = await writeSnapshot(dir, [{ ...CLEANUP, time: '10:00' }], new Date('2025-05-05T06:00:00Z'));

    expect(changed.written).toBe(true);
    expect((await readManifest(dir))?.latest).toBe('events_findings_20250505_060000.json');
    expect(await readdir(dir)).toHaveLength(5);
  });
});

// ============================================================================
// readLatestSnapshot
// ============================================================================

describe('readLatestSnapshot', () => {
  it('loads the snapshot the manifest points at', async () => {
    await writeSnapshot(dir, [CLEANUP], SCRAPED_AT);

    const snapshot = await readLatestSnapshot(dir);

    expect(snapshot.path).toBe(path.join(dir, 'events_findings_20250428_060000.json'));
    expect(snapshot.events).toEqual([CLEANUP]);
    expect(snapshot.scanDate).toBe('2025-04-28');
    expect(snapshot.manifest?.eventCount).toBe(1);
  });

  it('falls back to the newest snapshot file without a manifest', async () => {
    await writeFile(path.join(dir, 'events_findings_20250101_000000.json'), '[]');
    await writeFile(path.join(dir, 'events_findings_20250301_120000.json'), JSON.stringify([CLEANUP]));
    await writeFile(path.join(dir, 'notes.json'), '{}');

    const snapshot = await readLatestSnapshot(dir);

    expect(snapshot.path).toBe(path.join(dir, 'events_findings_20250301_120000.json'));
    expect(snapshot.scanDate).toBe('2025-03-01');
    expect(snapshot.events).toEqual([CLEANUP]);
    expect(snapshot.manifest).toBeNull();
  });

  it('throws SnapshotNotFoundError for a missing or empty directory', async () => {
    await expect(readLatestSnapshot(path.join(dir, 'nope'))).rejects.toThrow(SnapshotNotFoundError);

    await mkdir(path.join(dir, 'empty'));
    await expect(readLatestSnapshot(path.join(dir, 'empty'))).rejects.toThrow(
      `No snapshot found in ${path.join(dir, 'empty')}. Run the scraper first.`,
    );
  });

  it('throws SnapshotFormatError for records of the wrong shape', async () => {
    await writeFile(path.join(dir, 'events_findings_20250101_000000.json'), '[{"title": 1}]');
    await expect(readLatestSnapshot(dir)).rejects.toThrow(SnapshotFormatError);
  });

  it('throws SnapshotFormatError for a corrupt manifest', async () => {
    await writeFile(path.join(dir, 'manifest.json'), '{"latest": ');
    await expect(readManifest(dir)).rejects.toThrow(SnapshotFormatError);
  });
});
