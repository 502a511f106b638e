/**
 * Sheet Publisher
 *
 * Replaces the contents of the target spreadsheet's first worksheet with the
 * latest snapshot: header in row 1, one event per row from row 2. Everything
 * below the header is cleared first, so re-publishing the same snapshot leaves
 * the sheet in the same state.
 *
 * Main exports: publishLatestSnapshot(resultsDir, options), publishSnapshot(snapshot, options)
 *
 * Safety:
 * - Only metadata is logged (sheet id, tab, row count), never credentials
 * - Any API failure propagates; nothing is swallowed
 */

import { consoleLogger, type Logger } from '../logger.js';
import { SNAPSHOT_COLUMNS, readLatestSnapshot, toRow, type LoadedSnapshot } from '../snapshot/index.js';
import type { SpreadsheetGateway } from './gateway.js';

export interface PublishOptions {
  gateway: SpreadsheetGateway;
  spreadsheetId: string;
  log?: Logger;
}

export interface PublishResult {
  spreadsheetId: string;
  worksheet: string;
  rowsWritten: number;
  /** Path of the snapshot that was published */
  snapshot: string;
}

/** Last column letter for the snapshot layout (11 columns -> K) */
export const LAST_COLUMN = String.fromCharCode('A'.charCodeAt(0) + SNAPSHOT_COLUMNS.length - 1);

/** A1 notation with the tab name quoted ('Sheet 1'!A1:K1) */
export function a1Range(worksheet: string, cells: string): string {
  return `'${worksheet.replace(/'/g, "''")}'!${cells}`;
}

export async function publishSnapshot(snapshot: LoadedSnapshot, options: PublishOptions): Promise<PublishResult> {
  const log = options.log ?? consoleLogger;
  const { gateway, spreadsheetId } = options;

  log.info('[sheets] Publishing snapshot', { spreadsheetId, snapshot: snapshot.path, events: snapshot.events.length });

  const { title } = await gateway.getFirstWorksheet(spreadsheetId);

  await gateway.updateValues(spreadsheetId, a1Range(title, `A1:${LAST_COLUMN}1`), [[...SNAPSHOT_COLUMNS]]);
  await gateway.clearValues(spreadsheetId, a1Range(title, `A2:${LAST_COLUMN}`));

  const rows = snapshot.events.map(event => toRow(event, snapshot.scanDate));
  if (rows.length > 0) {
    await gateway.appendValues(spreadsheetId, a1Range(title, `A1:${LAST_COLUMN}1`), rows);
    log.info('[sheets] Sheet updated', { spreadsheetId, worksheet: title, rows: rows.length });
  } else {
    log.info('[sheets] Snapshot has no events; sheet left with header only', { spreadsheetId, worksheet: title });
  }

  return { spreadsheetId, worksheet: title, rowsWritten: rows.length, snapshot: snapshot.path };
}

/**
 * Reads the latest snapshot from the results directory and publishes it.
 *
 * @throws SnapshotNotFoundError if there is nothing to publish
 */
export async function publishLatestSnapshot(resultsDir: string, options: PublishOptions): Promise<PublishResult> {
  const snapshot = await readLatestSnapshot(resultsDir);
  return publishSnapshot(snapshot, options);
}
