/**
 * Spreadsheet Gateway
 *
 * The four Sheets API calls the publisher needs, with googleapis errors
 * translated into the typed errors in errors.ts. The publisher depends on the
 * SpreadsheetGateway interface only, so its tests run against an in-memory sheet.
 */

import type { SheetsClient } from './sheets-client.js';
import { SheetAuthError, SheetNotFoundError, SheetsApiError } from './errors.js';

export interface WorksheetInfo {
  title: string;
}

export interface SpreadsheetGateway {
  /** First tab of the spreadsheet; also proves the id resolves and access works */
  getFirstWorksheet(spreadsheetId: string): Promise<WorksheetInfo>;
  /** Overwrites a fixed range */
  updateValues(spreadsheetId: string, range: string, values: string[][]): Promise<void>;
  clearValues(spreadsheetId: string, range: string): Promise<void>;
  /** Writes rows after the last non-empty row of the range's table, growing the grid as needed */
  appendValues(spreadsheetId: string, range: string, values: string[][]): Promise<void>;
}

// ---------------------------------------------------------------------------
// Error translation
// ---------------------------------------------------------------------------

function statusOf(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('response' in err && typeof err.response === 'object' && err.response !== null
    && 'status' in err.response && typeof err.response.status === 'number') {
    return err.response.status;
  }
  if ('code' in err && typeof err.code === 'number') return err.code;
  return null;
}

/**
 * Maps a googleapis / gaxios failure onto the publisher's error taxonomy.
 * Already-typed errors pass through unchanged.
 */
export function translateSheetsError(err: unknown, spreadsheetId: string): Error {
  if (err instanceof SheetsApiError) return err;

  const status = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);

  if (status === 404) return new SheetNotFoundError(spreadsheetId);
  if (status === 401 || status === 403 || /invalid_grant|unauthorized_client|invalid_client/i.test(message)) {
    return new SheetAuthError(
      `Google Sheets rejected the service account (${status ?? 'auth'}): ${message}. ` +
        'Check GOOGLE_CREDENTIALS and that the sheet is shared with the service account email.',
      status,
    );
  }
  return new SheetsApiError(`Google Sheets API error${status ? ` (${status})` : ''}: ${message}`, status);
}

// ---------------------------------------------------------------------------
// googleapis-backed implementation
// ---------------------------------------------------------------------------

export function createSpreadsheetGateway(client: SheetsClient): SpreadsheetGateway {
  return {
    async getFirstWorksheet(spreadsheetId) {
      try {
        const res = await client.spreadsheets.get({
          spreadsheetId,
          fields: 'sheets.properties.title',
        });
        const title = res.data.sheets?.[0]?.properties?.title;
        if (!title) {
          throw new SheetsApiError(`Spreadsheet ${spreadsheetId} has no worksheets`, null);
        }
        return { title };
      } catch (err) {
        throw translateSheetsError(err, spreadsheetId);
      }
    },

    async updateValues(spreadsheetId, range, values) {
      try {
        await client.spreadsheets.values.update({
          spreadsheetId,
          range,
          valueInputOption: 'RAW',
          requestBody: { values },
        });
      } catch (err) {
        throw translateSheetsError(err, spreadsheetId);
      }
    },

    async clearValues(spreadsheetId, range) {
      try {
        await client.spreadsheets.values.clear({ spreadsheetId, range });
      } catch (err) {
        throw translateSheetsError(err, spreadsheetId);
      }
    },

    async appendValues(spreadsheetId, range, values) {
      try {
        await client.spreadsheets.values.append({
          spreadsheetId,
          range,
          valueInputOption: 'RAW',
          insertDataOption: 'OVERWRITE',
          requestBody: { values },
        });
      } catch (err) {
        throw translateSheetsError(err, spreadsheetId);
      }
    },
  };
}
