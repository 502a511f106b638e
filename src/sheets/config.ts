/**
 * Sheet Publisher Configuration
 *
 * Follows the same pattern as src/config.ts. Only loaded by commands that
 * publish, so scraping alone needs no Google credentials.
 *
 * Environment variables:
 * - GOOGLE_CREDENTIALS: Service account key JSON (raw, or base64-encoded)
 * - GOOGLE_SHEET_ID: Target spreadsheet ID (the long token in the sheet URL)
 */

import type { Env } from '../config.js';
import { SheetsConfigError } from './errors.js';

export interface SheetsConfig {
  /** Service account key material; never logged, never written to disk */
  credentials: string;
  spreadsheetId: string;
}

export function loadSheetsConfig(env: Env): SheetsConfig {
  const credentials = env.GOOGLE_CREDENTIALS?.trim();
  if (!credentials) {
    throw new SheetsConfigError('Google credentials not found. Set GOOGLE_CREDENTIALS to a service account key.');
  }

  const spreadsheetId = env.GOOGLE_SHEET_ID?.trim();
  if (!spreadsheetId) {
    throw new SheetsConfigError('Google Sheet ID not found. Set GOOGLE_SHEET_ID.');
  }

  return { credentials, spreadsheetId };
}
