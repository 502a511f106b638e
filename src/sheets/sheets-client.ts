/**
 * Google Sheets API Client
 *
 * Authenticates as a service account (JWT) from the key passed in, not from
 * ambient env vars. The key may be the raw JSON key file contents, as stored
 * in the GOOGLE_CREDENTIALS secret, or the same JSON base64-encoded.
 *
 * The target spreadsheet must be shared with the service account's
 * client_email; there is no domain-wide delegation.
 */

import { google } from 'googleapis';
import { JWT } from 'google-auth-library';
import { z } from 'zod';
import { SheetAuthError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SheetsClient = ReturnType<typeof google.sheets>;

const ServiceAccountKeySchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
});

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

// ---------------------------------------------------------------------------
// Service Account Key Loading
// ---------------------------------------------------------------------------

/**
 * Parses and validates a service account key.
 *
 * @throws SheetAuthError if the key is not JSON (raw or base64) or lacks
 *   client_email / private_key
 */
export function parseServiceAccountKey(credentials: string): ServiceAccountKey {
  const trimmed = credentials.trim();

  try {
    const json = trimmed.startsWith('{') ? trimmed : Buffer.from(trimmed, 'base64').toString('utf-8');
    const parsed = ServiceAccountKeySchema.safeParse(JSON.parse(json));
    if (!parsed.success) {
      throw new Error('Missing client_email or private_key fields');
    }

    return { client_email: parsed.data.client_email, private_key: parsed.data.private_key };
  } catch (err) {
    throw new SheetAuthError(
      `GOOGLE_CREDENTIALS is malformed: ${err instanceof Error ? err.message : String(err)}. ` +
        'Ensure it is a service account key file (JSON, optionally base64-encoded).',
    );
  }
}

// ---------------------------------------------------------------------------
// Client Factory
// ---------------------------------------------------------------------------

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

/**
 * Returns a Google Sheets API v4 client authenticated with the given key.
 * Token exchange happens lazily on the first request, so bad keys surface as
 * SheetAuthError from the gateway rather than here.
 */
export function createSheetsClient(credentials: string): SheetsClient {
  const key = parseServiceAccountKey(credentials);
  const auth = new JWT({
    email: key.client_email,
    key: key.private_key,
    scopes: [SHEETS_SCOPE],
  });
  return google.sheets({ version: 'v4', auth });
}
