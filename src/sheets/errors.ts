// ============================================================================
// Sheets Error Types — Typed errors for publisher failures
// ============================================================================

/**
 * GOOGLE_CREDENTIALS or GOOGLE_SHEET_ID is missing.
 */
export class SheetsConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SheetsConfigError';
  }
}

/**
 * Base error for Google Sheets API failures.
 * NEVER includes credential material in the message.
 */
export class SheetsApiError extends Error {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null) {
    super(message);
    this.name = 'SheetsApiError';
    this.statusCode = statusCode;
  }
}

/**
 * Credentials are malformed, rejected (401 / invalid_grant), or lack access
 * to the spreadsheet (403).
 */
export class SheetAuthError extends SheetsApiError {
  constructor(message: string, statusCode: number | null = null) {
    super(message, statusCode);
    this.name = 'SheetAuthError';
  }
}

/**
 * Thrown on HTTP 404: the spreadsheet id does not resolve.
 */
export class SheetNotFoundError extends SheetsApiError {
  readonly spreadsheetId: string;

  constructor(spreadsheetId: string) {
    super(`Spreadsheet ${spreadsheetId} not found (404). Check GOOGLE_SHEET_ID.`, 404);
    this.name = 'SheetNotFoundError';
    this.spreadsheetId = spreadsheetId;
  }
}
