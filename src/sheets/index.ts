/**
 * Sheets Module — Public API
 */

export { publishSnapshot, publishLatestSnapshot, a1Range, LAST_COLUMN } from './publisher.js';
export type { PublishOptions, PublishResult } from './publisher.js';
export { createSpreadsheetGateway, translateSheetsError } from './gateway.js';
export type { SpreadsheetGateway, WorksheetInfo } from './gateway.js';
export { createSheetsClient, parseServiceAccountKey } from './sheets-client.js';
export type { SheetsClient, ServiceAccountKey } from './sheets-client.js';
export { loadSheetsConfig } from './config.js';
export type { SheetsConfig } from './config.js';
export { SheetsConfigError, SheetsApiError, SheetAuthError, SheetNotFoundError } from './errors.js';
