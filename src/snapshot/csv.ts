/**
 * Minimal RFC 4180 writer for the CSV twin of each snapshot.
 * Fields containing a comma, quote, CR or LF are quoted; quotes are doubled.
 */

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map(row => row.map(escapeCsvField).join(',')).join('\r\n') + '\r\n';
}
