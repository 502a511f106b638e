/**
 * Snapshot Module — Public API
 */

export {
  writeSnapshot,
  readLatestSnapshot,
  readManifest,
  parseManifest,
  fingerprintEvents,
  snapshotBaseName,
  isoDay,
  MANIFEST_FILE,
} from './store.js';
export type { SnapshotWriteResult } from './store.js';
export { SNAPSHOT_COLUMNS, toRow } from './columns.js';
export { toCsv, escapeCsvField } from './csv.js';
export { SnapshotNotFoundError, SnapshotFormatError } from './errors.js';
export { EventRecordSchema, SnapshotSchema, SnapshotManifestSchema } from './types.js';
export type { EventRecord, SnapshotManifest, LoadedSnapshot } from './types.js';
