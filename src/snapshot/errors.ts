// ============================================================================
// Snapshot Error Types
// ============================================================================

/**
 * The results directory holds no snapshot to read.
 */
export class SnapshotNotFoundError extends Error {
  readonly resultsDir: string;

  constructor(resultsDir: string) {
    super(`No snapshot found in ${resultsDir}. Run the scraper first.`);
    this.name = 'SnapshotNotFoundError';
    this.resultsDir = resultsDir;
  }
}

/**
 * A snapshot or manifest file exists but does not match the expected shape.
 */
export class SnapshotFormatError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Malformed snapshot file ${path}: ${detail}`);
    this.name = 'SnapshotFormatError';
    this.path = path;
  }
}
