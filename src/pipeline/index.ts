/**
 * Pipeline Module — Public API
 */

export { runPipeline } from './run.js';
export type { RunMode, RunOptions, RunReport, PipelineStages, StageName } from './run.js';
export { acquireRunLock, readLease, RunLockedError } from './run-lock.js';
export type { RunLease, LeaseInfo } from './run-lock.js';
