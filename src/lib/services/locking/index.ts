export { LeaseManager, DEFAULT_LEASE_STALE_AFTER_MS } from './lease-manager';
export type { LeaseManagerOptions, LeaseOutcome, LeaseSweepResult, ClearedLease } from './lease-manager';
export { updatePackWithRetry, isVersionConflict } from './versioned-write';
export type { VersionedWriteOptions } from './versioned-write';
