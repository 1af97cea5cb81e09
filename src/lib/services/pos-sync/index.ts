/**
 * POS Sync Service - Public API
 */

export { PosSyncEngine } from './sync-engine';
export type { PosSyncEngineDeps, SyncRunOptions, SyncRunResult } from './sync-engine';
export { SyncMetrics } from './sync-metrics';
export type { SyncCounter } from './sync-metrics';
export { HttpPosApiClient } from './client/pos-api-client';
export type { PosApiClientOptions } from './client/pos-api-client';
export { toPosListingPayload, listingContextFor, formatVenueLocalTime } from './client/payload-transformer';
export type { ListingContext } from './client/payload-transformer';
export { DEFAULT_POS_SYNC_SETTINGS, POS_API_CONFIG, SYNC_HEALTH_CONFIG } from './config/constants';
export type { PosSyncSettings } from './config/constants';
export { planOperation } from './operations/plan-operation';
export { pushPack } from './operations/push-pack';
export { delistPack } from './operations/delist-pack';
export { RollbackStack } from './operations/rollback-stack';
export type { Compensation, RollbackReport } from './operations/rollback-stack';
export type { PackOperationContext, PackSyncOutcome, SkipReason, SyncOperation } from './operations/types';
export { GhostPackGuard, createGhostPackGuard } from './utils/pack-validator';
export type { PackValidationResult } from './utils/pack-validator';
export { classifyHttpStatus, classifySyncError } from './utils/error-classifier';
export type { SyncErrorClassification, SyncErrorType } from './utils/error-classifier';
