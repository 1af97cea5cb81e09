/**
 * Seat Pack Reconciler - Persistence Boundary
 * ===========================================
 * Intention-revealing query methods the reconciliation core needs from the
 * store. The Drizzle implementation lives in drizzle-repository.ts.
 */

import type {
  DelistReason,
  NumberingScheme,
  Performance,
  SeatPack,
  Venue,
} from '../../types/seat-pack';

// ================================================
// QUERY TYPES
// ================================================

export interface PackSyncQuery {
  performanceId?: string;
  limit: number;
  /** Packs at or over this many attempts are only picked up again after `exhaustedRetryBefore` */
  maxAttempts: number;
  exhaustedRetryBefore: Date;
}

export interface BulkDelistResult {
  delisted: number;
  /** Active, unheld packs left untouched because another holder had them leased */
  leased: number;
}

export interface SyncHealthQuery {
  highRetryThreshold: number;
  staleLeaseBefore: Date;
}

export interface SyncHealthCounts {
  unsynced: number;
  failed: number;
  pending: number;
  highRetry: number;
  activeLeases: number;
  staleLeases: number;
  operationsInFlight: number;
  unresolvedFailedRollbacks: number;
}

// ================================================
// SEAT PACKS
// ================================================

export interface SeatPackRepository {
  getPack(packId: string): Promise<SeatPack | null>;
  getActivePacks(performanceId: string): Promise<SeatPack[]>;
  packsForPerformance(performanceId: string): Promise<SeatPack[]>;

  /**
   * Write `pack` when the stored version equals `expectedVersion`
   * (0 inserts a new row). Returns the stored pack with its bumped version;
   * throws VersionConflictError otherwise.
   */
  upsert(pack: SeatPack, expectedVersion: number): Promise<SeatPack>;

  /** Conditional lease: succeeds when free or already held by `holderId` */
  acquireLease(packId: string, holderId: string, at: Date): Promise<SeatPack | null>;
  releaseLease(packId: string, holderId: string): Promise<boolean>;
  staleLeases(lockedBefore: Date): Promise<SeatPack[]>;

  packsNeedingSync(query: PackSyncQuery): Promise<SeatPack[]>;
  recentManualDelists(since: Date): Promise<SeatPack[]>;
  staleOperations(startedBefore: Date): Promise<SeatPack[]>;

  /**
   * One-shot transition of every active, unheld, unleased pack at a venue to
   * delist with `reason`. Leased packs are counted, not moved.
   */
  bulkDelistForVenue(venueId: string, reason: DelistReason, at: Date): Promise<BulkDelistResult>;

  countSyncHealth(query: SyncHealthQuery): Promise<SyncHealthCounts>;
}

// ================================================
// POS LISTING RECORDS
// ================================================

export interface ListingRecord {
  packId: string;
  listingId: string;
  createdAt: Date;
  removedAt: Date | null;
}

export interface ListingRecordStore {
  recordListing(packId: string, listingId: string, at: Date): Promise<ListingRecord>;
  removeListingRecord(packId: string, listingId: string): Promise<boolean>;
  markListingRemoved(packId: string, listingId: string, at: Date): Promise<boolean>;
}

// ================================================
// FAILED ROLLBACK LOG
// ================================================

export type CompensationKind = 'delete_listing' | 'remove_listing_record';

export interface NewFailedRollback {
  operationId: string;
  packId: string;
  action: CompensationKind;
  payload: Record<string, string>;
  error: string;
  createdAt: Date;
}

export interface FailedRollback extends NewFailedRollback {
  id: number;
  resolvedAt: Date | null;
  resolvedBy: string | null;
}

export interface FailedRollbackLog {
  appendFailedRollback(entry: NewFailedRollback): Promise<FailedRollback>;
  listFailedRollbacks(options?: { unresolvedOnly?: boolean }): Promise<FailedRollback[]>;
  resolveFailedRollback(id: number, resolvedBy: string, at: Date): Promise<boolean>;
}

// ================================================
// VENUES & PERFORMANCES
// ================================================

export interface VenueDirectory {
  getVenue(venueId: string): Promise<Venue | null>;
  getPerformance(performanceId: string): Promise<Performance | null>;
  activePerformancesForVenue(venueId: string): Promise<Performance[]>;
  updateVenueStructure(venueId: string, current: NumberingScheme | null, previous: NumberingScheme | null): Promise<void>;
  setPerformancePosEnabled(performanceId: string, enabled: boolean): Promise<void>;
}

export type ReconcilerStore = SeatPackRepository & ListingRecordStore & FailedRollbackLog & VenueDirectory;
