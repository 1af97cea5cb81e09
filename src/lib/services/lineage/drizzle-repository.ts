/**
 * Seat Pack Reconciler - Drizzle Reconciler Store
 * ===============================================
 * PostgreSQL implementation of the persistence boundary. Leases and
 * version checks are single conditional UPDATE statements, so concurrent
 * workers never need a multi-pack transaction.
 */

import { and, asc, desc, eq, gte, isNotNull, isNull, lt, ne, notInArray, or, sql, type SQL } from 'drizzle-orm';
import type { ReconcilerDatabase } from '../../db/postgres';
import {
  failedRollbacks,
  performances,
  posListings,
  seatPacks,
  venues,
  type FailedRollbackRow,
  type NewSeatPackRow,
  type PerformanceRow,
  type SeatPackRow,
  type VenueRow,
} from '../../db/schema';
import { VersionConflictError } from '../../errors';
import type {
  DelistReason,
  MarkupRule,
  NumberingScheme,
  Performance,
  SeatPack,
  Venue,
} from '../../types/seat-pack';
import type {
  BulkDelistResult,
  FailedRollback,
  ListingRecord,
  NewFailedRollback,
  PackSyncQuery,
  ReconcilerStore,
  SyncHealthCounts,
  SyncHealthQuery,
} from './repository';
import { assertPackInvariants } from './state-rules';

// ================================================
// ROW MAPPING
// ================================================

function rowToPack(row: SeatPackRow): SeatPack {
  return {
    packId: row.packId,
    performanceId: row.performanceId,
    venueId: row.venueId,
    sourceWebsite: row.sourceWebsite,
    levelId: row.levelId,
    zoneId: row.zoneId,
    sectionId: row.sectionId,
    sectionName: row.sectionName,
    rowLabel: row.rowLabel,
    seatIds: row.seatIds,
    startSeatNumber: row.startSeatNumber,
    endSeatNumber: row.endSeatNumber,
    packSize: row.packSize,
    unitPriceCents: row.unitPriceCents,
    packPriceCents: row.packPriceCents,
    totalPriceCents: row.totalPriceCents,
    accessible: row.accessible,
    packStatus: row.packStatus,
    posStatus: row.posStatus,
    packState: row.packState,
    delistReason: row.delistReason,
    sourcePackIds: row.sourcePackIds,
    manuallyHeld: row.manuallyHeld,
    posListingId: row.posListingId,
    syncedToPos: row.syncedToPos,
    posSyncAttempts: row.posSyncAttempts,
    lastPosSyncAttempt: row.lastPosSyncAttempt,
    posSyncError: row.posSyncError,
    posOperationId: row.posOperationId,
    posOperationStatus: row.posOperationStatus,
    version: row.version,
    lockedBy: row.lockedBy,
    lockedAt: row.lockedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

// Columns a versioned write may touch; composition and lease columns are excluded
function mutableColumns(pack: SeatPack) {
  return {
    sectionName: pack.sectionName,
    unitPriceCents: pack.unitPriceCents,
    packPriceCents: pack.packPriceCents,
    totalPriceCents: pack.totalPriceCents,
    accessible: pack.accessible,
    packStatus: pack.packStatus,
    posStatus: pack.posStatus,
    packState: pack.packState,
    delistReason: pack.delistReason,
    sourcePackIds: [...pack.sourcePackIds],
    manuallyHeld: pack.manuallyHeld,
    posListingId: pack.posListingId,
    syncedToPos: pack.syncedToPos,
    posSyncAttempts: pack.posSyncAttempts,
    lastPosSyncAttempt: pack.lastPosSyncAttempt,
    posSyncError: pack.posSyncError,
    posOperationId: pack.posOperationId,
    posOperationStatus: pack.posOperationStatus,
    updatedAt: pack.updatedAt,
  };
}

function packToInsertRow(pack: SeatPack): NewSeatPackRow {
  return {
    ...mutableColumns(pack),
    packId: pack.packId,
    performanceId: pack.performanceId,
    venueId: pack.venueId,
    sourceWebsite: pack.sourceWebsite,
    levelId: pack.levelId,
    zoneId: pack.zoneId,
    sectionId: pack.sectionId,
    rowLabel: pack.rowLabel,
    seatIds: [...pack.seatIds],
    startSeatNumber: pack.startSeatNumber,
    endSeatNumber: pack.endSeatNumber,
    packSize: pack.packSize,
    version: 1,
    lockedBy: null,
    lockedAt: null,
    createdAt: pack.createdAt,
  };
}

function rowToMarkup(row: VenueRow): MarkupRule | null {
  if (row.markupType === null || row.markupValue === null) return null;
  return row.markupType === 'percentage'
    ? { type: 'percentage', percent: row.markupValue }
    : { type: 'dollar', amountCents: row.markupValue };
}

function rowToVenue(row: VenueRow): Venue {
  return {
    venueId: row.id,
    name: row.name,
    city: row.city,
    stateProvince: row.stateProvince,
    countryCode: row.countryCode,
    timezone: row.timezone,
    sourceWebsite: row.sourceWebsite,
    seatStructure: row.seatStructure,
    previousSeatStructure: row.previousSeatStructure,
    markup: rowToMarkup(row),
  };
}

function rowToPerformance(row: PerformanceRow): Performance {
  return {
    performanceId: row.id,
    venueId: row.venueId,
    eventName: row.eventName,
    startsAt: row.startsAt,
    posEnabled: row.posEnabled,
    isActive: row.isActive,
  };
}

function rowToFailedRollback(row: FailedRollbackRow): FailedRollback {
  return {
    id: row.id,
    operationId: row.operationId,
    packId: row.packId,
    action: row.action,
    payload: row.payload,
    error: row.error,
    createdAt: row.createdAt,
    resolvedAt: row.resolvedAt,
    resolvedBy: row.resolvedBy,
  };
}

function countWhere(condition: SQL) {
  return sql<number>`count(*) filter (where ${condition})`.mapWith(Number);
}

// ================================================
// STORE
// ================================================

export class DrizzleReconcilerStore implements ReconcilerStore {
  constructor(private readonly db: ReconcilerDatabase) {}

  // ---------------- seat packs ----------------

  async getPack(packId: string): Promise<SeatPack | null> {
    const rows = await this.db.select().from(seatPacks).where(eq(seatPacks.packId, packId)).limit(1);
    return rows.length > 0 ? rowToPack(rows[0]) : null;
  }

  async getActivePacks(performanceId: string): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(and(eq(seatPacks.performanceId, performanceId), eq(seatPacks.packStatus, 'active')))
      .orderBy(asc(seatPacks.createdAt));
    return rows.map(rowToPack);
  }

  async packsForPerformance(performanceId: string): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(eq(seatPacks.performanceId, performanceId))
      .orderBy(asc(seatPacks.createdAt));
    return rows.map(rowToPack);
  }

  async upsert(pack: SeatPack, expectedVersion: number): Promise<SeatPack> {
    assertPackInvariants(pack);

    if (expectedVersion === 0) {
      const inserted = await this.db
        .insert(seatPacks)
        .values(packToInsertRow(pack))
        .onConflictDoNothing({ target: seatPacks.packId })
        .returning();
      if (inserted.length === 0) {
        const current = await this.getPack(pack.packId);
        throw new VersionConflictError(pack.packId, 0, current?.version ?? null);
      }
      return rowToPack(inserted[0]);
    }

    const updated = await this.db
      .update(seatPacks)
      .set({ ...mutableColumns(pack), version: expectedVersion + 1 })
      .where(and(eq(seatPacks.packId, pack.packId), eq(seatPacks.version, expectedVersion)))
      .returning();
    if (updated.length === 0) {
      const current = await this.getPack(pack.packId);
      throw new VersionConflictError(pack.packId, expectedVersion, current?.version ?? null);
    }
    return rowToPack(updated[0]);
  }

  async acquireLease(packId: string, holderId: string, at: Date): Promise<SeatPack | null> {
    const rows = await this.db
      .update(seatPacks)
      .set({ lockedBy: holderId, lockedAt: at })
      .where(and(eq(seatPacks.packId, packId), or(isNull(seatPacks.lockedBy), eq(seatPacks.lockedBy, holderId))))
      .returning();
    return rows.length > 0 ? rowToPack(rows[0]) : null;
  }

  async releaseLease(packId: string, holderId: string): Promise<boolean> {
    const rows = await this.db
      .update(seatPacks)
      .set({ lockedBy: null, lockedAt: null })
      .where(and(eq(seatPacks.packId, packId), eq(seatPacks.lockedBy, holderId)))
      .returning({ packId: seatPacks.packId });
    return rows.length > 0;
  }

  async staleLeases(lockedBefore: Date): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(and(isNotNull(seatPacks.lockedBy), lt(seatPacks.lockedAt, lockedBefore)));
    return rows.map(rowToPack);
  }

  async packsNeedingSync(query: PackSyncQuery): Promise<SeatPack[]> {
    const conditions: Array<SQL | undefined> = [
      eq(seatPacks.syncedToPos, false),
      isNull(seatPacks.lockedBy),
      or(
        lt(seatPacks.posSyncAttempts, query.maxAttempts),
        lt(seatPacks.lastPosSyncAttempt, query.exhaustedRetryBefore)
      ),
      // Live packs of a performance that cannot be listed would only be skipped
      or(
        ne(seatPacks.packStatus, 'active'),
        notInArray(
          seatPacks.performanceId,
          this.db
            .select({ id: performances.id })
            .from(performances)
            .where(or(eq(performances.posEnabled, false), eq(performances.isActive, false)))
        )
      ),
    ];
    if (query.performanceId) {
      conditions.push(eq(seatPacks.performanceId, query.performanceId));
    }

    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(and(...conditions))
      .orderBy(asc(seatPacks.posSyncAttempts), asc(seatPacks.createdAt))
      .limit(query.limit);
    return rows.map(rowToPack);
  }

  async recentManualDelists(since: Date): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(and(eq(seatPacks.delistReason, 'manual_delist'), gte(seatPacks.updatedAt, since)))
      .orderBy(desc(seatPacks.updatedAt));
    return rows.map(rowToPack);
  }

  async staleOperations(startedBefore: Date): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(and(eq(seatPacks.posOperationStatus, 'started'), lt(seatPacks.lastPosSyncAttempt, startedBefore)));
    return rows.map(rowToPack);
  }

  async bulkDelistForVenue(venueId: string, reason: DelistReason, at: Date): Promise<BulkDelistResult> {
    const rows = await this.db
      .update(seatPacks)
      .set({
        packStatus: 'inactive',
        packState: 'delist',
        delistReason: reason,
        posStatus: sql`CASE WHEN ${seatPacks.posListingId} IS NULL THEN 'inactive' ELSE 'pending' END`,
        syncedToPos: sql`${seatPacks.posListingId} IS NULL`,
        version: sql`${seatPacks.version} + 1`,
        updatedAt: at,
      })
      .where(
        and(
          eq(seatPacks.venueId, venueId),
          eq(seatPacks.packStatus, 'active'),
          eq(seatPacks.manuallyHeld, false),
          isNull(seatPacks.lockedBy)
        )
      )
      .returning({ packId: seatPacks.packId });

    const [remaining] = await this.db
      .select({ leased: countWhere(sql`${seatPacks.lockedBy} IS NOT NULL`) })
      .from(seatPacks)
      .where(and(eq(seatPacks.venueId, venueId), eq(seatPacks.packStatus, 'active'), eq(seatPacks.manuallyHeld, false)));

    return { delisted: rows.length, leased: remaining?.leased ?? 0 };
  }

  async countSyncHealth(query: SyncHealthQuery): Promise<SyncHealthCounts> {
    const [packs] = await this.db
      .select({
        unsynced: countWhere(sql`${seatPacks.syncedToPos} = false`),
        failed: countWhere(sql`${seatPacks.posStatus} = 'failed'`),
        pending: countWhere(sql`${seatPacks.posStatus} = 'pending'`),
        highRetry: countWhere(sql`${seatPacks.posSyncAttempts} >= ${query.highRetryThreshold}`),
        activeLeases: countWhere(sql`${seatPacks.lockedBy} IS NOT NULL`),
        staleLeases: countWhere(sql`${seatPacks.lockedBy} IS NOT NULL AND ${seatPacks.lockedAt} < ${query.staleLeaseBefore}`),
        operationsInFlight: countWhere(sql`${seatPacks.posOperationStatus} = 'started'`),
      })
      .from(seatPacks);

    const [rollbacks] = await this.db
      .select({ count: sql<number>`count(*)`.mapWith(Number) })
      .from(failedRollbacks)
      .where(isNull(failedRollbacks.resolvedAt));

    return { ...packs, unresolvedFailedRollbacks: rollbacks.count };
  }

  // ---------------- listing records ----------------

  async recordListing(packId: string, listingId: string, at: Date): Promise<ListingRecord> {
    const [row] = await this.db.insert(posListings).values({ packId, listingId, createdAt: at }).returning();
    return { packId: row.packId, listingId: row.listingId, createdAt: row.createdAt, removedAt: row.removedAt };
  }

  async removeListingRecord(packId: string, listingId: string): Promise<boolean> {
    const rows = await this.db
      .delete(posListings)
      .where(and(eq(posListings.packId, packId), eq(posListings.listingId, listingId), isNull(posListings.removedAt)))
      .returning({ id: posListings.id });
    return rows.length > 0;
  }

  async markListingRemoved(packId: string, listingId: string, at: Date): Promise<boolean> {
    const rows = await this.db
      .update(posListings)
      .set({ removedAt: at })
      .where(and(eq(posListings.packId, packId), eq(posListings.listingId, listingId), isNull(posListings.removedAt)))
      .returning({ id: posListings.id });
    return rows.length > 0;
  }

  // ---------------- failed rollbacks ----------------

  async appendFailedRollback(entry: NewFailedRollback): Promise<FailedRollback> {
    const [row] = await this.db.insert(failedRollbacks).values(entry).returning();
    return rowToFailedRollback(row);
  }

  async listFailedRollbacks(options: { unresolvedOnly?: boolean } = {}): Promise<FailedRollback[]> {
    const rows = await this.db
      .select()
      .from(failedRollbacks)
      .where(options.unresolvedOnly ? isNull(failedRollbacks.resolvedAt) : undefined)
      .orderBy(asc(failedRollbacks.createdAt));
    return rows.map(rowToFailedRollback);
  }

  async resolveFailedRollback(id: number, resolvedBy: string, at: Date): Promise<boolean> {
    const rows = await this.db
      .update(failedRollbacks)
      .set({ resolvedAt: at, resolvedBy })
      .where(and(eq(failedRollbacks.id, id), isNull(failedRollbacks.resolvedAt)))
      .returning({ id: failedRollbacks.id });
    return rows.length > 0;
  }

  // ---------------- venues & performances ----------------

  async getVenue(venueId: string): Promise<Venue | null> {
    const rows = await this.db.select().from(venues).where(eq(venues.id, venueId)).limit(1);
    return rows.length > 0 ? rowToVenue(rows[0]) : null;
  }

  async getPerformance(performanceId: string): Promise<Performance | null> {
    const rows = await this.db.select().from(performances).where(eq(performances.id, performanceId)).limit(1);
    return rows.length > 0 ? rowToPerformance(rows[0]) : null;
  }

  async activePerformancesForVenue(venueId: string): Promise<Performance[]> {
    const rows = await this.db
      .select()
      .from(performances)
      .where(and(eq(performances.venueId, venueId), eq(performances.isActive, true)))
      .orderBy(asc(performances.startsAt));
    return rows.map(rowToPerformance);
  }

  async updateVenueStructure(
    venueId: string,
    current: NumberingScheme | null,
    previous: NumberingScheme | null
  ): Promise<void> {
    await this.db
      .update(venues)
      .set({ seatStructure: current, previousSeatStructure: previous, updatedAt: new Date() })
      .where(eq(venues.id, venueId));
  }

  async setPerformancePosEnabled(performanceId: string, enabled: boolean): Promise<void> {
    await this.db.update(performances).set({ posEnabled: enabled }).where(eq(performances.id, performanceId));
  }
}
