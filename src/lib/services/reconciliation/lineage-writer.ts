/**
 * Lineage Writer
 * ==============
 *
 * Persists a pack comparison one pack at a time, each under its own lease:
 * removed packs are retired first, then new packs are inserted (or a
 * historical row with the same identity is revived), then price, section
 * name and accessibility changes on retained packs are stored. Those are
 * not pushed to the POS here; the next push of the pack carries them.
 */

import type { PackDraft, PackOrigin, SeatPack, SeatPackChanges } from '../../types/seat-pack';
import { VersionConflictError } from '../../errors';
import { log } from '../../utils/log';
import type { RetryOptions } from '../../utils/retry';
import type { PackComparison, RemovedPack } from '../pack-diff';
import type { SeatPackRepository } from '../lineage/repository';
import { assertPackRevival, assertPackStateTransition, posStatusAfterDeactivation } from '../lineage/state-rules';
import type { LeaseManager } from '../locking/lease-manager';
import { updatePackWithRetry } from '../locking/versioned-write';

// ================================================
// RESULT TYPES
// ================================================

export type LineageSkipReason = 'leased' | 'missing' | 'already_inactive' | 'already_active' | 'operator_held';

export interface LineageWriteResult {
  deactivated: string[];
  inserted: string[];
  revived: string[];
  updated: string[];
  skipped: Array<{ packId: string; reason: LineageSkipReason }>;
}

export interface LineageWriterOptions {
  holderId: string;
  clock?: () => Date;
  retry?: Omit<RetryOptions, 'shouldRetry'>;
}

type StepResult = 'written' | 'revived' | LineageSkipReason;

// ================================================
// PACK CONSTRUCTION
// ================================================

export function newSeatPack(draft: PackDraft, origin: PackOrigin, sourcePackIds: readonly string[], at: Date): SeatPack {
  return {
    ...draft,
    packStatus: 'active',
    posStatus: 'pending',
    packState: origin,
    delistReason: null,
    sourcePackIds: [...sourcePackIds],
    manuallyHeld: false,
    posListingId: null,
    syncedToPos: false,
    posSyncAttempts: 0,
    lastPosSyncAttempt: null,
    posSyncError: null,
    posOperationId: null,
    posOperationStatus: null,
    version: 0,
    lockedBy: null,
    lockedAt: null,
    createdAt: at,
    updatedAt: at,
  };
}

/**
 * A retired row whose identity was regenerated starts a new lifecycle in
 * place. The POS listing, if one is still live, is kept so the next push
 * can reuse it.
 */
function revivalChanges(draft: PackDraft, origin: PackOrigin, sourcePackIds: readonly string[]): SeatPackChanges {
  return {
    packStatus: 'active',
    packState: origin,
    delistReason: null,
    sourcePackIds: [...sourcePackIds],
    posStatus: 'pending',
    syncedToPos: false,
    posSyncAttempts: 0,
    posSyncError: null,
    posOperationId: null,
    posOperationStatus: null,
    sectionName: draft.sectionName,
    unitPriceCents: draft.unitPriceCents,
    packPriceCents: draft.packPriceCents,
    totalPriceCents: draft.totalPriceCents,
    accessible: draft.accessible,
  };
}

function isOperatorHeld(pack: SeatPack): boolean {
  return pack.manuallyHeld || pack.delistReason === 'manual_delist' || pack.delistReason === 'admin_hold';
}

// ================================================
// LINEAGE WRITER
// ================================================

export class LineageWriter {
  private readonly clock: () => Date;

  constructor(
    private readonly repository: SeatPackRepository,
    private readonly leases: LeaseManager,
    private readonly options: LineageWriterOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async write(comparison: PackComparison): Promise<LineageWriteResult> {
    const result: LineageWriteResult = { deactivated: [], inserted: [], revived: [], updated: [], skipped: [] };

    const record = (packId: string, outcome: StepResult, bucket: string[]) => {
      if (outcome === 'written') bucket.push(packId);
      else if (outcome === 'revived') result.revived.push(packId);
      else result.skipped.push({ packId, reason: outcome });
    };

    for (const removed of comparison.removed) {
      record(removed.pack.packId, await this.retire(removed), result.deactivated);
    }

    for (const created of comparison.created) {
      record(created.draft.packId, await this.insert(created.draft, created.origin, created.sourcePackIds), result.inserted);
    }

    for (const { existing, next } of comparison.equivalent) {
      record(existing.packId, await this.updateRetained(existing.packId, next), result.updated);
    }

    log.info(
      `🧬 Lineage written for ${comparison.performanceId}: ${result.inserted.length} new, ${result.revived.length} revived, ` +
        `${result.deactivated.length} retired, ${result.updated.length} updated, ${result.skipped.length} skipped`
    );
    return result;
  }

  // ================================================
  // STEPS
  // ================================================

  private async retire(removed: RemovedPack): Promise<StepResult> {
    const target = removed.reason === 'transformed' ? 'transformed' : 'delist';

    return this.underLease(removed.pack.packId, async (pack) => {
      if (pack.packStatus !== 'active') return 'already_inactive';
      assertPackStateTransition(pack.packId, pack.packState, target);

      await this.versionedWrite(pack.packId, (current) => ({
        packStatus: 'inactive',
        packState: target,
        delistReason: removed.reason,
        ...posStatusAfterDeactivation(current),
      }));
      return 'written';
    });
  }

  private async insert(draft: PackDraft, origin: PackOrigin, sourcePackIds: readonly string[]): Promise<StepResult> {
    const existing = await this.repository.getPack(draft.packId);

    if (!existing) {
      try {
        await this.repository.upsert(newSeatPack(draft, origin, sourcePackIds, this.clock()), 0);
        return 'written';
      } catch (error) {
        // Another worker inserted the same identity first
        if (error instanceof VersionConflictError) return 'already_active';
        throw error;
      }
    }

    return this.underLease(draft.packId, async (pack) => {
      if (pack.packStatus === 'active') return 'already_active';
      if (isOperatorHeld(pack)) return 'operator_held';
      assertPackRevival(pack.packId, pack.packState, origin);

      await this.versionedWrite(pack.packId, () => revivalChanges(draft, origin, sourcePackIds));
      log.info(
        `♻️ Revived ${pack.packId} (${pack.packState} -> ${origin}), ` +
          `previous sources [${pack.sourcePackIds.join(', ')}], previous reason ${pack.delistReason ?? 'none'}`
      );
      return 'revived';
    });
  }

  private async updateRetained(packId: string, next: PackDraft): Promise<StepResult> {
    return this.underLease(packId, async (pack) => {
      if (pack.packStatus !== 'active') return 'already_inactive';
      await this.versionedWrite(packId, () => ({
        unitPriceCents: next.unitPriceCents,
        packPriceCents: next.packPriceCents,
        totalPriceCents: next.totalPriceCents,
        sectionName: next.sectionName,
        accessible: next.accessible,
      }));
      return 'written';
    });
  }

  // ================================================
  // HELPERS
  // ================================================

  private async underLease(packId: string, work: (pack: SeatPack) => Promise<StepResult>): Promise<StepResult> {
    const outcome = await this.leases.withLease(packId, this.options.holderId, work);
    if (outcome.acquired) return outcome.value;
    if (outcome.reason === 'held') {
      log.warn(`⚠️ Pack ${packId} is leased by ${outcome.holder ?? 'another holder'}, leaving it for the next pass`);
      return 'leased';
    }
    return 'missing';
  }

  private versionedWrite(packId: string, mutate: (current: SeatPack) => SeatPackChanges): Promise<SeatPack> {
    return updatePackWithRetry(this.repository, packId, mutate, {
      holderId: this.options.holderId,
      clock: this.clock,
      retry: this.options.retry,
    });
  }
}
