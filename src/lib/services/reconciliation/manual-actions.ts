/**
 * Manual Pack Actions
 * ===================
 *
 * Operator overrides. Each action runs under the pack's lease and goes
 * through the versioned write path like any engine write, so a pack the
 * engine is working on is reported as LEASED instead of being raced.
 */

import { randomUUID } from 'crypto';
import { errorMessage, InvalidTransitionError } from '../../errors';
import type { PosApi } from '../../types/pos';
import type { SeatPack, SeatPackChanges } from '../../types/seat-pack';
import { log } from '../../utils/log';
import type { RetryOptions } from '../../utils/retry';
import type { ReconcilerStore } from '../lineage/repository';
import { assertPackStateTransition, isLivePackState, posStatusAfterDeactivation } from '../lineage/state-rules';
import type { LeaseManager } from '../locking/lease-manager';
import { updatePackWithRetry } from '../locking/versioned-write';
import { POS_API_CONFIG } from '../pos-sync/config/constants';
import type { ManualActionFailure } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ManualActionResult =
  | { ok: true; pack: SeatPack }
  | { ok: false; code: ManualActionFailure; message: string };

export interface PerformanceToggleResult {
  performanceId: string;
  enabled: boolean;
  updated: string[];
  skipped: Array<{ packId: string; code: ManualActionFailure; message: string }>;
}

export interface ManualPackActionsDeps {
  store: ReconcilerStore;
  leases: LeaseManager;
  posApi: PosApi;
  holderId?: string;
  clock?: () => Date;
  retry?: Omit<RetryOptions, 'shouldRetry'>;
}

function failure(code: ManualActionFailure, message: string): ManualActionResult {
  return { ok: false, code, message };
}

const REACTIVATION: SeatPackChanges = {
  packStatus: 'active',
  packState: 'create',
  delistReason: null,
  manuallyHeld: false,
  posStatus: 'pending',
  syncedToPos: false,
  posSyncAttempts: 0,
  posSyncError: null,
  posOperationId: null,
  posOperationStatus: null,
};

export class ManualPackActions {
  private readonly store: ReconcilerStore;
  private readonly leases: LeaseManager;
  private readonly posApi: PosApi;
  private readonly holderId: string;
  private readonly clock: () => Date;
  private readonly retry?: Omit<RetryOptions, 'shouldRetry'>;

  constructor(deps: ManualPackActionsDeps) {
    this.store = deps.store;
    this.leases = deps.leases;
    this.posApi = deps.posApi;
    this.holderId = deps.holderId ?? `manual-${randomUUID()}`;
    this.clock = deps.clock ?? (() => new Date());
    this.retry = deps.retry;
  }

  // ================================================
  // SINGLE PACK
  // ================================================

  /** Take a pack off sale and keep regeneration from bringing it back */
  async manualDelist(packId: string): Promise<ManualActionResult> {
    return this.underLease(packId, async (pack) => {
      if (pack.packStatus !== 'active') {
        return failure('INVALID_STATE', `Pack ${packId} is already ${pack.packStatus}`);
      }
      assertPackStateTransition(packId, pack.packState, 'delist');

      const updated = await this.write(packId, (current) => ({
        packStatus: 'inactive',
        packState: 'delist',
        delistReason: 'manual_delist',
        manuallyHeld: true,
        ...posStatusAfterDeactivation(current),
      }));
      log.info(`🛑 Pack ${packId} delisted manually`);
      return { ok: true, pack: updated };
    });
  }

  async reactivate(packId: string): Promise<ManualActionResult> {
    return this.underLease(packId, async (pack) => {
      if (pack.packState !== 'delist') {
        return failure('INVALID_STATE', `Only delisted packs can be reactivated, ${packId} is ${pack.packState}`);
      }
      assertPackStateTransition(packId, pack.packState, 'create');

      const updated = await this.write(packId, () => REACTIVATION);
      log.info(`♻️ Pack ${packId} reactivated`);
      return { ok: true, pack: updated };
    });
  }

  /**
   * Freeze a live listing on the POS side. The listing stays upstream,
   * suspended, until the hold expires or an operator reactivates the pack.
   */
  async placeAdminHold(packId: string, notes = 'Admin hold'): Promise<ManualActionResult> {
    return this.underLease(packId, async (pack) => {
      if (pack.posListingId === null || pack.posStatus !== 'active') {
        return failure('INVALID_STATE', `Pack ${packId} has no live POS listing`);
      }
      if (!isLivePackState(pack.packState)) {
        return failure('INVALID_STATE', `Pack ${packId} is ${pack.packState}`);
      }

      const expiration = new Date(this.clock().getTime() + POS_API_CONFIG.ADMIN_HOLD_DAYS * DAY_MS);
      const hold = await this.posApi.placeAdminHold(pack.posListingId, {
        expirationDate: expiration.toISOString(),
        notes,
      });
      if (!hold.ok) {
        log.error(`❌ Admin hold on ${packId} failed: ${hold.error.message}`);
        return failure('POS_ERROR', hold.error.message);
      }

      const updated = await this.write(packId, () => ({
        packStatus: 'inactive',
        packState: 'delist',
        delistReason: 'admin_hold',
        manuallyHeld: true,
        posStatus: 'suspended',
        syncedToPos: true,
        posSyncError: null,
      }));
      log.info(`⏸️ Admin hold placed on ${packId} until ${expiration.toISOString()}`);
      return { ok: true, pack: updated };
    });
  }

  // ================================================
  // PERFORMANCE TOGGLE
  // ================================================

  async setPerformancePosEnabled(performanceId: string, enabled: boolean): Promise<PerformanceToggleResult> {
    await this.store.setPerformancePosEnabled(performanceId, enabled);
    const result: PerformanceToggleResult = { performanceId, enabled, updated: [], skipped: [] };

    const targets = enabled
      ? (await this.store.packsForPerformance(performanceId)).filter(
          (pack) => pack.packState === 'delist' && pack.delistReason === 'performance_disabled'
        )
      : await this.store.getActivePacks(performanceId);

    for (const target of targets) {
      const outcome = enabled ? await this.restore(target.packId) : await this.disable(target.packId);
      if (outcome.ok) result.updated.push(target.packId);
      else result.skipped.push({ packId: target.packId, code: outcome.code, message: outcome.message });
    }

    log.info(`🎛️ POS ${enabled ? 'enabled' : 'disabled'} for ${performanceId}: ${result.updated.length} pack(s) updated`);
    return result;
  }

  recentManualDelists(days = 7): Promise<SeatPack[]> {
    return this.store.recentManualDelists(new Date(this.clock().getTime() - days * DAY_MS));
  }

  // ================================================
  // HELPERS
  // ================================================

  private disable(packId: string): Promise<ManualActionResult> {
    return this.underLease(packId, async (pack) => {
      if (pack.packStatus !== 'active') return failure('INVALID_STATE', `Pack ${packId} is already ${pack.packStatus}`);
      assertPackStateTransition(packId, pack.packState, 'delist');

      const updated = await this.write(packId, (current) => ({
        packStatus: 'inactive',
        packState: 'delist',
        delistReason: 'performance_disabled',
        ...posStatusAfterDeactivation(current),
      }));
      return { ok: true, pack: updated };
    });
  }

  private restore(packId: string): Promise<ManualActionResult> {
    return this.underLease(packId, async (pack) => {
      if (pack.delistReason !== 'performance_disabled') {
        return failure('INVALID_STATE', `Pack ${packId} was not delisted by the performance toggle`);
      }
      return { ok: true, pack: await this.write(packId, () => REACTIVATION) };
    });
  }

  private async underLease(
    packId: string,
    work: (pack: SeatPack) => Promise<ManualActionResult>
  ): Promise<ManualActionResult> {
    try {
      const outcome = await this.leases.withLease(packId, this.holderId, work);
      if (outcome.acquired) return outcome.value;
      return outcome.reason === 'held'
        ? failure('LEASED', `Pack ${packId} is leased by ${outcome.holder ?? 'another holder'}`)
        : failure('NOT_FOUND', `Pack ${packId} not found`);
    } catch (error) {
      if (error instanceof InvalidTransitionError) return failure('INVALID_STATE', errorMessage(error));
      throw error;
    }
  }

  private write(packId: string, mutate: (current: SeatPack) => SeatPackChanges): Promise<SeatPack> {
    return updatePackWithRetry(this.store, packId, mutate, {
      holderId: this.holderId,
      clock: this.clock,
      retry: this.retry,
    });
  }
}
