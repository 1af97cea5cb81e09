/**
 * Seat Pack Reconciler - POS Sync Engine
 * ======================================
 * Drains packs whose POS state is stale: one lease per pack, bounded
 * batches with a pause between them, least-attempted packs first.
 * A single pack's failure is reported in the run summary and never
 * aborts the run.
 */

import { randomUUID } from 'crypto';
import { errorMessage } from '../../errors';
import type { PosApi } from '../../types/pos';
import type { SeatPack } from '../../types/seat-pack';
import { log } from '../../utils/log';
import { sleep as defaultSleep, type RetryOptions } from '../../utils/retry';
import type { ReconcilerStore } from '../lineage/repository';
import type { LeaseManager } from '../locking/lease-manager';
import {
  notifySafely,
  syncCompletedEvent,
  syncFailedEvent,
  syncStartedEvent,
  type SyncEventPublisher,
} from '../notifications';
import { listingContextFor } from './client/payload-transformer';
import { DEFAULT_POS_SYNC_SETTINGS, type PosSyncSettings } from './config/constants';
import { delistPack } from './operations/delist-pack';
import { planOperation } from './operations/plan-operation';
import { pushPack } from './operations/push-pack';
import type { PackOperationContext, PackSyncOutcome } from './operations/types';
import { SyncMetrics } from './sync-metrics';
import { classifySyncError } from './utils/error-classifier';
import { createGhostPackGuard } from './utils/pack-validator';

// ================================================
// ENGINE TYPES
// ================================================

export interface PosSyncEngineDeps {
  repository: ReconcilerStore;
  posApi: PosApi;
  leases: LeaseManager;
  publisher?: SyncEventPublisher | null;
  settings?: Partial<PosSyncSettings>;
  holderId?: string;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  metrics?: SyncMetrics;
  retry?: Omit<RetryOptions, 'shouldRetry'>;
}

export interface SyncRunOptions {
  performanceId?: string;
  limit?: number;
}

export interface SyncRunResult {
  performanceId: string | null;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  batches: number;
  durationMs: number;
  outcomes: PackSyncOutcome[];
  errors: Array<{ packId: string; error: string }>;
}

const RUN_LIMIT_BATCHES = 10;

// ================================================
// SYNC ENGINE
// ================================================

export class PosSyncEngine {
  readonly holderId: string;
  readonly settings: PosSyncSettings;
  readonly metrics: SyncMetrics;

  private readonly repository: ReconcilerStore;
  private readonly leases: LeaseManager;
  private readonly publisher: SyncEventPublisher | null;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly operationContext: PackOperationContext;

  constructor(deps: PosSyncEngineDeps) {
    this.repository = deps.repository;
    this.leases = deps.leases;
    this.publisher = deps.publisher ?? null;
    this.settings = { ...DEFAULT_POS_SYNC_SETTINGS, ...deps.settings };
    this.holderId = deps.holderId ?? `pos-sync-${randomUUID()}`;
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
    this.metrics = deps.metrics ?? new SyncMetrics();

    this.operationContext = {
      repository: deps.repository,
      posApi: deps.posApi,
      guard: createGhostPackGuard(),
      settings: this.settings,
      holderId: this.holderId,
      clock: this.clock,
      retry: deps.retry,
    };
  }

  // ================================================
  // BATCH RUN
  // ================================================

  async syncPendingPacks(options: SyncRunOptions = {}): Promise<SyncRunResult> {
    const performanceId = options.performanceId ?? null;
    const startedAt = this.clock();
    const result: SyncRunResult = {
      performanceId,
      processed: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      batches: 0,
      durationMs: 0,
      outcomes: [],
      errors: [],
    };

    if (!this.settings.enabled) {
      log.info('ℹ️ POS sync disabled, leaving packs queued');
      return result;
    }

    let packs: SeatPack[];
    try {
      packs = await this.repository.packsNeedingSync({
        performanceId: options.performanceId,
        limit: options.limit ?? this.settings.batchSize * RUN_LIMIT_BATCHES,
        maxAttempts: this.settings.maxRetryAttempts,
        exhaustedRetryBefore: new Date(startedAt.getTime() - this.settings.failedRetryCooldownMs),
      });
    } catch (error) {
      await notifySafely(this.publisher, syncFailedEvent(performanceId, classifySyncError(error), this.clock()));
      throw error;
    }

    this.metrics.recordRun(startedAt);
    log.info(`🔄 POS sync started: ${packs.length} pack(s)${performanceId ? ` for ${performanceId}` : ''}`);
    await notifySafely(this.publisher, syncStartedEvent(performanceId, packs.length, startedAt));

    for (let offset = 0; offset < packs.length; offset += this.settings.batchSize) {
      if (offset > 0 && this.settings.batchDelayMs > 0) {
        await this.sleep(this.settings.batchDelayMs);
      }

      const batch = packs.slice(offset, offset + this.settings.batchSize);
      const settled = await Promise.allSettled(batch.map((pack) => this.syncPack(pack.packId)));
      result.batches++;

      settled.forEach((entry, index) => {
        result.processed++;
        if (entry.status === 'rejected') {
          const packId = batch[index].packId;
          const message = errorMessage(entry.reason);
          log.error(`❌ POS sync of ${packId} threw: ${message}`);
          result.failed++;
          result.errors.push({ packId, error: message });
          return;
        }

        const outcome = entry.value;
        result.outcomes.push(outcome);
        if (outcome.status === 'succeeded') result.succeeded++;
        else if (outcome.status === 'failed') {
          result.failed++;
          result.errors.push({ packId: outcome.packId, error: outcome.error });
        } else result.skipped++;
      });
    }

    result.durationMs = this.clock().getTime() - startedAt.getTime();
    log.info(
      `✅ POS sync completed: ${result.succeeded} succeeded, ${result.failed} failed, ${result.skipped} skipped`
    );
    await notifySafely(
      this.publisher,
      syncCompletedEvent(
        performanceId,
        {
          processed: result.processed,
          succeeded: result.succeeded,
          failed: result.failed,
          skipped: result.skipped,
          durationMs: Math.max(0, result.durationMs),
        },
        this.clock()
      )
    );

    return result;
  }

  // ================================================
  // SINGLE PACK
  // ================================================

  /**
   * Bring one pack's POS state in line with its lifecycle state under its lease.
   */
  async syncPack(packId: string): Promise<PackSyncOutcome> {
    const leased = await this.leases.withLease(packId, this.holderId, (pack) => this.runOperation(pack));

    const outcome: PackSyncOutcome = leased.acquired
      ? leased.value
      : { packId, operation: 'none', status: 'skipped', reason: leased.reason === 'held' ? 'leased' : 'missing' };

    this.metrics.recordOutcome(outcome);
    return outcome;
  }

  private async runOperation(pack: SeatPack): Promise<PackSyncOutcome> {
    const operation = planOperation(pack);

    switch (operation) {
      case 'none':
        return { packId: pack.packId, operation, status: 'skipped', reason: 'nothing_to_do' };

      case 'push': {
        if (!this.settings.createEnabled) {
          return { packId: pack.packId, operation, status: 'skipped', reason: 'disabled' };
        }
        const performance = await this.repository.getPerformance(pack.performanceId);
        const venue = await this.repository.getVenue(pack.venueId);
        if (!performance || !venue) {
          return { packId: pack.packId, operation, status: 'skipped', reason: 'missing' };
        }
        if (!performance.posEnabled || !performance.isActive) {
          return { packId: pack.packId, operation, status: 'skipped', reason: 'performance_disabled' };
        }
        return pushPack(this.operationContext, pack, listingContextFor(performance, venue));
      }

      case 'delist':
        if (!this.settings.deleteEnabled) {
          return { packId: pack.packId, operation, status: 'skipped', reason: 'disabled' };
        }
        return delistPack(this.operationContext, pack);
    }
  }
}
