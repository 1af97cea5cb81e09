/**
 * Sync Health
 * ===========
 *
 * Store-side counts plus the engine's in-process counters, rolled into a
 * single status. Also clears POS operations that never finished.
 */

import { randomUUID } from 'crypto';
import type { SeatPack } from '../../types/seat-pack';
import { log } from '../../utils/log';
import type { SeatPackRepository, SyncHealthCounts } from '../lineage/repository';
import { DEFAULT_LEASE_STALE_AFTER_MS, type LeaseManager } from '../locking/lease-manager';
import { updatePackWithRetry } from '../locking/versioned-write';
import { SYNC_HEALTH_CONFIG } from '../pos-sync/config/constants';
import type { SyncCounter, SyncMetrics } from '../pos-sync/sync-metrics';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface SyncHealthReport {
  status: HealthStatus;
  issues: string[];
  counts: SyncHealthCounts;
  counters: Record<SyncCounter, number>;
  lastRunAt: Date | null;
  staleLeasesCleared: number;
  checkedAt: Date;
}

export interface StaleOperationCleanup {
  found: number;
  cleaned: string[];
  skipped: string[];
}

export interface SyncHealthMonitorDeps {
  repository: SeatPackRepository;
  leases: LeaseManager;
  metrics: SyncMetrics;
  holderId?: string;
  leaseStaleAfterMs?: number;
  staleOperationAfterMs?: number;
  clock?: () => Date;
}

export function healthIssues(counts: SyncHealthCounts): { status: HealthStatus; issues: string[] } {
  const issues: string[] = [];
  if (counts.unresolvedFailedRollbacks > 0) issues.push(`${counts.unresolvedFailedRollbacks} failed rollback(s) need manual resolution`);
  if (counts.failed > 0) issues.push(`${counts.failed} pack(s) failed to sync`);
  if (counts.staleLeases > 0) issues.push(`${counts.staleLeases} stale lease(s)`);
  if (counts.highRetry > 0) issues.push(`${counts.highRetry} pack(s) at ${SYNC_HEALTH_CONFIG.HIGH_RETRY_THRESHOLD}+ attempts`);

  if (counts.unresolvedFailedRollbacks > 0) return { status: 'unhealthy', issues };
  return { status: issues.length > 0 ? 'degraded' : 'healthy', issues };
}

export class SyncHealthMonitor {
  private readonly repository: SeatPackRepository;
  private readonly leases: LeaseManager;
  private readonly metrics: SyncMetrics;
  private readonly holderId: string;
  private readonly leaseStaleAfterMs: number;
  private readonly staleOperationAfterMs: number;
  private readonly clock: () => Date;

  constructor(deps: SyncHealthMonitorDeps) {
    this.repository = deps.repository;
    this.leases = deps.leases;
    this.metrics = deps.metrics;
    this.holderId = deps.holderId ?? `health-${randomUUID()}`;
    this.leaseStaleAfterMs = deps.leaseStaleAfterMs ?? DEFAULT_LEASE_STALE_AFTER_MS;
    this.staleOperationAfterMs = deps.staleOperationAfterMs ?? SYNC_HEALTH_CONFIG.STALE_OPERATION_AFTER_MS;
    this.clock = deps.clock ?? (() => new Date());
  }

  async getHealthMetrics(): Promise<SyncHealthReport> {
    const checkedAt = this.clock();
    const counts = await this.repository.countSyncHealth({
      highRetryThreshold: SYNC_HEALTH_CONFIG.HIGH_RETRY_THRESHOLD,
      staleLeaseBefore: new Date(checkedAt.getTime() - this.leaseStaleAfterMs),
    });
    const { counters, lastRunAt } = this.metrics.snapshot();

    return {
      ...healthIssues(counts),
      counts,
      counters,
      lastRunAt,
      staleLeasesCleared: this.leases.staleLeasesCleared,
      checkedAt,
    };
  }

  /**
   * Operations still `started` past the cutoff are counted as a failed
   * attempt so the regular retry path picks the pack up again.
   */
  async cleanupStaleOperations(): Promise<StaleOperationCleanup> {
    const cutoff = new Date(this.clock().getTime() - this.staleOperationAfterMs);
    const stale = await this.repository.staleOperations(cutoff);
    const result: StaleOperationCleanup = { found: stale.length, cleaned: [], skipped: [] };

    for (const pack of stale) {
      const outcome = await this.leases.withLease(pack.packId, this.holderId, (current) => this.timeOut(current));
      if (outcome.acquired && outcome.value) result.cleaned.push(pack.packId);
      else result.skipped.push(pack.packId);
    }

    if (result.cleaned.length > 0) {
      log.warn(`🧹 Timed out ${result.cleaned.length} stale POS operation(s)`);
    }
    return result;
  }

  private async timeOut(pack: SeatPack): Promise<boolean> {
    // Finished between the query and the lease
    if (pack.posOperationStatus !== 'started') return false;

    await updatePackWithRetry(
      this.repository,
      pack.packId,
      (current) => ({
        posOperationStatus: 'failed',
        posStatus: 'failed',
        syncedToPos: false,
        posSyncError: SYNC_HEALTH_CONFIG.OPERATION_TIMEOUT_ERROR,
        posSyncAttempts: current.posSyncAttempts + 1,
      }),
      { holderId: this.holderId, clock: this.clock }
    );
    return true;
  }
}
