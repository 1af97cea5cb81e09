/**
 * Seat Pack Reconciler - Performance Reconciliation
 * =================================================
 * One pass for one performance: generate packs from the latest seat
 * snapshot, diff them against the stored active packs, persist the
 * lineage and, in immediate mode, drain the performance's POS queue.
 */

import { randomUUID } from 'crypto';
import { NotFoundError } from '../../errors';
import type { NumberingScheme, PackDraft } from '../../types/seat-pack';
import { log } from '../../utils/log';
import type { RetryOptions } from '../../utils/retry';
import type { ReconcilerStore } from '../lineage/repository';
import type { LeaseManager } from '../locking/lease-manager';
import { buildSyncPlan, comparePacks, type ComparisonSummary, type SyncPlan } from '../pack-diff';
import { generatePacks } from '../pack-generator';
import type { PosSyncEngine, SyncRunResult } from '../pos-sync';
import { LineageWriter, type LineageWriteResult } from './lineage-writer';
import { DEFAULT_RECONCILE_SETTINGS, type ReconcileSettings, type SeatSnapshot } from './types';

export interface PerformanceReconcilerDeps {
  store: ReconcilerStore;
  leases: LeaseManager;
  /** Null when POS sync runs out of band (worker or manual trigger) */
  engine?: PosSyncEngine | null;
  settings?: Partial<ReconcileSettings>;
  holderId?: string;
  clock?: () => Date;
  retry?: Omit<RetryOptions, 'shouldRetry'>;
}

export interface ReconcileOptions {
  schemeOverride?: NumberingScheme;
}

export interface ReconcileResult {
  performanceId: string;
  generated: number;
  summary: ComparisonSummary;
  plan: SyncPlan;
  write: LineageWriteResult;
  sync: SyncRunResult | null;
}

export class PerformanceReconciler {
  readonly settings: ReconcileSettings;

  private readonly store: ReconcilerStore;
  private readonly engine: PosSyncEngine | null;
  private readonly writer: LineageWriter;

  constructor(deps: PerformanceReconcilerDeps) {
    this.store = deps.store;
    this.engine = deps.engine ?? null;
    this.settings = { ...DEFAULT_RECONCILE_SETTINGS, ...deps.settings };
    this.writer = new LineageWriter(deps.store, deps.leases, {
      holderId: deps.holderId ?? `reconciler-${randomUUID()}`,
      clock: deps.clock,
      retry: deps.retry,
    });
  }

  async reconcilePerformance(snapshot: SeatSnapshot, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const { performanceId } = snapshot;

    const performance = await this.store.getPerformance(performanceId);
    if (!performance) throw new NotFoundError('Performance', performanceId);
    const venue = await this.store.getVenue(performance.venueId);
    if (!venue) throw new NotFoundError('Venue', performance.venueId);

    const generated: PackDraft[] = generatePacks(
      {
        performanceId,
        venueId: venue.venueId,
        sourceWebsite: venue.sourceWebsite,
        seats: snapshot.seats,
        sections: snapshot.sections,
      },
      {
        minPackSize: this.settings.minPackSize,
        strategy: this.settings.strategy,
        markup: venue.markup,
        defaultScheme: venue.seatStructure ?? 'consecutive',
        schemeOverride: options.schemeOverride,
        prefixes: this.settings.prefixes,
      }
    );

    const existing = await this.store.getActivePacks(performanceId);
    const comparison = comparePacks(performanceId, generated, existing);
    const plan = buildSyncPlan(comparison);
    const write = await this.writer.write(comparison);

    log.info(
      `📦 Reconciled ${performanceId}: ${generated.length} generated against ${existing.length} active ` +
        `(create ${plan.counts.create}, reprice ${plan.counts.update_price}, delist ${plan.counts.delist}, resync ${plan.counts.resync})`
    );

    let sync: SyncRunResult | null = null;
    if (this.settings.syncMode === 'immediate' && this.engine && performance.posEnabled) {
      sync = await this.engine.syncPendingPacks({ performanceId });
    }

    return { performanceId, generated: generated.length, summary: comparison.summary, plan, write, sync };
  }
}
