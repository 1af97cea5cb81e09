/**
 * Venue Structure Change Handling
 * ===============================
 *
 * When a venue flips between consecutive and odd/even numbering, every
 * active pack at the venue is delisted in one bulk transition and each
 * active performance is regenerated under the new scheme.
 */

import { errorMessage, NotFoundError } from '../../errors';
import type { NumberingScheme, Seat, Venue } from '../../types/seat-pack';
import { log } from '../../utils/log';
import type { ReconcilerStore } from '../lineage/repository';
import { detectVenueSeatStructure } from '../pack-generator';
import type { PerformanceReconciler, ReconcileResult } from './reconcile-performance';
import type { SeatSnapshotSource } from './types';

export interface StructureChange {
  changed: boolean;
  from: NumberingScheme | null;
  to: NumberingScheme | null;
}

export interface StructureChangeResult {
  venueId: string;
  change: StructureChange;
  delisted: number;
  /** Packs still leased by another holder; the change stays unacknowledged while any remain */
  leased: number;
  regenerated: ReconcileResult[];
  missingSnapshots: string[];
  failures: Array<{ performanceId: string; error: string }>;
}

export function detectStructureChange(venue: Pick<Venue, 'seatStructure' | 'previousSeatStructure'>): StructureChange {
  const from = venue.previousSeatStructure;
  const to = venue.seatStructure;
  return { changed: from !== null && to !== null && from !== to, from, to };
}

export class VenueStructureChangeHandler {
  constructor(
    private readonly store: ReconcilerStore,
    private readonly reconciler: PerformanceReconciler,
    private readonly snapshots: SeatSnapshotSource,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Store the scheme observed in a scrape. The previously recorded scheme
   * moves to `previousSeatStructure` so a flip can be detected; while a flip
   * is still waiting for handle(), the scheme it started from is kept.
   */
  async recordDetectedStructure(venueId: string, seats: readonly Seat[]): Promise<StructureChange> {
    const venue = await this.requireVenue(venueId);
    const detected = detectVenueSeatStructure(seats).scheme;
    const previous = detectStructureChange(venue).changed ? venue.previousSeatStructure : venue.seatStructure;

    await this.store.updateVenueStructure(venueId, detected, previous);
    return detectStructureChange({ seatStructure: detected, previousSeatStructure: previous });
  }

  async handle(venueId: string): Promise<StructureChangeResult> {
    const venue = await this.requireVenue(venueId);
    const change = detectStructureChange(venue);
    const result: StructureChangeResult = {
      venueId,
      change,
      delisted: 0,
      leased: 0,
      regenerated: [],
      missingSnapshots: [],
      failures: [],
    };

    if (!change.changed || change.to === null) return result;

    log.warn(`⚠️ Seat structure of ${venueId} changed ${change.from} -> ${change.to}, delisting its packs`);
    const bulk = await this.store.bulkDelistForVenue(venueId, 'structure_change', this.clock());
    result.delisted = bulk.delisted;
    result.leased = bulk.leased;

    if (bulk.leased > 0) {
      log.warn(`⚠️ ${bulk.leased} pack(s) at ${venueId} are leased, structure change left pending for the next pass`);
      return result;
    }

    // Acknowledge the change so the next check does not fire again
    await this.store.updateVenueStructure(venueId, change.to, change.to);

    for (const performance of await this.store.activePerformancesForVenue(venueId)) {
      const snapshot = await this.snapshots.loadSnapshot(performance.performanceId);
      if (!snapshot) {
        result.missingSnapshots.push(performance.performanceId);
        continue;
      }

      try {
        result.regenerated.push(await this.reconciler.reconcilePerformance(snapshot, { schemeOverride: change.to }));
      } catch (error) {
        const message = errorMessage(error);
        log.error(`❌ Regeneration of ${performance.performanceId} failed: ${message}`);
        result.failures.push({ performanceId: performance.performanceId, error: message });
      }
    }

    log.info(
      `✅ Structure change handled for ${venueId}: ${result.delisted} delisted, ${result.regenerated.length} performance(s) regenerated`
    );
    return result;
  }

  private async requireVenue(venueId: string): Promise<Venue> {
    const venue = await this.store.getVenue(venueId);
    if (!venue) throw new NotFoundError('Venue', venueId);
    return venue;
  }
}
