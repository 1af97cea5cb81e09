/**
 * Shared reconciliation types
 */

import type { PackingStrategy, Seat, SectionLayout } from '../../types/seat-pack';

export type PosSyncMode = 'immediate' | 'on_demand';

/** One scrape of a performance's available seats, as handed over by the scraper */
export interface SeatSnapshot {
  performanceId: string;
  seats: readonly Seat[];
  sections: readonly SectionLayout[];
}

export interface SeatSnapshotSource {
  loadSnapshot(performanceId: string): Promise<SeatSnapshot | null>;
}

export interface ReconcileSettings {
  minPackSize: number;
  strategy: PackingStrategy;
  syncMode: PosSyncMode;
  prefixes?: Readonly<Record<string, string>>;
}

export const DEFAULT_RECONCILE_SETTINGS: ReconcileSettings = {
  minPackSize: 2,
  strategy: 'maximal',
  syncMode: 'on_demand',
};

export type ManualActionFailure = 'NOT_FOUND' | 'LEASED' | 'INVALID_STATE' | 'POS_ERROR';
