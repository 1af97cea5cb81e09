import type { PackSyncOutcome } from './operations/types';

export type SyncCounter =
  | 'pos_push_total'
  | 'pos_delist_total'
  | 'pos_delist_not_found_total'
  | 'pos_failure_total'
  | 'pos_validation_failure_total'
  | 'pos_exhausted_total'
  | 'pos_skipped_total'
  | 'sync_runs_total';

/**
 * In-process counters since start, reported alongside the store's health counts
 */
export class SyncMetrics {
  private readonly counters: Partial<Record<SyncCounter, number>> = {};
  private lastRunAt: Date | null = null;

  increment(counter: SyncCounter, by = 1): void {
    this.counters[counter] = (this.counters[counter] ?? 0) + by;
  }

  recordRun(at: Date): void {
    this.increment('sync_runs_total');
    this.lastRunAt = at;
  }

  recordOutcome(outcome: PackSyncOutcome): void {
    switch (outcome.status) {
      case 'succeeded':
        if (outcome.operation === 'push') {
          this.increment('pos_push_total');
        } else {
          this.increment('pos_delist_total');
          if (outcome.listingGone) this.increment('pos_delist_not_found_total');
        }
        break;
      case 'failed':
        this.increment(outcome.errorType === 'validation_error' ? 'pos_validation_failure_total' : 'pos_failure_total');
        if (outcome.exhausted) this.increment('pos_exhausted_total');
        break;
      case 'skipped':
        this.increment('pos_skipped_total');
        break;
    }
  }

  get(counter: SyncCounter): number {
    return this.counters[counter] ?? 0;
  }

  snapshot(): { counters: Record<SyncCounter, number>; lastRunAt: Date | null } {
    return {
      counters: {
        pos_push_total: this.get('pos_push_total'),
        pos_delist_total: this.get('pos_delist_total'),
        pos_delist_not_found_total: this.get('pos_delist_not_found_total'),
        pos_failure_total: this.get('pos_failure_total'),
        pos_validation_failure_total: this.get('pos_validation_failure_total'),
        pos_exhausted_total: this.get('pos_exhausted_total'),
        pos_skipped_total: this.get('pos_skipped_total'),
        sync_runs_total: this.get('sync_runs_total'),
      },
      lastRunAt: this.lastRunAt,
    };
  }
}
