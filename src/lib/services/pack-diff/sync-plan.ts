/**
 * Sync Plan
 * =========
 *
 * Flattens a pack comparison into the actions the POS side needs:
 * creations, price updates, delists and resyncs of retained packs whose
 * last POS attempt is still pending or failed.
 */

import type { PackOrigin, PosStatus, RemovalReason } from '../../types/seat-pack';
import type { PackComparison } from './comparator';
import { samePrice } from './equivalence';

export type SyncAction =
  | { kind: 'create'; packId: string; origin: PackOrigin; sourcePackIds: readonly string[] }
  | { kind: 'update_price'; packId: string; fromCents: number | null; toCents: number | null }
  | { kind: 'delist'; packId: string; reason: RemovalReason; childPackIds: readonly string[] }
  | { kind: 'resync'; packId: string; posStatus: PosStatus };

export interface SyncPlan {
  performanceId: string;
  actions: SyncAction[];
  counts: Record<SyncAction['kind'], number>;
}

const RESYNC_STATUSES: readonly PosStatus[] = ['pending', 'failed'];

export function buildSyncPlan(comparison: PackComparison): SyncPlan {
  const actions: SyncAction[] = [];
  const seen = new Set<string>();

  const add = (action: SyncAction) => {
    if (seen.has(action.packId)) return;
    seen.add(action.packId);
    actions.push(action);
  };

  for (const created of comparison.created) {
    add({
      kind: 'create',
      packId: created.draft.packId,
      origin: created.origin,
      sourcePackIds: created.sourcePackIds,
    });
  }

  for (const { existing, next } of comparison.equivalent) {
    if (samePrice(existing, next)) continue;
    add({
      kind: 'update_price',
      packId: existing.packId,
      fromCents: existing.totalPriceCents,
      toCents: next.totalPriceCents,
    });
  }

  for (const removed of comparison.removed) {
    add({ kind: 'delist', packId: removed.pack.packId, reason: removed.reason, childPackIds: removed.childPackIds });
  }

  for (const retained of [...comparison.identical, ...comparison.equivalent]) {
    if (RESYNC_STATUSES.includes(retained.existing.posStatus)) {
      add({ kind: 'resync', packId: retained.existing.packId, posStatus: retained.existing.posStatus });
    }
  }

  return {
    performanceId: comparison.performanceId,
    actions,
    counts: {
      create: actions.filter((a) => a.kind === 'create').length,
      update_price: actions.filter((a) => a.kind === 'update_price').length,
      delist: actions.filter((a) => a.kind === 'delist').length,
      resync: actions.filter((a) => a.kind === 'resync').length,
    },
  };
}
