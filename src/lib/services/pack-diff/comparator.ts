/**
 * Seat Pack Reconciler - Pack Comparator
 * ======================================
 * Diffs freshly generated packs against the persisted active packs of a
 * performance and classifies every change:
 *
 *  1. lookup maps (by id, and seat -> owning old packs per zone+row bucket)
 *  2. ids on both sides: identical or functionally equivalent (same seats,
 *     different price, section name or accessibility)
 *  3. old-only ids are removal candidates, new-only ids creation candidates
 *  4. created packs get their sources and an origin (create/shrink/split/merge)
 *  5. removed packs are transformed when they fed a new pack, else vanished
 */

import type {
  PackDraft,
  PackOrigin,
  RemovalReason,
  SeatPack,
} from '../../types/seat-pack';
import { packsAreIdentical } from './equivalence';

// ================================================
// COMPARISON TYPES
// ================================================

export interface CreatedPack {
  readonly draft: PackDraft;
  readonly origin: PackOrigin;
  readonly sourcePackIds: readonly string[];
}

export interface RetainedPack {
  readonly existing: SeatPack;
  readonly next: PackDraft;
}

export interface RemovedPack {
  readonly pack: SeatPack;
  readonly reason: RemovalReason;
  readonly childPackIds: readonly string[];
}

export interface ComparisonSummary {
  created: number;
  split: number;
  merged: number;
  shrunk: number;
  identical: number;
  equivalent: number;
  transformed: number;
  vanished: number;
  duplicatesDropped: number;
}

export interface PackComparison {
  readonly performanceId: string;
  readonly created: readonly CreatedPack[];
  readonly identical: readonly RetainedPack[];
  readonly equivalent: readonly RetainedPack[];
  readonly removed: readonly RemovedPack[];
  /** parent pack id -> ids of the new packs it contributed seats to */
  readonly lineage: ReadonlyMap<string, readonly string[]>;
  readonly summary: ComparisonSummary;
}

// ================================================
// HELPERS
// ================================================

function seatKey(pack: PackDraft, seatId: string): string {
  return `${pack.zoneId}\u0000${pack.rowLabel}\u0000${seatId}`;
}

function classifyOrigin(sources: readonly string[], childrenBySource: ReadonlyMap<string, readonly string[]>): PackOrigin {
  if (sources.length === 0) return 'create';
  if (sources.length > 1) return 'merge';

  const siblings = childrenBySource.get(sources[0]) ?? [];
  return siblings.length > 1 ? 'split' : 'shrink';
}

// ================================================
// COMPARATOR
// ================================================

export function comparePacks(
  performanceId: string,
  generated: readonly PackDraft[],
  existing: readonly SeatPack[]
): PackComparison {
  // Phase 1: lookup maps
  const newById = new Map<string, PackDraft>();
  let duplicatesDropped = 0;
  for (const draft of generated) {
    if (newById.has(draft.packId)) {
      duplicatesDropped++;
      continue;
    }
    newById.set(draft.packId, draft);
  }

  const existingById = new Map<string, SeatPack>();
  for (const pack of existing) {
    if (pack.packStatus === 'active') existingById.set(pack.packId, pack);
  }

  const seatOwners = new Map<string, string[]>();
  for (const pack of existingById.values()) {
    for (const seatId of pack.seatIds) {
      const key = seatKey(pack, seatId);
      const owners = seatOwners.get(key);
      if (owners) owners.push(pack.packId);
      else seatOwners.set(key, [pack.packId]);
    }
  }

  // Phase 2: ids present on both sides
  const identical: RetainedPack[] = [];
  const equivalent: RetainedPack[] = [];
  for (const [packId, next] of newById) {
    const current = existingById.get(packId);
    if (!current) continue;
    if (packsAreIdentical(current, next)) identical.push({ existing: current, next });
    else equivalent.push({ existing: current, next });
  }

  // Phase 3: one-sided ids
  const removedIds = new Set([...existingById.keys()].filter((id) => !newById.has(id)));
  const createdDrafts = [...newById.values()].filter((draft) => !existingById.has(draft.packId));

  // Phase 4: sources for every created pack, then the reverse map
  const sourcesByChild = new Map<string, string[]>();
  const childrenBySource = new Map<string, string[]>();
  for (const draft of createdDrafts) {
    const sources: string[] = [];
    for (const seatId of draft.seatIds) {
      for (const owner of seatOwners.get(seatKey(draft, seatId)) ?? []) {
        if (removedIds.has(owner) && !sources.includes(owner)) sources.push(owner);
      }
    }
    sourcesByChild.set(draft.packId, sources);

    for (const source of sources) {
      const children = childrenBySource.get(source);
      if (children) children.push(draft.packId);
      else childrenBySource.set(source, [draft.packId]);
    }
  }

  const created: CreatedPack[] = createdDrafts.map((draft) => {
    const sourcePackIds = sourcesByChild.get(draft.packId) ?? [];
    return { draft, origin: classifyOrigin(sourcePackIds, childrenBySource), sourcePackIds };
  });

  // Phase 5: removed packs
  const removed: RemovedPack[] = [...existingById.values()]
    .filter((pack) => removedIds.has(pack.packId))
    .map((pack) => {
      const childPackIds = childrenBySource.get(pack.packId) ?? [];
      return { pack, reason: childPackIds.length > 0 ? 'transformed' : 'vanished', childPackIds };
    });

  const countOrigin = (origin: PackOrigin) => created.filter((c) => c.origin === origin).length;

  return {
    performanceId,
    created,
    identical,
    equivalent,
    removed,
    lineage: childrenBySource,
    summary: {
      created: countOrigin('create'),
      split: countOrigin('split'),
      merged: countOrigin('merge'),
      shrunk: countOrigin('shrink'),
      identical: identical.length,
      equivalent: equivalent.length,
      transformed: removed.filter((r) => r.reason === 'transformed').length,
      vanished: removed.filter((r) => r.reason === 'vanished').length,
      duplicatesDropped,
    },
  };
}
