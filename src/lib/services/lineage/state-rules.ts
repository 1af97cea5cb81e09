/**
 * Seat Pack State Rules
 * =====================
 *
 * Lifecycle transition table plus the invariants every persisted pack must
 * satisfy. Pure functions, no I/O.
 */

import { InvalidTransitionError, InvariantViolationError } from '../../errors';
import type { PackState, PosStatus, SeatPack } from '../../types/seat-pack';

// ================================================
// LIFECYCLE TRANSITIONS
// ================================================

export const VALID_PACK_STATE_TRANSITIONS: Record<PackState, PackState[]> = {
  create: ['split', 'merge', 'shrink', 'delist', 'transformed'],
  split: ['delist', 'transformed'],
  merge: ['delist', 'transformed'],
  shrink: ['delist', 'transformed'],
  delist: ['create'], // Manual reactivation
  transformed: [], // Terminal state
};

export const LIVE_PACK_STATES: readonly PackState[] = ['create', 'split', 'merge', 'shrink'];

export function isValidPackStateTransition(from: PackState, to: PackState): boolean {
  return VALID_PACK_STATE_TRANSITIONS[from].includes(to);
}

export function isTerminalPackState(state: PackState): boolean {
  return VALID_PACK_STATE_TRANSITIONS[state].length === 0;
}

export function getValidPackStateTransitions(state: PackState): PackState[] {
  return VALID_PACK_STATE_TRANSITIONS[state];
}

export function assertPackStateTransition(packId: string, from: PackState, to: PackState): void {
  if (from !== to && !isValidPackStateTransition(from, to)) {
    throw new InvalidTransitionError(packId, from, to);
  }
}

export function isLivePackState(state: PackState): boolean {
  return LIVE_PACK_STATES.includes(state);
}

// ================================================
// REGENERATION
// ================================================

/**
 * Retired states whose row may start a new lifecycle when the generator
 * produces the same identity again. A transformed pack never moves on within
 * its own lifecycle; regeneration opens a fresh one on the same row, and the
 * children that name it as a source keep that lineage.
 */
export const REVIVABLE_PACK_STATES: readonly PackState[] = ['delist', 'transformed'];

export function assertPackRevival(packId: string, from: PackState, to: PackState): void {
  if (!REVIVABLE_PACK_STATES.includes(from) || !isLivePackState(to)) {
    throw new InvalidTransitionError(packId, from, to);
  }
}

// ================================================
// INVARIANTS
// ================================================

export function packInvariantViolations(pack: SeatPack): string[] {
  const violations: string[] = [];

  if (pack.packState === 'transformed' && pack.packStatus !== 'inactive') {
    violations.push('transformed pack must be inactive');
  }
  if ((pack.packState === 'delist' || pack.packState === 'transformed') && pack.delistReason === null) {
    violations.push(`${pack.packState} pack must carry a delist reason`);
  }
  if (pack.packStatus === 'inactive' && pack.posStatus === 'active') {
    violations.push('inactive pack cannot be listed on the POS');
  }
  if (pack.packSize !== pack.seatIds.length) {
    violations.push('pack size must match the seat count');
  }

  return violations;
}

export function assertPackInvariants(pack: SeatPack): void {
  const violations = packInvariantViolations(pack);
  if (violations.length > 0) {
    throw new InvariantViolationError(pack.packId, violations);
  }
}

/**
 * Seat composition is immutable: a write may never change which seats a pack holds.
 */
export function assertSameComposition(current: SeatPack, next: SeatPack): void {
  const same =
    current.seatIds.length === next.seatIds.length &&
    current.seatIds.every((seatId, i) => seatId === next.seatIds[i]);
  if (!same) {
    throw new InvariantViolationError(current.packId, ['seat composition is immutable']);
  }
}

// ================================================
// DEACTIVATION HELPERS
// ================================================

/**
 * POS side of taking a pack out of our inventory: a pack that has a listing
 * waits for a delist call, one that never got listed is simply inactive.
 */
export function posStatusAfterDeactivation(pack: Pick<SeatPack, 'posListingId'>): {
  posStatus: PosStatus;
  syncedToPos: boolean;
} {
  return pack.posListingId !== null
    ? { posStatus: 'pending', syncedToPos: false }
    : { posStatus: 'inactive', syncedToPos: true };
}
