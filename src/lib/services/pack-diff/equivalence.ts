import type { PackDraft } from '../../types/seat-pack';

function sameSeats(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((seatId, i) => seatId === b[i]);
}

/**
 * Same seats in the same place. Price may differ.
 */
export function sameComposition(existing: PackDraft, next: PackDraft): boolean {
  return (
    sameSeats(existing.seatIds, next.seatIds) &&
    existing.levelId === next.levelId &&
    existing.zoneId === next.zoneId &&
    existing.sectionId === next.sectionId &&
    existing.rowLabel === next.rowLabel &&
    existing.startSeatNumber === next.startSeatNumber &&
    existing.endSeatNumber === next.endSeatNumber &&
    existing.packSize === next.packSize
  );
}

export function samePrice(existing: PackDraft, next: PackDraft): boolean {
  return (
    existing.unitPriceCents === next.unitPriceCents &&
    existing.packPriceCents === next.packPriceCents &&
    existing.totalPriceCents === next.totalPriceCents
  );
}

export function packsAreIdentical(existing: PackDraft, next: PackDraft): boolean {
  return (
    sameComposition(existing, next) &&
    samePrice(existing, next) &&
    existing.sectionName === next.sectionName &&
    existing.accessible === next.accessible
  );
}
