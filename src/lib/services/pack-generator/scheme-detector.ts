/**
 * Seat Pack Reconciler - Numbering Scheme Detection
 * =================================================
 * Infers whether a venue numbers seats 1,2,3... or 1,3,5.../2,4,6...
 * from the seat labels observed in a scrape.
 */

import type { NumberingScheme, Seat } from '../../types/seat-pack';
import { parseSeatNumber } from '../../utils/natural-sort';

export const SCHEME_DOMINANCE_THRESHOLD = 0.7;

export type RowSchemeVerdict = NumberingScheme | 'unknown';

/**
 * A row is consecutive when at least 70% of the gaps between its sorted
 * seat numbers are 1, odd/even when at least 70% are 2.
 */
export function detectRowScheme(seatNumbers: readonly number[]): RowSchemeVerdict {
  const sorted = [...new Set(seatNumbers)].sort((a, b) => a - b);
  if (sorted.length < 2) return 'unknown';

  let ones = 0;
  let twos = 0;
  for (let i = 1; i < sorted.length; i++) {
    const gap = sorted[i] - sorted[i - 1];
    if (gap === 1) ones++;
    else if (gap === 2) twos++;
  }

  const gaps = sorted.length - 1;
  if (ones / gaps >= SCHEME_DOMINANCE_THRESHOLD) return 'consecutive';
  if (twos / gaps >= SCHEME_DOMINANCE_THRESHOLD) return 'odd_even';
  return 'unknown';
}

export interface VenueSchemeDetection {
  scheme: NumberingScheme;
  consecutiveRows: number;
  oddEvenRows: number;
  unknownRows: number;
}

/**
 * Majority vote over rows. Ties and seat sets with no decidable row fall
 * back to consecutive.
 */
export function detectVenueSeatStructure(seats: readonly Seat[]): VenueSchemeDetection {
  const rows = new Map<string, number[]>();
  for (const seat of seats) {
    const number = parseSeatNumber(seat.seatNumber);
    if (number === null) continue;
    const key = `${seat.zoneId}|${seat.sectionId}|${seat.rowLabel}`;
    const bucket = rows.get(key);
    if (bucket) bucket.push(number);
    else rows.set(key, [number]);
  }

  let consecutiveRows = 0;
  let oddEvenRows = 0;
  let unknownRows = 0;
  for (const numbers of rows.values()) {
    const verdict = detectRowScheme(numbers);
    if (verdict === 'consecutive') consecutiveRows++;
    else if (verdict === 'odd_even') oddEvenRows++;
    else unknownRows++;
  }

  return {
    scheme: oddEvenRows > consecutiveRows ? 'odd_even' : 'consecutive',
    consecutiveRows,
    oddEvenRows,
    unknownRows,
  };
}
