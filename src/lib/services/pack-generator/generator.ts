/**
 * Seat Pack Reconciler - Pack Generator
 * =====================================
 * Groups the available seats of one performance into sellable packs.
 * Seats are bucketed zone -> section -> row, sorted naturally, and split
 * into contiguous runs according to the section's numbering scheme.
 */

import { ConfigurationError } from '../../errors';
import type {
  MarkupRule,
  NumberingScheme,
  PackDraft,
  PackingStrategy,
  Seat,
  SectionLayout,
} from '../../types/seat-pack';
import { naturalCompare, parseSeatNumber } from '../../utils/natural-sort';
import { DEFAULT_SOURCE_PREFIXES, generatePackId } from './pack-id';
import { pricePack } from './pricing';

// ================================================
// GENERATOR TYPES
// ================================================

export interface GenerationInput {
  performanceId: string;
  venueId: string;
  sourceWebsite: string;
  seats: readonly Seat[];
  sections: readonly SectionLayout[];
}

export interface GenerationOptions {
  minPackSize: number;
  strategy: PackingStrategy;
  markup?: MarkupRule | null;
  /** Scheme for sections missing from the layout list */
  defaultScheme?: NumberingScheme;
  /** Forces one scheme on every section (used after a venue structure change) */
  schemeOverride?: NumberingScheme;
  prefixes?: Readonly<Record<string, string>>;
}

interface NumberedSeat {
  seat: Seat;
  number: number;
}

interface RowGroup {
  levelId: string;
  zoneId: string;
  sectionId: string;
  rowLabel: string;
  seats: Seat[];
}

// ================================================
// RUN DETECTION
// ================================================

/**
 * Split an ordered seat list into runs where each neighbour is exactly
 * `step` numbers away.
 */
export function findContiguousRuns<T extends { number: number }>(ordered: readonly T[], step: number): T[][] {
  const runs: T[][] = [];
  let current: T[] = [];

  for (const item of ordered) {
    const previous = current[current.length - 1];
    if (previous !== undefined && item.number - previous.number === step) {
      current.push(item);
    } else {
      if (current.length > 0) runs.push(current);
      current = [item];
    }
  }
  if (current.length > 0) runs.push(current);

  return runs;
}

function runsForScheme(ordered: readonly NumberedSeat[], scheme: NumberingScheme): NumberedSeat[][] {
  if (scheme === 'consecutive') {
    return findContiguousRuns(ordered, 1);
  }

  // Odd and even sides of the row are walked independently
  const odd = ordered.filter((s) => s.number % 2 === 1);
  const even = ordered.filter((s) => s.number % 2 === 0);
  return [...findContiguousRuns(odd, 2), ...findContiguousRuns(even, 2)].sort(
    (a, b) => a[0].number - b[0].number
  );
}

function windowsForStrategy<T>(run: readonly T[], minPackSize: number, strategy: PackingStrategy): T[][] {
  if (run.length < minPackSize) return [];
  if (strategy === 'maximal') return [[...run]];

  const windows: T[][] = [];
  for (let start = 0; start < run.length; start++) {
    for (let size = minPackSize; start + size <= run.length; size++) {
      windows.push(run.slice(start, start + size));
    }
  }
  return windows;
}

// ================================================
// GROUPING
// ================================================

function groupRows(seats: readonly Seat[]): RowGroup[] {
  const groups = new Map<string, RowGroup>();
  const seen = new Set<string>();

  for (const seat of seats) {
    if (!seat.available || seen.has(seat.seatId)) continue;
    seen.add(seat.seatId);

    const key = [seat.zoneId, seat.levelId, seat.sectionId, seat.rowLabel].join('\u0000');
    const group = groups.get(key);
    if (group) {
      group.seats.push(seat);
    } else {
      groups.set(key, {
        levelId: seat.levelId,
        zoneId: seat.zoneId,
        sectionId: seat.sectionId,
        rowLabel: seat.rowLabel,
        seats: [seat],
      });
    }
  }

  return [...groups.values()].sort(
    (a, b) =>
      naturalCompare(a.zoneId, b.zoneId) ||
      naturalCompare(a.levelId, b.levelId) ||
      naturalCompare(a.sectionId, b.sectionId) ||
      naturalCompare(a.rowLabel, b.rowLabel)
  );
}

// ================================================
// GENERATION
// ================================================

export function generatePacks(input: GenerationInput, options: GenerationOptions): PackDraft[] {
  if (!Number.isInteger(options.minPackSize) || options.minPackSize < 1) {
    throw new ConfigurationError([`minPackSize must be a positive integer, got ${options.minPackSize}`]);
  }

  const sections = new Map(input.sections.map((section) => [section.sectionId, section]));
  const prefixes = options.prefixes ?? DEFAULT_SOURCE_PREFIXES;
  const drafts: PackDraft[] = [];

  for (const row of groupRows(input.seats)) {
    const section = sections.get(row.sectionId);
    const scheme = options.schemeOverride ?? section?.numberingScheme ?? options.defaultScheme ?? 'consecutive';

    // Seats without a number cannot be placed in a run
    const ordered: NumberedSeat[] = [];
    for (const seat of row.seats) {
      const number = parseSeatNumber(seat.seatNumber);
      if (number !== null) ordered.push({ seat, number });
    }
    ordered.sort((a, b) => naturalCompare(a.seat.seatNumber, b.seat.seatNumber) || naturalCompare(a.seat.seatId, b.seat.seatId));

    for (const run of runsForScheme(ordered, scheme)) {
      for (const window of windowsForStrategy(run, options.minPackSize, options.strategy)) {
        const seats = window.map((entry) => entry.seat);
        const first = seats[0];
        const last = seats[seats.length - 1];
        const seatIds = seats.map((seat) => seat.seatId);

        drafts.push({
          packId: generatePackId(
            {
              sourceWebsite: input.sourceWebsite,
              performanceId: input.performanceId,
              levelId: row.levelId,
              zoneId: row.zoneId,
              rowLabel: row.rowLabel,
              seatIds,
            },
            prefixes
          ),
          performanceId: input.performanceId,
          venueId: input.venueId,
          sourceWebsite: input.sourceWebsite,
          levelId: row.levelId,
          zoneId: row.zoneId,
          sectionId: row.sectionId,
          sectionName: section?.sectionName ?? row.sectionId,
          rowLabel: row.rowLabel,
          seatIds,
          startSeatNumber: first.seatNumber,
          endSeatNumber: last.seatNumber,
          packSize: seats.length,
          ...pricePack(first.priceCents, seats.length, options.markup ?? null),
          accessible: seats.every((seat) => seat.accessible === true),
        });
      }
    }
  }

  return drafts;
}
