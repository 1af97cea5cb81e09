import type { PackDraft, Performance, Seat, SeatPack, Venue } from '../../src/lib/types/seat-pack';

export const PERFORMANCE_ID = 'perf-1';
export const VENUE_ID = 'venue-1';
export const SOURCE = 'test_source';

export function seat(rowLabel: string, seatNumber: string | number, overrides: Partial<Seat> = {}): Seat {
  const label = String(seatNumber);
  return {
    seatId: `${overrides.sectionId ?? 'orch'}-${rowLabel}-${label}`,
    levelId: 'L1',
    zoneId: 'Z1',
    sectionId: 'orch',
    rowLabel,
    seatNumber: label,
    available: true,
    priceCents: 5000,
    ...overrides,
  };
}

export function seats(rowLabel: string, numbers: readonly number[], overrides: Partial<Seat> = {}): Seat[] {
  return numbers.map((n) => seat(rowLabel, n, overrides));
}

export function persistedPack(draft: PackDraft, overrides: Partial<SeatPack> = {}): SeatPack {
  const createdAt = new Date('2026-01-01T00:00:00Z');
  return {
    ...draft,
    packStatus: 'active',
    posStatus: 'pending',
    packState: 'create',
    delistReason: null,
    sourcePackIds: [],
    manuallyHeld: false,
    posListingId: null,
    syncedToPos: false,
    posSyncAttempts: 0,
    lastPosSyncAttempt: null,
    posSyncError: null,
    posOperationId: null,
    posOperationStatus: null,
    version: 1,
    lockedBy: null,
    lockedAt: null,
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}

export function draft(overrides: Partial<PackDraft> = {}): PackDraft {
  return {
    packId: 'unk_pk_0000000000000001',
    performanceId: PERFORMANCE_ID,
    venueId: VENUE_ID,
    sourceWebsite: SOURCE,
    levelId: 'L1',
    zoneId: 'Z1',
    sectionId: 'orch',
    sectionName: 'Orchestra',
    rowLabel: 'A',
    seatIds: ['orch-A-1', 'orch-A-2'],
    startSeatNumber: '1',
    endSeatNumber: '2',
    packSize: 2,
    unitPriceCents: 5000,
    packPriceCents: 10000,
    totalPriceCents: 10000,
    accessible: false,
    ...overrides,
  };
}

export function venue(overrides: Partial<Venue> = {}): Venue {
  return {
    venueId: VENUE_ID,
    name: 'Test Hall',
    city: 'Springfield',
    stateProvince: 'IL',
    countryCode: null,
    timezone: 'America/Chicago',
    sourceWebsite: SOURCE,
    seatStructure: 'consecutive',
    previousSeatStructure: 'consecutive',
    markup: null,
    ...overrides,
  };
}

export function performance(overrides: Partial<Performance> = {}): Performance {
  return {
    performanceId: PERFORMANCE_ID,
    venueId: VENUE_ID,
    eventName: 'The Test Musical',
    startsAt: new Date('2026-12-01T19:30:00Z'),
    posEnabled: true,
    isActive: true,
    ...overrides,
  };
}
