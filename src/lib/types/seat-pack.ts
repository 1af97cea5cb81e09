/**
 * Seat Pack Reconciler - Seat Pack Types
 * ======================================
 * Seats, generated pack drafts and persisted seat packs with their
 * four-dimensional state.
 */

// ================================================
// STATE DIMENSIONS
// ================================================

export const PACK_STATUSES = ['active', 'inactive'] as const;
export type PackStatus = (typeof PACK_STATUSES)[number];

export const POS_STATUSES = [
  'active',
  'inactive',
  'pending',
  'failed',
  'suspended',
  'under_review',
] as const;
export type PosStatus = (typeof POS_STATUSES)[number];

export const PACK_STATES = ['create', 'split', 'merge', 'shrink', 'delist', 'transformed'] as const;
export type PackState = (typeof PACK_STATES)[number];

export const DELIST_REASONS = [
  'manual_delist',
  'performance_disabled',
  'transformed',
  'vanished',
  'structure_change',
  'admin_hold',
] as const;
export type DelistReason = (typeof DELIST_REASONS)[number];

export const POS_OPERATION_STATUSES = ['started', 'completed', 'failed'] as const;
export type PosOperationStatus = (typeof POS_OPERATION_STATUSES)[number];

// How a freshly generated pack came to be
export type PackOrigin = 'create' | 'split' | 'merge' | 'shrink';

// What became of a pack missing from the latest generation
export type RemovalReason = 'transformed' | 'vanished';

// ================================================
// GENERATION INPUT
// ================================================

export const NUMBERING_SCHEMES = ['consecutive', 'odd_even'] as const;
export type NumberingScheme = (typeof NUMBERING_SCHEMES)[number];

export type PackingStrategy = 'maximal' | 'exhaustive';

export interface Seat {
  seatId: string;
  levelId: string;
  zoneId: string;
  sectionId: string;
  rowLabel: string;
  seatNumber: string;        // Label as shown by the venue, e.g. "12" or "A12"
  available: boolean;
  priceCents: number | null;
  accessible?: boolean;
}

export interface SectionLayout {
  sectionId: string;
  sectionName: string;
  numberingScheme: NumberingScheme;
}

export type MarkupRule =
  | { type: 'percentage'; percent: number }
  | { type: 'dollar'; amountCents: number };

// ================================================
// PACKS
// ================================================

/**
 * A candidate pack produced by the generator. Immutable value object.
 */
export interface PackDraft {
  readonly packId: string;
  readonly performanceId: string;
  readonly venueId: string;
  readonly sourceWebsite: string;
  readonly levelId: string;
  readonly zoneId: string;
  readonly sectionId: string;
  readonly sectionName: string;
  readonly rowLabel: string;
  readonly seatIds: readonly string[];
  readonly startSeatNumber: string;
  readonly endSeatNumber: string;
  readonly packSize: number;
  readonly unitPriceCents: number | null;
  readonly packPriceCents: number | null;   // unit price x size
  readonly totalPriceCents: number | null;  // after venue markup
  readonly accessible: boolean;
}

export interface SeatPack extends PackDraft {
  readonly packStatus: PackStatus;
  readonly posStatus: PosStatus;
  readonly packState: PackState;
  readonly delistReason: DelistReason | null;
  readonly sourcePackIds: readonly string[];
  readonly manuallyHeld: boolean;

  // POS bookkeeping
  readonly posListingId: string | null;
  readonly syncedToPos: boolean;
  readonly posSyncAttempts: number;
  readonly lastPosSyncAttempt: Date | null;
  readonly posSyncError: string | null;
  readonly posOperationId: string | null;
  readonly posOperationStatus: PosOperationStatus | null;

  // Concurrency
  readonly version: number;
  readonly lockedBy: string | null;
  readonly lockedAt: Date | null;

  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Fields a versioned write may change. Seat composition is not among them.
 */
export type SeatPackChanges = Partial<
  Pick<
    SeatPack,
    | 'packStatus'
    | 'posStatus'
    | 'packState'
    | 'delistReason'
    | 'sourcePackIds'
    | 'manuallyHeld'
    | 'posListingId'
    | 'syncedToPos'
    | 'posSyncAttempts'
    | 'lastPosSyncAttempt'
    | 'posSyncError'
    | 'posOperationId'
    | 'posOperationStatus'
    | 'unitPriceCents'
    | 'packPriceCents'
    | 'totalPriceCents'
    | 'accessible'
    | 'sectionName'
  >
>;

// ================================================
// VENUES & PERFORMANCES
// ================================================

export interface Venue {
  venueId: string;
  name: string;
  city: string | null;
  stateProvince: string | null;
  countryCode: string | null;
  timezone: string | null;     // IANA zone used for POS event dates
  sourceWebsite: string;
  seatStructure: NumberingScheme | null;
  previousSeatStructure: NumberingScheme | null;
  markup: MarkupRule | null;
}

export interface Performance {
  performanceId: string;
  venueId: string;
  eventName: string;
  startsAt: Date;
  posEnabled: boolean;
  isActive: boolean;
}
