/**
 * Seat Pack Reconciler - Drizzle ORM Schema
 * =========================================
 * PostgreSQL tables for venues, performances, seat packs, POS listing
 * records and the failed rollback log.
 */

import {
  pgTable,
  serial,
  varchar,
  text,
  integer,
  boolean,
  jsonb,
  timestamp,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql, relations } from 'drizzle-orm';
import {
  DELIST_REASONS,
  NUMBERING_SCHEMES,
  PACK_STATES,
  PACK_STATUSES,
  POS_OPERATION_STATUSES,
  POS_STATUSES,
} from '../types/seat-pack';

// ================================================
// VENUES TABLE
// ================================================

export const venues = pgTable('venues', {
  id: varchar('id', { length: 100 }).primaryKey(),
  name: varchar('name', { length: 200 }).notNull(),
  city: varchar('city', { length: 100 }),
  stateProvince: varchar('state_province', { length: 100 }),
  countryCode: varchar('country_code', { length: 2 }),
  timezone: varchar('timezone', { length: 64 }),
  sourceWebsite: varchar('source_website', { length: 100 }).notNull(),

  // Numbering structure, current and last reconciled
  seatStructure: varchar('seat_structure', { length: 20, enum: NUMBERING_SCHEMES }),
  previousSeatStructure: varchar('previous_seat_structure', { length: 20, enum: NUMBERING_SCHEMES }),

  // Pricing markup (percentage points, or cents for flat markup)
  markupType: varchar('markup_type', { length: 20, enum: ['percentage', 'dollar'] }),
  markupValue: integer('markup_value'),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

// ================================================
// PERFORMANCES TABLE
// ================================================

export const performances = pgTable(
  'performances',
  {
    id: varchar('id', { length: 100 }).primaryKey(),
    venueId: varchar('venue_id', { length: 100 }).notNull().references(() => venues.id, { onDelete: 'restrict' }),
    eventName: varchar('event_name', { length: 200 }).notNull(),
    startsAt: timestamp('starts_at', { withTimezone: true }).notNull(),
    posEnabled: boolean('pos_enabled').default(true).notNull(),
    isActive: boolean('is_active').default(true).notNull(),
  },
  (table) => ({
    venueIdx: index('idx_performances_venue').on(table.venueId),
  })
);

// ================================================
// SEAT PACKS TABLE
// ================================================

export const seatPacks = pgTable(
  'seat_packs',
  {
    packId: varchar('pack_id', { length: 64 }).primaryKey(),
    performanceId: varchar('performance_id', { length: 100 }).notNull().references(() => performances.id, { onDelete: 'restrict' }),
    venueId: varchar('venue_id', { length: 100 }).notNull(),
    sourceWebsite: varchar('source_website', { length: 100 }).notNull(),

    // Location & composition (immutable once written)
    levelId: varchar('level_id', { length: 100 }).notNull(),
    zoneId: varchar('zone_id', { length: 100 }).notNull(),
    sectionId: varchar('section_id', { length: 100 }).notNull(),
    sectionName: varchar('section_name', { length: 200 }).notNull(),
    rowLabel: varchar('row_label', { length: 20 }).notNull(),
    seatIds: text('seat_ids').array().notNull(),
    startSeatNumber: varchar('start_seat_number', { length: 20 }).notNull(),
    endSeatNumber: varchar('end_seat_number', { length: 20 }).notNull(),
    packSize: integer('pack_size').notNull(),
    accessible: boolean('accessible').default(false).notNull(),

    // Pricing (in cents)
    unitPriceCents: integer('unit_price_cents'),
    packPriceCents: integer('pack_price_cents'),
    totalPriceCents: integer('total_price_cents'),

    // Four-dimensional state
    packStatus: varchar('pack_status', { length: 20, enum: PACK_STATUSES }).notNull(),
    posStatus: varchar('pos_status', { length: 20, enum: POS_STATUSES }).notNull(),
    packState: varchar('pack_state', { length: 20, enum: PACK_STATES }).notNull(),
    delistReason: varchar('delist_reason', { length: 30, enum: DELIST_REASONS }),
    sourcePackIds: text('source_pack_ids').array().notNull().default(sql`'{}'::text[]`),
    manuallyHeld: boolean('manually_held').default(false).notNull(),

    // POS bookkeeping
    posListingId: varchar('pos_listing_id', { length: 100 }),
    syncedToPos: boolean('synced_to_pos').default(false).notNull(),
    posSyncAttempts: integer('pos_sync_attempts').default(0).notNull(),
    lastPosSyncAttempt: timestamp('last_pos_sync_attempt', { withTimezone: true }),
    posSyncError: text('pos_sync_error'),
    posOperationId: varchar('pos_operation_id', { length: 64 }),
    posOperationStatus: varchar('pos_operation_status', { length: 20, enum: POS_OPERATION_STATUSES }),

    // Concurrency
    version: integer('version').default(1).notNull(),
    lockedBy: varchar('locked_by', { length: 200 }),
    lockedAt: timestamp('locked_at', { withTimezone: true }),

    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    performanceStatusIdx: index('idx_seat_packs_performance_status').on(table.performanceId, table.packStatus),
    syncQueueIdx: index('idx_seat_packs_sync_queue').on(table.syncedToPos, table.posSyncAttempts, table.createdAt),
    venueIdx: index('idx_seat_packs_venue').on(table.venueId),
    lockedIdx: index('idx_seat_packs_locked').on(table.lockedBy, table.lockedAt),

    // Invariants mirrored in the database
    transformedInactive: check('transformed_is_inactive', sql`pack_state <> 'transformed' OR pack_status = 'inactive'`),
    delistHasReason: check(
      'delist_has_reason',
      sql`pack_state NOT IN ('delist', 'transformed') OR delist_reason IS NOT NULL`
    ),
    inactiveNotListed: check('inactive_not_listed', sql`pack_status = 'active' OR pos_status <> 'active'`),
    validSize: check('valid_pack_size', sql`pack_size > 0`),
  })
);

// ================================================
// POS LISTINGS TABLE
// ================================================

export const posListings = pgTable(
  'pos_listings',
  {
    id: serial('id').primaryKey(),
    packId: varchar('pack_id', { length: 64 }).notNull().references(() => seatPacks.packId, { onDelete: 'restrict' }),
    listingId: varchar('listing_id', { length: 100 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    removedAt: timestamp('removed_at', { withTimezone: true }),
  },
  (table) => ({
    packIdx: index('idx_pos_listings_pack').on(table.packId),
    listingIdx: index('idx_pos_listings_listing').on(table.listingId),
  })
);

// ================================================
// FAILED ROLLBACKS TABLE (append-only)
// ================================================

export const failedRollbacks = pgTable(
  'failed_rollbacks',
  {
    id: serial('id').primaryKey(),
    operationId: varchar('operation_id', { length: 64 }).notNull(),
    packId: varchar('pack_id', { length: 64 }).notNull(),
    action: varchar('action', { length: 40, enum: ['delete_listing', 'remove_listing_record'] }).notNull(),
    payload: jsonb('payload').$type<Record<string, string>>().notNull(),
    error: text('error').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    resolvedAt: timestamp('resolved_at', { withTimezone: true }),
    resolvedBy: varchar('resolved_by', { length: 100 }),
  },
  (table) => ({
    unresolvedIdx: index('idx_failed_rollbacks_unresolved').on(table.resolvedAt),
  })
);

// ================================================
// RELATIONS
// ================================================

export const venuesRelations = relations(venues, ({ many }) => ({
  performances: many(performances),
}));

export const performancesRelations = relations(performances, ({ one, many }) => ({
  venue: one(venues, {
    fields: [performances.venueId],
    references: [venues.id],
  }),
  seatPacks: many(seatPacks),
}));

export const seatPacksRelations = relations(seatPacks, ({ one, many }) => ({
  performance: one(performances, {
    fields: [seatPacks.performanceId],
    references: [performances.id],
  }),
  listings: many(posListings),
}));

export const posListingsRelations = relations(posListings, ({ one }) => ({
  pack: one(seatPacks, {
    fields: [posListings.packId],
    references: [seatPacks.packId],
  }),
}));

// ================================================
// TYPE EXPORTS
// ================================================

export type VenueRow = typeof venues.$inferSelect;
export type PerformanceRow = typeof performances.$inferSelect;
export type SeatPackRow = typeof seatPacks.$inferSelect;
export type NewSeatPackRow = typeof seatPacks.$inferInsert;
export type PosListingRow = typeof posListings.$inferSelect;
export type FailedRollbackRow = typeof failedRollbacks.$inferSelect;
