/**
 * Seat Pack Reconciler - POS Types
 * ================================
 * Listing payloads and typed call results for the external POS inventory API
 */

import type { PosApiError } from '../errors';

// ================================================
// LISTING PAYLOAD
// ================================================

export interface PosSeating {
  section: string;
  row: string;
  seatFrom: string;
  seatTo: string;
}

export interface PosEventMapping {
  eventName: string;
  eventDate: string;            // Local time at the venue, no offset
  venueName: string;
  city: string | null;
  stateProvince: string | null;
  countryCode: string;
  isEventDateConfirmed: boolean;
}

export interface PosListingNote {
  note: string;
}

export interface PosListingPayload {
  currencyCode: 'USD';
  unitCost: number;             // Dollars, two decimals
  deliveryType: 'InApp';
  inHandAt: string;
  seating: PosSeating;
  eventMapping: PosEventMapping;
  externalId: string;           // Our pack id
  ticketCount: number;
  autoBroadcast: boolean;
  zoneFill: boolean;
  internalNotes: string;
  listingNotes?: PosListingNote[];
}

export interface AdminHoldRequest {
  expirationDate: string;       // ISO
  notes: string;
}

// ================================================
// CALL RESULTS
// ================================================

export type CreateListingResult =
  | { ok: true; listingId: string }
  | { ok: false; error: PosApiError };

export type DeleteListingResult =
  | { outcome: 'deleted' }
  | { outcome: 'not_found' }       // Already gone upstream, counts as success
  | { outcome: 'failed'; error: PosApiError };

export type AdminHoldResult =
  | { ok: true }
  | { ok: false; error: PosApiError };

/**
 * The external POS inventory boundary
 */
export interface PosApi {
  createListing(payload: PosListingPayload): Promise<CreateListingResult>;
  deleteListing(listingId: string): Promise<DeleteListingResult>;
  placeAdminHold(listingId: string, request: AdminHoldRequest): Promise<AdminHoldResult>;
}
