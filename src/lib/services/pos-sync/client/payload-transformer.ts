/**
 * Seat pack → POS listing payload
 */

import { PackValidationError } from '../../../errors';
import type { PosListingPayload } from '../../../types/pos';
import type { Performance, SeatPack, Venue } from '../../../types/seat-pack';
import { POS_API_CONFIG } from '../config/constants';

export interface ListingContext {
  eventName: string;
  startsAt: Date;
  venueName: string;
  city: string | null;
  stateProvince: string | null;
  countryCode: string | null;
  timezone: string | null;
}

export function listingContextFor(performance: Performance, venue: Venue): ListingContext {
  return {
    eventName: performance.eventName,
    startsAt: performance.startsAt,
    venueName: venue.name,
    city: venue.city,
    stateProvince: venue.stateProvince,
    countryCode: venue.countryCode,
    timezone: venue.timezone,
  };
}

/**
 * Wall-clock time at the venue as `YYYY-MM-DDTHH:mm:ss` (UTC when the venue has no zone).
 */
export function formatVenueLocalTime(at: Date, timezone: string | null): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone ?? 'UTC',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(at);

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '00';
  return `${part('year')}-${part('month')}-${part('day')}T${part('hour')}:${part('minute')}:${part('second')}`;
}

export function toPosListingPayload(pack: SeatPack, context: ListingContext): PosListingPayload {
  if (pack.totalPriceCents === null || pack.packSize <= 0) {
    throw new PackValidationError(pack.packId, ['pack has no sellable price']);
  }

  const eventDate = formatVenueLocalTime(context.startsAt, context.timezone);
  const payload: PosListingPayload = {
    currencyCode: POS_API_CONFIG.CURRENCY_CODE,
    unitCost: Math.round(pack.totalPriceCents / pack.packSize) / 100,
    deliveryType: POS_API_CONFIG.DELIVERY_TYPE,
    inHandAt: eventDate,
    seating: {
      section: pack.sectionName,
      row: pack.rowLabel,
      seatFrom: pack.startSeatNumber,
      seatTo: pack.endSeatNumber,
    },
    eventMapping: {
      eventName: context.eventName,
      eventDate,
      venueName: context.venueName,
      city: context.city,
      stateProvince: context.stateProvince,
      countryCode: context.countryCode ?? POS_API_CONFIG.DEFAULT_COUNTRY_CODE,
      isEventDateConfirmed: true,
    },
    externalId: pack.packId,
    ticketCount: pack.packSize,
    autoBroadcast: true,
    zoneFill: true,
    internalNotes: `Seat pack ${pack.packId}: row ${pack.rowLabel} seats ${pack.startSeatNumber}-${pack.endSeatNumber}`,
  };

  if (pack.accessible) {
    payload.listingNotes = [{ note: POS_API_CONFIG.ACCESSIBLE_NOTE }];
  }
  return payload;
}
