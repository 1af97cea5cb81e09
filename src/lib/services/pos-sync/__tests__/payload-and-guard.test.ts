/**
 * Listing Payload, Ghost Pack Guard & Error Classification Tests
 * ==============================================================
 */

import { describe, it, expect } from '@jest/globals';
import { formatVenueLocalTime, listingContextFor, toPosListingPayload } from '../client/payload-transformer';
import { createGhostPackGuard } from '../utils/pack-validator';
import { classifyHttpStatus, classifySyncError } from '../utils/error-classifier';
import { PackValidationError, PosApiError, RollbackFailureError } from '../../../errors';
import { draft, performance, persistedPack, venue } from '../../../../../test/support/fixtures';

describe('toPosListingPayload', () => {
  const context = listingContextFor(performance(), venue());

  it('should map a pack onto a POS listing', () => {
    expect(toPosListingPayload(persistedPack(draft()), context)).toEqual({
      currencyCode: 'USD',
      unitCost: 50,
      deliveryType: 'InApp',
      inHandAt: '2026-12-01T13:30:00',
      seating: { section: 'Orchestra', row: 'A', seatFrom: '1', seatTo: '2' },
      eventMapping: {
        eventName: 'The Test Musical',
        eventDate: '2026-12-01T13:30:00',
        venueName: 'Test Hall',
        city: 'Springfield',
        stateProvince: 'IL',
        countryCode: 'US',
        isEventDateConfirmed: true,
      },
      externalId: 'unk_pk_0000000000000001',
      ticketCount: 2,
      autoBroadcast: true,
      zoneFill: true,
      internalNotes: 'Seat pack unk_pk_0000000000000001: row A seats 1-2',
    });
  });

  it('should price from the marked-up total, rounded to cents', () => {
    const pack = persistedPack(draft({ packSize: 3, seatIds: ['a', 'b', 'c'], totalPriceCents: 10000 }));

    expect(toPosListingPayload(pack, context).unitCost).toBe(33.33);
  });

  it('should add the accessibility note', () => {
    const payload = toPosListingPayload(persistedPack(draft({ accessible: true })), context);

    expect(payload.listingNotes).toEqual([{ note: 'Wheelchair accessible seating' }]);
  });

  it('should refuse a pack without a price', () => {
    const pack = persistedPack(draft({ totalPriceCents: null }));

    expect(() => toPosListingPayload(pack, context)).toThrow(PackValidationError);
  });

  it('should fall back to UTC without a venue timezone', () => {
    expect(formatVenueLocalTime(new Date('2026-12-01T19:30:00Z'), null)).toBe('2026-12-01T19:30:00');
  });
});

describe('GhostPackGuard', () => {
  const guard = createGhostPackGuard();

  it('should accept a well-formed pack', () => {
    expect(guard.validateForPush(persistedPack(draft()))).toEqual({ isValid: true, issues: [] });
  });

  it('should list every problem with a ghost pack', () => {
    const ghost = persistedPack(draft({ rowLabel: ' ', totalPriceCents: 0, seatIds: ['only'], packSize: 2 }), {
      manuallyHeld: true,
    });

    expect(guard.validateForPush(ghost)).toEqual({
      isValid: false,
      issues: [
        'pack size 2 does not match 1 seats',
        'price 0 is not a positive amount',
        'row is missing',
        'pack is under manual hold',
      ],
    });
  });

  it('should reject an empty seat set', () => {
    const empty = persistedPack(draft({ seatIds: [], packSize: 0 }));

    expect(guard.validateComposition(empty)).toEqual(['seat set is empty', 'pack size 0 is not a positive integer']);
  });
});

describe('POS error classification', () => {
  it('should map HTTP statuses to error kinds', () => {
    expect(classifyHttpStatus(401)).toBe('auth');
    expect(classifyHttpStatus(403)).toBe('auth');
    expect(classifyHttpStatus(404)).toBe('client');
    expect(classifyHttpStatus(429)).toBe('rate_limited');
    expect(classifyHttpStatus(502)).toBe('server');
  });

  it('should map failures to notification error types', () => {
    expect(classifySyncError(new PosApiError('server', 'down', 503))).toEqual({
      type: 'api_error',
      code: 'POS_API_ERROR',
      message: 'down',
    });
    expect(classifySyncError(new PosApiError('timeout', 'slow')).code).toBe('POS_NETWORK_ERROR');
    expect(classifySyncError(new PackValidationError('pk-1', ['price is missing'])).type).toBe('validation_error');
    expect(classifySyncError(new RollbackFailureError('op-1', 'stuck')).code).toBe('POS_ROLLBACK_ERROR');
    expect(classifySyncError('weird')).toEqual({ type: 'unknown_error', code: 'POS_UNKNOWN_ERROR', message: 'weird' });
  });
});
