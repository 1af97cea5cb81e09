/**
 * Pack Generator Unit Tests
 * =========================
 */

import { describe, it, expect } from '@jest/globals';
import { generatePacks, findContiguousRuns, type GenerationInput } from '../generator';
import { generatePackId, packHashInput, resolveSourcePrefix } from '../pack-id';
import { applyMarkup, pricePack } from '../pricing';
import { ConfigurationError } from '../../../errors';
import { PERFORMANCE_ID, SOURCE, VENUE_ID, seat, seats } from '../../../../../test/support/fixtures';
import type { Seat, SectionLayout } from '../../../types/seat-pack';

function input(rowSeats: Seat[], sections: SectionLayout[] = []): GenerationInput {
  return {
    performanceId: PERFORMANCE_ID,
    venueId: VENUE_ID,
    sourceWebsite: SOURCE,
    seats: rowSeats,
    sections,
  };
}

const ODD_EVEN: SectionLayout[] = [{ sectionId: 'orch', sectionName: 'Orchestra', numberingScheme: 'odd_even' }];

describe('Pack Generator', () => {
  // ================================================
  // RUN DETECTION
  // ================================================

  describe('findContiguousRuns', () => {
    it('should break runs on gaps', () => {
      const runs = findContiguousRuns([1, 2, 3, 5, 6, 9].map((number) => ({ number })), 1);
      expect(runs.map((run) => run.map((s) => s.number))).toEqual([[1, 2, 3], [5, 6], [9]]);
    });

    it('should use the given step for odd/even rows', () => {
      const runs = findContiguousRuns([2, 4, 8].map((number) => ({ number })), 2);
      expect(runs.map((run) => run.map((s) => s.number))).toEqual([[2, 4], [8]]);
    });
  });

  // ================================================
  // CONSECUTIVE SCHEME
  // ================================================

  describe('consecutive rows', () => {
    it('should emit one pack for seats 1-6 with minimum size 2', () => {
      const packs = generatePacks(input(seats('A', [1, 2, 3, 4, 5, 6])), { minPackSize: 2, strategy: 'maximal' });

      expect(packs).toHaveLength(1);
      expect(packs[0].seatIds).toEqual(['orch-A-1', 'orch-A-2', 'orch-A-3', 'orch-A-4', 'orch-A-5', 'orch-A-6']);
      expect(packs[0].startSeatNumber).toBe('1');
      expect(packs[0].endSeatNumber).toBe('6');
      expect(packs[0].packSize).toBe(6);
      expect(packs[0].packPriceCents).toBe(30000);
    });

    it('should sort seat labels naturally before walking the row', () => {
      const rowSeats = seats('A', [10, 9, 11, 8]);
      const packs = generatePacks(input(rowSeats), { minPackSize: 2, strategy: 'maximal' });

      expect(packs).toHaveLength(1);
      expect(packs[0].startSeatNumber).toBe('8');
      expect(packs[0].endSeatNumber).toBe('11');
    });

    it('should skip unavailable seats and runs below the minimum size', () => {
      const rowSeats = [...seats('A', [1, 2, 3]), seat('A', 4, { available: false }), seat('A', 5)];
      const packs = generatePacks(input(rowSeats), { minPackSize: 2, strategy: 'maximal' });

      expect(packs).toHaveLength(1);
      expect(packs[0].endSeatNumber).toBe('3');
    });

    it('should only emit single seats when the minimum size is 1', () => {
      const rowSeats = seats('A', [1, 3]);
      expect(generatePacks(input(rowSeats), { minPackSize: 2, strategy: 'maximal' })).toHaveLength(0);
      expect(generatePacks(input(rowSeats), { minPackSize: 1, strategy: 'maximal' })).toHaveLength(2);
    });

    it('should never join seats across zones', () => {
      const rowSeats = [...seats('A', [1, 2]), ...seats('A', [3, 4], { zoneId: 'Z2' })];
      const packs = generatePacks(input(rowSeats), { minPackSize: 2, strategy: 'maximal' });

      expect(packs.map((p) => [p.zoneId, p.startSeatNumber, p.endSeatNumber])).toEqual([
        ['Z1', '1', '2'],
        ['Z2', '3', '4'],
      ]);
    });

    it('should emit every sub-window under the exhaustive strategy', () => {
      const packs = generatePacks(input(seats('A', [1, 2, 3])), { minPackSize: 2, strategy: 'exhaustive' });

      expect(packs.map((p) => `${p.startSeatNumber}-${p.endSeatNumber}`)).toEqual(['1-2', '1-3', '2-3']);
    });
  });

  // ================================================
  // ODD/EVEN SCHEME
  // ================================================

  describe('odd/even rows', () => {
    it('should group even seats 2,4,6,8 into one pack', () => {
      const packs = generatePacks(input(seats('B', [2, 4, 6, 8]), ODD_EVEN), { minPackSize: 1, strategy: 'maximal' });

      expect(packs).toHaveLength(1);
      expect(packs[0].seatIds).toEqual(['orch-B-2', 'orch-B-4', 'orch-B-6', 'orch-B-8']);
    });

    it('should walk the odd and even sides independently', () => {
      const packs = generatePacks(input(seats('B', [1, 2, 3, 4, 5])), {
        minPackSize: 2,
        strategy: 'maximal',
        schemeOverride: 'odd_even',
      });

      expect(packs.map((p) => p.seatIds.length)).toEqual([3, 2]);
      expect(packs[0].startSeatNumber).toBe('1');
      expect(packs[1].startSeatNumber).toBe('2');
    });
  });

  // ================================================
  // IDENTITY & PRICING
  // ================================================

  describe('identity', () => {
    it('should produce identical ids for identical seat composition', () => {
      const first = generatePacks(input(seats('A', [1, 2, 3])), { minPackSize: 2, strategy: 'maximal' });
      const second = generatePacks(input(seats('A', [3, 1, 2])), { minPackSize: 2, strategy: 'maximal' });

      expect(first[0].packId).toBe(second[0].packId);
      expect(first[0].packId).toMatch(/^unk_pk_[0-9a-f]{16}$/);
    });

    it('should build the hash input from sorted seat ids', () => {
      expect(
        packHashInput({
          sourceWebsite: 's',
          performanceId: 'p',
          levelId: 'l',
          zoneId: 'z',
          rowLabel: 'r',
          seatIds: ['b', 'a'],
        })
      ).toBe('s|p|l|z|r|a,b');
    });

    it('should use the source prefix map', () => {
      expect(resolveSourcePrefix('broadway_sf')).toBe('bsf');
      expect(resolveSourcePrefix('nowhere')).toBe('unk');
      const id = generatePackId(
        { sourceWebsite: 'x', performanceId: 'p', levelId: 'l', zoneId: 'z', rowLabel: 'r', seatIds: ['1'] },
        { x: 'xyz' }
      );
      expect(id.startsWith('xyz_pk_')).toBe(true);
    });

    it('should change the id when a seat changes', () => {
      const a = generatePacks(input(seats('A', [1, 2])), { minPackSize: 2, strategy: 'maximal' });
      const b = generatePacks(input(seats('A', [2, 3])), { minPackSize: 2, strategy: 'maximal' });
      expect(a[0].packId).not.toBe(b[0].packId);
    });
  });

  describe('pricing', () => {
    it('should apply percentage markup on the pack total', () => {
      expect(pricePack(2500, 4, { type: 'percentage', percent: 10 })).toEqual({
        unitPriceCents: 2500,
        packPriceCents: 10000,
        totalPriceCents: 11000,
      });
    });

    it('should apply a flat markup once per pack', () => {
      expect(applyMarkup(10000, { type: 'dollar', amountCents: 500 })).toBe(10500);
    });

    it('should round percentage markup to whole cents', () => {
      expect(applyMarkup(999, { type: 'percentage', percent: 15 })).toBe(1149);
    });

    it('should leave price empty when the seat has none', () => {
      const packs = generatePacks(input(seats('A', [1, 2], { priceCents: null })), { minPackSize: 2, strategy: 'maximal' });
      expect(packs[0].totalPriceCents).toBeNull();
    });

    it('should flag packs where every seat is accessible', () => {
      const packs = generatePacks(input(seats('A', [1, 2], { accessible: true })), { minPackSize: 2, strategy: 'maximal' });
      expect(packs[0].accessible).toBe(true);
    });
  });

  it('should reject a minimum size below 1', () => {
    expect(() => generatePacks(input([]), { minPackSize: 0, strategy: 'maximal' })).toThrow(ConfigurationError);
  });
});
