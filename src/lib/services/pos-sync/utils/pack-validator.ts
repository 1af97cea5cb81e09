/**
 * Ghost Pack Guard
 * ================
 *
 * Checks a pack before anything is sent to the POS. A pack that fails here
 * never reaches the API; the engine records the issues as a validation
 * failure on the pack instead.
 */

import type { SeatPack } from '../../../types/seat-pack';

// ================================================
// VALIDATION RESULT TYPES
// ================================================

export interface PackValidationResult {
  isValid: boolean;
  issues: string[];
}

// ================================================
// GHOST PACK GUARD
// ================================================

export class GhostPackGuard {

  validateForPush(pack: SeatPack): PackValidationResult {
    const issues = [
      ...this.validateComposition(pack),
      ...this.validatePrice(pack),
      ...this.validateLocation(pack),
    ];

    if (pack.manuallyHeld) {
      issues.push('pack is under manual hold');
    }
    if (pack.packStatus !== 'active') {
      issues.push(`pack is ${pack.packStatus}`);
    }

    return { isValid: issues.length === 0, issues };
  }

  validateComposition(pack: SeatPack): string[] {
    const issues: string[] = [];
    if (pack.seatIds.length === 0) {
      issues.push('seat set is empty');
    }
    if (!Number.isInteger(pack.packSize) || pack.packSize <= 0) {
      issues.push(`pack size ${pack.packSize} is not a positive integer`);
    } else if (pack.packSize !== pack.seatIds.length) {
      issues.push(`pack size ${pack.packSize} does not match ${pack.seatIds.length} seats`);
    }
    return issues;
  }

  validatePrice(pack: SeatPack): string[] {
    if (pack.totalPriceCents === null) {
      return ['price is missing'];
    }
    if (!Number.isInteger(pack.totalPriceCents) || pack.totalPriceCents <= 0) {
      return [`price ${pack.totalPriceCents} is not a positive amount`];
    }
    return [];
  }

  validateLocation(pack: SeatPack): string[] {
    const issues: string[] = [];
    if (pack.rowLabel.trim() === '') issues.push('row is missing');
    if (pack.sectionName.trim() === '') issues.push('section is missing');
    if (pack.zoneId.trim() === '') issues.push('zone is missing');
    return issues;
  }
}

export function createGhostPackGuard(): GhostPackGuard {
  return new GhostPackGuard();
}
