/**
 * Seat Pack Reconciler - Pack Identifier
 * ======================================
 * Deterministic pack identifiers: the same physical seat group always
 * hashes to the same id, which lets the comparator diff by id equality.
 */

import crypto from 'crypto';
import sourcePrefixes from '../../data/source-prefixes.json';

export const UNKNOWN_SOURCE_PREFIX = 'unk';

export const DEFAULT_SOURCE_PREFIXES: Readonly<Record<string, string>> = sourcePrefixes;

export interface PackIdentity {
  sourceWebsite: string;
  performanceId: string;
  levelId: string;
  zoneId: string;
  rowLabel: string;
  seatIds: readonly string[];
}

export function resolveSourcePrefix(
  sourceWebsite: string,
  prefixes: Readonly<Record<string, string>> = DEFAULT_SOURCE_PREFIXES
): string {
  return prefixes[sourceWebsite] ?? UNKNOWN_SOURCE_PREFIX;
}

/**
 * Canonical hash input. Seat ids are sorted so input order never matters.
 */
export function packHashInput(identity: PackIdentity): string {
  const seats = [...identity.seatIds].sort().join(',');
  return [
    identity.sourceWebsite,
    identity.performanceId,
    identity.levelId,
    identity.zoneId,
    identity.rowLabel,
    seats,
  ].join('|');
}

export function generatePackId(
  identity: PackIdentity,
  prefixes: Readonly<Record<string, string>> = DEFAULT_SOURCE_PREFIXES
): string {
  const digest = crypto.createHash('md5').update(packHashInput(identity)).digest('hex');
  return `${resolveSourcePrefix(identity.sourceWebsite, prefixes)}_pk_${digest.slice(0, 16)}`;
}
