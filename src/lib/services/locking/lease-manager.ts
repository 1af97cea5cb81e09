/**
 * Seat Pack Reconciler - Lease Manager
 * ====================================
 * Exclusive per-pack leases held in the seat_packs row itself
 * (locked_by / locked_at). One holder per pack; stale leases are swept.
 */

import type { SeatPack } from '../../types/seat-pack';
import { log } from '../../utils/log';
import type { SeatPackRepository } from '../lineage/repository';

// ================================================
// LEASE TYPES
// ================================================

export const DEFAULT_LEASE_STALE_AFTER_MS = 30 * 60 * 1000;

export interface LeaseManagerOptions {
  staleAfterMs?: number;
  clock?: () => Date;
}

export type LeaseOutcome<T> =
  | { acquired: true; value: T }
  | { acquired: false; reason: 'held'; holder: string | null }
  | { acquired: false; reason: 'missing' };

export interface ClearedLease {
  packId: string;
  holder: string;
  lockedAt: Date | null;
}

export interface LeaseSweepResult {
  scanned: number;
  cleared: ClearedLease[];
}

// ================================================
// LEASE MANAGER
// ================================================

export class LeaseManager {
  private readonly staleAfterMs: number;
  private readonly clock: () => Date;
  private sweptTotal = 0;

  constructor(
    private readonly repository: SeatPackRepository,
    options: LeaseManagerOptions = {}
  ) {
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_LEASE_STALE_AFTER_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Returns the leased pack, or null when another holder has it (or it does not exist).
   */
  async acquire(packId: string, holderId: string): Promise<SeatPack | null> {
    const pack = await this.repository.acquireLease(packId, holderId, this.clock());
    if (pack) {
      log.debug(`🔒 Lease acquired: ${packId} by ${holderId}`);
    }
    return pack;
  }

  async release(packId: string, holderId: string): Promise<boolean> {
    const released = await this.repository.releaseLease(packId, holderId);
    if (released) {
      log.debug(`🔓 Lease released: ${packId} by ${holderId}`);
    } else {
      log.warn(`⚠️ Lease release refused for ${packId}: not held by ${holderId}`);
    }
    return released;
  }

  /**
   * Run `work` while holding the lease; the lease is released afterwards
   * whether `work` resolves or throws.
   */
  async withLease<T>(
    packId: string,
    holderId: string,
    work: (pack: SeatPack) => Promise<T>
  ): Promise<LeaseOutcome<T>> {
    const pack = await this.acquire(packId, holderId);
    if (!pack) {
      const current = await this.repository.getPack(packId);
      return current
        ? { acquired: false, reason: 'held', holder: current.lockedBy }
        : { acquired: false, reason: 'missing' };
    }

    try {
      return { acquired: true, value: await work(pack) };
    } finally {
      await this.release(packId, holderId);
    }
  }

  /**
   * Force-clear leases older than the stale age. Each clear is conditional on
   * the holder still being the one observed, so a lease renewed in between survives.
   */
  async sweepStaleLeases(): Promise<LeaseSweepResult> {
    const cutoff = new Date(this.clock().getTime() - this.staleAfterMs);
    const stale = await this.repository.staleLeases(cutoff);
    const cleared: ClearedLease[] = [];

    for (const pack of stale) {
      if (pack.lockedBy === null) continue;
      if (await this.repository.releaseLease(pack.packId, pack.lockedBy)) {
        cleared.push({ packId: pack.packId, holder: pack.lockedBy, lockedAt: pack.lockedAt });
      }
    }

    if (cleared.length > 0) {
      this.sweptTotal += cleared.length;
      log.warn(`🧹 Cleared ${cleared.length} stale lease(s) older than ${this.staleAfterMs}ms`);
    }

    return { scanned: stale.length, cleared };
  }

  /** Total stale leases cleared by this manager since start */
  get staleLeasesCleared(): number {
    return this.sweptTotal;
  }
}
