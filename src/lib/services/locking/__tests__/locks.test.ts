/**
 * Lease Manager & Versioned Write Tests
 * =====================================
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { LeaseManager } from '../lease-manager';
import { updatePackWithRetry } from '../versioned-write';
import {
  InvariantViolationError,
  LeaseContentionError,
  NotFoundError,
  VersionConflictError,
} from '../../../errors';
import { InMemoryReconcilerStore } from '../../../../../test/support/memory-store';
import { draft, persistedPack } from '../../../../../test/support/fixtures';

const NOW = new Date('2026-03-01T12:00:00Z');
const noSleep = async () => {};

describe('Lease Manager', () => {
  let store: InMemoryReconcilerStore;
  let leases: LeaseManager;

  beforeEach(() => {
    store = new InMemoryReconcilerStore();
    store.seedPack(persistedPack(draft({ packId: 'pk-1' })));
    leases = new LeaseManager(store, { clock: () => NOW });
  });

  it('single-pack race: exactly one winner among 50 holders', async () => {
    const results = await Promise.all(
      Array.from({ length: 50 }).map((_, i) => leases.acquire('pk-1', `worker-${i}`))
    );
    const winners = results.filter((r) => r !== null);

    expect(winners).toHaveLength(1);
    expect(store.packs.get('pk-1')?.lockedBy).toBe(winners[0]?.lockedBy);
  });

  it('should let the current holder re-acquire and refuse others', async () => {
    expect(await leases.acquire('pk-1', 'worker-a')).not.toBeNull();
    expect(await leases.acquire('pk-1', 'worker-a')).not.toBeNull();
    expect(await leases.acquire('pk-1', 'worker-b')).toBeNull();
  });

  it('should only release for the holder', async () => {
    await leases.acquire('pk-1', 'worker-a');

    expect(await leases.release('pk-1', 'worker-b')).toBe(false);
    expect(await leases.release('pk-1', 'worker-a')).toBe(true);
    expect(store.packs.get('pk-1')?.lockedBy).toBeNull();
  });

  it('should return null for unknown packs', async () => {
    expect(await leases.acquire('missing', 'worker-a')).toBeNull();
  });

  it('should release the lease even when the work throws', async () => {
    await expect(
      leases.withLease('pk-1', 'worker-a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(store.packs.get('pk-1')?.lockedBy).toBeNull();
  });

  it('should report who holds a contended lease', async () => {
    await leases.acquire('pk-1', 'worker-a');
    const outcome = await leases.withLease('pk-1', 'worker-b', async () => 'never');

    expect(outcome).toEqual({ acquired: false, reason: 'held', holder: 'worker-a' });
  });

  it('should sweep only leases older than the stale age', async () => {
    store.seedPack(persistedPack(draft({ packId: 'pk-old' }), { lockedBy: 'dead-worker', lockedAt: new Date('2026-03-01T11:00:00Z') }));
    store.seedPack(persistedPack(draft({ packId: 'pk-fresh' }), { lockedBy: 'live-worker', lockedAt: new Date('2026-03-01T11:45:00Z') }));

    const result = await leases.sweepStaleLeases();

    expect(result.cleared).toEqual([
      { packId: 'pk-old', holder: 'dead-worker', lockedAt: new Date('2026-03-01T11:00:00Z') },
    ]);
    expect(store.packs.get('pk-fresh')?.lockedBy).toBe('live-worker');
    expect(leases.staleLeasesCleared).toBe(1);
  });
});

describe('Versioned writes', () => {
  let store: InMemoryReconcilerStore;

  beforeEach(() => {
    store = new InMemoryReconcilerStore();
    store.seedPack(persistedPack(draft({ packId: 'pk-1' }), { version: 3 }));
  });

  it('should bump the version on every write', async () => {
    const first = await updatePackWithRetry(store, 'pk-1', () => ({ posSyncAttempts: 1 }));
    const second = await updatePackWithRetry(store, 'pk-1', (p) => ({ posSyncAttempts: p.posSyncAttempts + 1 }));

    expect(first.version).toBe(4);
    expect(second.version).toBe(5);
    expect(second.posSyncAttempts).toBe(2);
  });

  it('should reject a stale version at the store', async () => {
    const pack = store.packs.get('pk-1');
    if (!pack) throw new Error('fixture missing');

    await expect(store.upsert({ ...pack, posSyncAttempts: 9 }, 2)).rejects.toBeInstanceOf(VersionConflictError);
  });

  it('should retry version conflicts with backoff and then succeed', async () => {
    store.failNextUpserts(new VersionConflictError('pk-1', 3, 4), new VersionConflictError('pk-1', 3, 4));
    const delays: number[] = [];

    const result = await updatePackWithRetry(store, 'pk-1', () => ({ posSyncError: 'x' }), {
      retry: { sleep: async (ms) => { delays.push(ms); } },
    });

    expect(result.posSyncError).toBe('x');
    expect(delays).toEqual([100, 200]);
    expect(store.upsertCalls).toBe(3);
  });

  it('should give up after the bounded number of retries', async () => {
    const conflict = new VersionConflictError('pk-1', 3, 4);
    store.failNextUpserts(conflict, conflict, conflict, conflict);

    await expect(
      updatePackWithRetry(store, 'pk-1', () => ({ posSyncError: 'x' }), { retry: { sleep: noSleep } })
    ).rejects.toBe(conflict);
    expect(store.upsertCalls).toBe(4);
  });

  it('should not retry other errors', async () => {
    await expect(
      updatePackWithRetry(store, 'pk-1', () => ({ posStatus: 'active', packStatus: 'inactive' }), {
        retry: { sleep: noSleep },
      })
    ).rejects.toBeInstanceOf(InvariantViolationError);
    expect(store.upsertCalls).toBe(1);
  });

  it('should refuse writes from a non-holder', async () => {
    await store.acquireLease('pk-1', 'worker-a', NOW);

    await expect(
      updatePackWithRetry(store, 'pk-1', () => ({ posSyncError: 'x' }), { holderId: 'worker-b' })
    ).rejects.toBeInstanceOf(LeaseContentionError);
  });

  it('should fail for unknown packs', async () => {
    await expect(updatePackWithRetry(store, 'nope', () => ({}))).rejects.toBeInstanceOf(NotFoundError);
  });
});
