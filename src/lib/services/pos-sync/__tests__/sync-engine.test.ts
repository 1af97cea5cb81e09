/**
 * POS Sync Engine Tests
 * =====================
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { PosSyncEngine } from '../sync-engine';
import { delistPack } from '../operations/delist-pack';
import { planOperation } from '../operations/plan-operation';
import { createGhostPackGuard } from '../utils/pack-validator';
import { DEFAULT_POS_SYNC_SETTINGS, type PosSyncSettings } from '../config/constants';
import type { PackOperationContext } from '../operations/types';
import { LeaseManager } from '../../locking/lease-manager';
import type { SyncEventPublisher } from '../../notifications';
import { PosApiError } from '../../../errors';
import type { SeatPack } from '../../../types/seat-pack';
import { InMemoryReconcilerStore } from '../../../../../test/support/memory-store';
import { FakePosApi } from '../../../../../test/support/fake-pos-api';
import { draft, performance, persistedPack, venue } from '../../../../../test/support/fixtures';

const NOW = new Date('2026-03-01T12:00:00Z');
const noSleep = async () => {};

const unpriced = { unitPriceCents: null, packPriceCents: null, totalPriceCents: null };

function listedDelist(packId: string, listingId: string, overrides: Partial<SeatPack> = {}): SeatPack {
  return persistedPack(draft({ packId }), {
    packStatus: 'inactive',
    packState: 'delist',
    delistReason: 'vanished',
    posStatus: 'pending',
    posListingId: listingId,
    ...overrides,
  });
}

describe('POS Sync Engine', () => {
  let store: InMemoryReconcilerStore;
  let posApi: FakePosApi;
  let publish: jest.Mock<SyncEventPublisher['publish']>;
  let sleep: jest.Mock<(ms: number) => Promise<void>>;

  function engine(settings: Partial<PosSyncSettings> = {}, publisher: SyncEventPublisher | null = { publish }) {
    return new PosSyncEngine({
      repository: store,
      posApi,
      leases: new LeaseManager(store, { clock: () => NOW }),
      publisher,
      settings: { batchDelayMs: 0, ...settings },
      holderId: 'worker-test',
      clock: () => NOW,
      sleep,
      retry: { sleep: noSleep },
    });
  }

  function stored(packId: string): SeatPack {
    const pack = store.packs.get(packId);
    if (!pack) throw new Error(`pack ${packId} missing`);
    return pack;
  }

  beforeEach(() => {
    store = new InMemoryReconcilerStore();
    store.seedVenue(venue());
    store.seedPerformance(performance());
    posApi = new FakePosApi();
    publish = jest.fn<SyncEventPublisher['publish']>(async (event) => ({
      success: true,
      channelsSent: 2,
      eventId: event.eventId,
    }));
    sleep = jest.fn<(ms: number) => Promise<void>>(async () => {});
  });

  // ================================================
  // PUSH
  // ================================================

  describe('push', () => {
    it('should create the listing and mark the pack active', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));

      const outcome = await engine().syncPack('pk-1');

      expect(outcome.status).toBe('succeeded');
      expect(posApi.created).toHaveLength(1);
      expect(posApi.created[0].externalId).toBe('pk-1');
      expect(posApi.created[0].unitCost).toBe(50);
      expect(stored('pk-1')).toMatchObject({
        posListingId: 'L-1',
        posStatus: 'active',
        syncedToPos: true,
        posSyncError: null,
        posOperationStatus: 'completed',
        posSyncAttempts: 0,
        lockedBy: null,
        version: 3,
      });
      expect(store.listings).toEqual([{ packId: 'pk-1', listingId: 'L-1', createdAt: NOW, removedAt: null }]);
    });

    it('should reject a ghost pack without calling the POS', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-ghost', ...unpriced })));

      const outcome = await engine().syncPack('pk-ghost');

      expect(outcome).toMatchObject({ status: 'failed', errorType: 'validation_error', error: 'validation: price is missing' });
      expect(posApi.created).toHaveLength(0);
      expect(stored('pk-ghost')).toMatchObject({
        posStatus: 'failed',
        posSyncAttempts: 1,
        posSyncError: 'validation: price is missing',
        syncedToPos: false,
      });
    });

    it('should count a POS failure as an attempt', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));
      posApi.failNextCreates(new PosApiError('server', 'POS API returned 503', 503));

      const outcome = await engine().syncPack('pk-1');

      expect(outcome).toMatchObject({ status: 'failed', errorType: 'api_error', exhausted: false });
      expect(stored('pk-1')).toMatchObject({
        posStatus: 'failed',
        posSyncAttempts: 1,
        posSyncError: 'POS API returned 503',
        posOperationStatus: 'failed',
        syncedToPos: false,
        lastPosSyncAttempt: NOW,
      });
    });

    it('should mark the pack permanently failed at the retry ceiling but keep it unsynced', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' }), { posStatus: 'failed', posSyncAttempts: 4 }));
      posApi.failNextCreates(new PosApiError('timeout', 'POS API request timed out after 30000ms'));

      const outcome = await engine().syncPack('pk-1');

      expect(outcome).toMatchObject({ status: 'failed', errorType: 'network_error', exhausted: true });
      expect(stored('pk-1')).toMatchObject({
        posStatus: 'failed',
        posSyncAttempts: 5,
        posSyncError: 'max retries exceeded: POS API request timed out after 30000ms',
        syncedToPos: false,
      });
    });

    it('should delete the new listing when recording it fails', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));
      jest.spyOn(store, 'recordListing').mockRejectedValueOnce(new Error('disk full'));

      const outcome = await engine().syncPack('pk-1');

      expect(outcome).toMatchObject({ status: 'failed', errorType: 'unknown_error', error: 'rolled back: disk full' });
      expect(posApi.deleted).toEqual(['L-1']);
      expect(posApi.live.size).toBe(0);
      expect(store.failedRollbacks).toHaveLength(0);
      expect(stored('pk-1').posListingId).toBeNull();
    });

    it('should log a compensation that fails instead of retrying it', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));
      jest.spyOn(store, 'recordListing').mockRejectedValueOnce(new Error('disk full'));
      posApi.failNextDeletes(new PosApiError('server', 'POS API returned 500', 500));

      const outcome = await engine().syncPack('pk-1');

      expect(outcome).toMatchObject({
        status: 'failed',
        errorType: 'rollback_error',
        error: 'rolled back: disk full (1 compensation(s) failed)',
      });
      expect(posApi.deleted).toEqual(['L-1']);
      expect(store.failedRollbacks).toEqual([
        {
          id: 1,
          operationId: stored('pk-1').posOperationId,
          packId: 'pk-1',
          action: 'delete_listing',
          payload: { listingId: 'L-1' },
          error: 'POS API returned 500',
          createdAt: NOW,
          resolvedAt: null,
          resolvedBy: null,
        },
      ]);
    });

    it('should skip packs whose performance has POS disabled', async () => {
      store.seedPerformance(performance({ posEnabled: false }));
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));

      const outcome = await engine().syncPack('pk-1');

      expect(outcome).toEqual({ packId: 'pk-1', operation: 'push', status: 'skipped', reason: 'performance_disabled' });
      expect(posApi.created).toHaveLength(0);
    });

    it('should leave packs queued when creation is disabled', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));

      const outcome = await engine({ createEnabled: false }).syncPack('pk-1');

      expect(outcome).toEqual({ packId: 'pk-1', operation: 'push', status: 'skipped', reason: 'disabled' });
      expect(stored('pk-1').posStatus).toBe('pending');
    });
  });

  // ================================================
  // DELIST
  // ================================================

  describe('delist', () => {
    it('should treat a 404 as already removed without counting a failure', async () => {
      store.seedPack(listedDelist('pk-d', 'L-gone'));

      const outcome = await engine().syncPack('pk-d');

      expect(outcome).toMatchObject({ status: 'succeeded', operation: 'delist', listingGone: true });
      expect(posApi.deleted).toEqual(['L-gone']);
      expect(stored('pk-d')).toMatchObject({
        posStatus: 'inactive',
        syncedToPos: true,
        posSyncAttempts: 0,
        posListingId: null,
        posOperationStatus: 'completed',
      });
    });

    it('should stay idempotent when the same delist runs twice', async () => {
      store.seedPack(listedDelist('pk-d', 'L-7'));
      posApi.live.add('L-7');
      await store.acquireLease('pk-d', 'worker-test', NOW);
      const ctx: PackOperationContext = {
        repository: store,
        posApi,
        guard: createGhostPackGuard(),
        settings: DEFAULT_POS_SYNC_SETTINGS,
        holderId: 'worker-test',
        clock: () => NOW,
      };
      const snapshot = stored('pk-d');

      const first = await delistPack(ctx, snapshot);
      const second = await delistPack(ctx, snapshot);

      expect(first.status).toBe('succeeded');
      expect(second).toMatchObject({ status: 'succeeded', listingGone: true });
      expect(posApi.deleted).toEqual(['L-7', 'L-7']);
      expect(stored('pk-d').posStatus).toBe('inactive');
      expect(stored('pk-d').posSyncAttempts).toBe(0);
    });

    it('should not call the POS for a pack that was never listed', async () => {
      store.seedPack(listedDelist('pk-d', 'unused', { posListingId: null, posStatus: 'failed' }));

      const outcome = await engine().syncPack('pk-d');

      expect(outcome.status).toBe('succeeded');
      expect(posApi.deleted).toEqual([]);
      expect(stored('pk-d')).toMatchObject({ posStatus: 'inactive', syncedToPos: true });
    });

    it('should mark the listing record removed', async () => {
      const earlier = new Date('2026-02-01T00:00:00Z');
      store.seedPack(listedDelist('pk-d', 'L-9'));
      posApi.live.add('L-9');
      await store.recordListing('pk-d', 'L-9', earlier);

      await engine().syncPack('pk-d');

      expect(store.listings).toEqual([{ packId: 'pk-d', listingId: 'L-9', createdAt: earlier, removedAt: NOW }]);
    });

    it('should count a failed delete as an attempt', async () => {
      store.seedPack(listedDelist('pk-d', 'L-9'));
      posApi.failNextDeletes(new PosApiError('network', 'POS API request failed: fetch failed'));

      const outcome = await engine().syncPack('pk-d');

      expect(outcome).toMatchObject({ status: 'failed', errorType: 'network_error' });
      expect(stored('pk-d')).toMatchObject({
        posStatus: 'failed',
        posSyncAttempts: 1,
        syncedToPos: false,
        posListingId: 'L-9',
      });
    });
  });

  // ================================================
  // BATCH RUNS
  // ================================================

  describe('syncPendingPacks', () => {
    it('should isolate failures and pause only between batches', async () => {
      for (const id of ['pk-1', 'pk-2', 'pk-3', 'pk-4', 'pk-5']) {
        store.seedPack(persistedPack(draft({ packId: id, ...(id === 'pk-2' ? unpriced : {}) })));
      }

      const result = await engine({ batchSize: 2, batchDelayMs: 250 }).syncPendingPacks();

      expect(result).toMatchObject({ processed: 5, succeeded: 4, failed: 1, skipped: 0, batches: 3 });
      expect(result.errors).toEqual([{ packId: 'pk-2', error: 'validation: price is missing' }]);
      expect(sleep.mock.calls).toEqual([[250], [250]]);
    });

    it('should publish started and completed events with counts', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));

      await engine().syncPendingPacks({ performanceId: 'perf-1' });

      expect(publish).toHaveBeenCalledTimes(2);
      expect(publish.mock.calls[0][0]).toMatchObject({ type: 'sync_started', performanceId: 'perf-1', packCount: 1 });
      expect(publish.mock.calls[1][0]).toMatchObject({
        type: 'sync_completed',
        performanceId: 'perf-1',
        processed: 1,
        succeeded: 1,
        failed: 0,
        skipped: 0,
        durationMs: 0,
      });
    });

    it('should prefer packs with fewer attempts', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-a' }), { posStatus: 'failed', posSyncAttempts: 3 }));
      store.seedPack(persistedPack(draft({ packId: 'pk-b' })));

      const result = await engine({ batchSize: 1 }).syncPendingPacks();

      expect(result.outcomes.map((o) => o.packId)).toEqual(['pk-b', 'pk-a']);
    });

    it('should leave live packs of a POS-disabled performance out of the queue', async () => {
      store.seedPerformance(performance({ performanceId: 'perf-off', posEnabled: false }));
      store.seedPack(persistedPack(draft({ packId: 'pk-off', performanceId: 'perf-off' })));
      store.seedPack(listedDelist('pk-delist', 'L-9', { performanceId: 'perf-off' }));
      store.seedPack(persistedPack(draft({ packId: 'pk-on' }), { posStatus: 'failed', posSyncAttempts: 1 }));

      const result = await engine().syncPendingPacks({ limit: 2 });

      expect(result.outcomes.map((o) => o.packId)).toEqual(['pk-delist', 'pk-on']);
      expect(stored('pk-off').posSyncAttempts).toBe(0);
    });

    it('should retry exhausted packs only after the cooldown', async () => {
      store.seedPack(
        persistedPack(draft({ packId: 'pk-recent' }), {
          posStatus: 'failed',
          posSyncAttempts: 5,
          lastPosSyncAttempt: new Date('2026-03-01T11:30:00Z'),
        })
      );
      store.seedPack(
        persistedPack(draft({ packId: 'pk-cooled' }), {
          posStatus: 'failed',
          posSyncAttempts: 5,
          lastPosSyncAttempt: new Date('2026-03-01T10:00:00Z'),
        })
      );

      const result = await engine().syncPendingPacks();

      expect(result.outcomes.map((o) => o.packId)).toEqual(['pk-cooled']);
    });

    it('should report a leased pack as skipped', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));
      await store.acquireLease('pk-1', 'someone-else', NOW);

      const outcome = await engine().syncPack('pk-1');

      expect(outcome).toEqual({ packId: 'pk-1', operation: 'none', status: 'skipped', reason: 'leased' });
    });

    it('should do nothing when sync is disabled', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));

      const result = await engine({ enabled: false }).syncPendingPacks();

      expect(result.processed).toBe(0);
      expect(posApi.created).toHaveLength(0);
      expect(publish).not.toHaveBeenCalled();
    });

    it('should finish the run when the publisher throws', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));
      const broken: SyncEventPublisher = {
        publish: async () => {
          throw new Error('redis down');
        },
      };

      const result = await engine({}, broken).syncPendingPacks();

      expect(result.succeeded).toBe(1);
    });

    it('should count outcomes in the metrics', async () => {
      store.seedPack(persistedPack(draft({ packId: 'pk-1' })));
      store.seedPack(persistedPack(draft({ packId: 'pk-2', ...unpriced })));
      store.seedPack(listedDelist('pk-3', 'L-gone'));
      const sync = engine();

      await sync.syncPendingPacks();

      expect(sync.metrics.snapshot().counters).toMatchObject({
        pos_push_total: 1,
        pos_delist_total: 1,
        pos_delist_not_found_total: 1,
        pos_validation_failure_total: 1,
        pos_failure_total: 0,
        sync_runs_total: 1,
      });
    });
  });
});

describe('planOperation', () => {
  it('should push live packs waiting on the POS', () => {
    expect(planOperation(persistedPack(draft()))).toBe('push');
    expect(planOperation(persistedPack(draft(), { posStatus: 'failed', packState: 'split' }))).toBe('push');
  });

  it('should delist retired packs still known to the POS', () => {
    const retired = { packStatus: 'inactive', packState: 'transformed', delistReason: 'transformed' } as const;
    expect(planOperation(persistedPack(draft(), { ...retired, posStatus: 'pending' }))).toBe('delist');
    expect(planOperation(persistedPack(draft(), { ...retired, posStatus: 'failed' }))).toBe('delist');
  });

  it('should leave synced, suspended and inactive packs alone', () => {
    expect(planOperation(persistedPack(draft(), { posStatus: 'active', syncedToPos: true }))).toBe('none');
    expect(
      planOperation(
        persistedPack(draft(), { packStatus: 'inactive', packState: 'delist', delistReason: 'admin_hold', posStatus: 'suspended' })
      )
    ).toBe('none');
    expect(planOperation(persistedPack(draft(), { packStatus: 'inactive', posStatus: 'pending' }))).toBe('none');
  });
});
