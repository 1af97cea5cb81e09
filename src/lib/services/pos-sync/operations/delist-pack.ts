/**
 * POS Delist Operation
 * ====================
 *
 * Remove a pack's external listing. A pack with no listing is already
 * delisted, and a listing the POS no longer knows (404) counts as removed.
 */

import type { SeatPack } from '../../../types/seat-pack';
import { log } from '../../../utils/log';
import { updatePackWithRetry } from '../../locking/versioned-write';
import { classifySyncError } from '../utils/error-classifier';
import { markOperationStarted, recordFailedAttempt } from './attempts';
import type { PackOperationContext, PackSyncOutcome } from './types';

export async function delistPack(ctx: PackOperationContext, pack: SeatPack): Promise<PackSyncOutcome> {
  const listingId = pack.posListingId;

  if (listingId === null) {
    log.debug(`ℹ️ Pack ${pack.packId} has no POS listing, nothing to delist`);
    return commitDelist(ctx, pack.packId, false);
  }

  await markOperationStarted(ctx, pack);
  const result = await ctx.posApi.deleteListing(listingId);

  if (result.outcome === 'failed') {
    return recordFailedAttempt(ctx, 'delist', pack.packId, result.error.message, classifySyncError(result.error).type);
  }

  await ctx.repository.markListingRemoved(pack.packId, listingId, ctx.clock());
  return commitDelist(ctx, pack.packId, result.outcome === 'not_found');
}

async function commitDelist(ctx: PackOperationContext, packId: string, listingGone: boolean): Promise<PackSyncOutcome> {
  const pack = await updatePackWithRetry(
    ctx.repository,
    packId,
    (current) => ({
      posStatus: 'inactive',
      syncedToPos: true,
      posListingId: null,
      posSyncError: null,
      posOperationStatus: current.posOperationStatus === null ? null : 'completed',
    }),
    { holderId: ctx.holderId, clock: ctx.clock, retry: ctx.retry }
  );
  return { packId, operation: 'delist', status: 'succeeded', pack, listingGone };
}
