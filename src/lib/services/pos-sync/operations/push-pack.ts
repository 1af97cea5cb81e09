/**
 * POS Push Operation
 * ==================
 *
 * Create the external listing for a live pack, then record it locally.
 * Steps after the external create are covered by the rollback stack.
 */

import { errorMessage } from '../../../errors';
import type { SeatPack } from '../../../types/seat-pack';
import { log } from '../../../utils/log';
import { updatePackWithRetry } from '../../locking/versioned-write';
import { toPosListingPayload, type ListingContext } from '../client/payload-transformer';
import { classifySyncError } from '../utils/error-classifier';
import { markOperationStarted, recordFailedAttempt } from './attempts';
import { RollbackStack } from './rollback-stack';
import type { PackOperationContext, PackSyncOutcome } from './types';

export async function pushPack(
  ctx: PackOperationContext,
  pack: SeatPack,
  listing: ListingContext
): Promise<PackSyncOutcome> {
  // Ghost pack guard: nothing invalid reaches the API
  const validation = ctx.guard.validateForPush(pack);
  if (!validation.isValid) {
    log.warn(`⚠️ Ghost pack ${pack.packId} rejected: ${validation.issues.join('; ')}`);
    return recordFailedAttempt(ctx, 'push', pack.packId, `validation: ${validation.issues.join('; ')}`, 'validation_error');
  }

  const started = await markOperationStarted(ctx, pack);

  if (started.pack.posListingId !== null) {
    log.info(`ℹ️ Pack ${pack.packId} already has listing ${started.pack.posListingId}, marking active`);
    return commitPush(ctx, pack.packId, started.pack.posListingId);
  }

  const result = await ctx.posApi.createListing(toPosListingPayload(started.pack, listing));
  if (!result.ok) {
    return recordFailedAttempt(ctx, 'push', pack.packId, result.error.message, classifySyncError(result.error).type);
  }

  const listingId = result.listingId;
  const rollback = new RollbackStack(started.operationId, pack.packId, ctx.repository, ctx.clock);
  rollback.push({
    kind: 'delete_listing',
    payload: { listingId },
    run: async () => {
      const removal = await ctx.posApi.deleteListing(listingId);
      if (removal.outcome === 'failed') throw removal.error;
    },
  });

  try {
    await ctx.repository.recordListing(pack.packId, listingId, ctx.clock());
    rollback.push({
      kind: 'remove_listing_record',
      payload: { listingId },
      run: async () => {
        await ctx.repository.removeListingRecord(pack.packId, listingId);
      },
    });

    const outcome = await commitPush(ctx, pack.packId, listingId);
    rollback.clear();
    return outcome;
  } catch (error) {
    const report = await rollback.unwind(error);
    const errorType = report.failed.length > 0 ? 'rollback_error' : 'unknown_error';
    const suffix = report.failed.length > 0 ? ` (${report.failed.length} compensation(s) failed)` : '';
    return recordFailedAttempt(ctx, 'push', pack.packId, `rolled back: ${errorMessage(error)}${suffix}`, errorType);
  }
}

async function commitPush(ctx: PackOperationContext, packId: string, listingId: string): Promise<PackSyncOutcome> {
  const pack = await updatePackWithRetry(
    ctx.repository,
    packId,
    () => ({
      posListingId: listingId,
      posStatus: 'active',
      syncedToPos: true,
      posSyncError: null,
      posOperationStatus: 'completed',
      lastPosSyncAttempt: ctx.clock(),
    }),
    { holderId: ctx.holderId, clock: ctx.clock, retry: ctx.retry }
  );
  return { packId, operation: 'push', status: 'succeeded', pack };
}
