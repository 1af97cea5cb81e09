/**
 * Attempt bookkeeping shared by push and delist
 */

import { randomUUID } from 'crypto';
import type { SeatPack } from '../../../types/seat-pack';
import { updatePackWithRetry } from '../../locking/versioned-write';
import type { SyncErrorType } from '../utils/error-classifier';
import type { PackOperationContext, PackSyncOutcome, SyncOperation } from './types';

export const MAX_RETRIES_PREFIX = 'max retries exceeded';

export async function markOperationStarted(
  ctx: PackOperationContext,
  pack: SeatPack
): Promise<{ operationId: string; pack: SeatPack }> {
  const operationId = randomUUID();
  const started = await updatePackWithRetry(
    ctx.repository,
    pack.packId,
    () => ({ posOperationId: operationId, posOperationStatus: 'started', lastPosSyncAttempt: ctx.clock() }),
    { holderId: ctx.holderId, clock: ctx.clock, retry: ctx.retry }
  );
  return { operationId, pack: started };
}

/**
 * Count a failed attempt. Past the retry ceiling the pack stays failed and
 * unsynced so a later cycle picks it up after the cooldown.
 */
export async function recordFailedAttempt(
  ctx: PackOperationContext,
  operation: SyncOperation,
  packId: string,
  error: string,
  errorType: SyncErrorType
): Promise<PackSyncOutcome> {
  const pack = await updatePackWithRetry(
    ctx.repository,
    packId,
    (current) => {
      const attempts = current.posSyncAttempts + 1;
      const exhausted = attempts >= ctx.settings.maxRetryAttempts;
      return {
        posSyncAttempts: attempts,
        lastPosSyncAttempt: ctx.clock(),
        posSyncError: exhausted ? `${MAX_RETRIES_PREFIX}: ${error}` : error,
        posStatus: 'failed',
        syncedToPos: false,
        posOperationStatus: current.posOperationStatus === null ? null : 'failed',
      };
    },
    { holderId: ctx.holderId, clock: ctx.clock, retry: ctx.retry }
  );

  const exhausted = pack.posSyncAttempts >= ctx.settings.maxRetryAttempts;
  return { packId, operation, status: 'failed', pack, error, errorType, exhausted };
}
