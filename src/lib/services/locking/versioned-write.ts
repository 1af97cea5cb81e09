/**
 * Versioned Pack Writes
 * =====================
 *
 * Read-modify-write of one pack guarded by its version counter. A stale
 * version is retried with bounded exponential backoff against a fresh
 * read; every other error propagates untouched.
 */

import { LeaseContentionError, NotFoundError, VersionConflictError } from '../../errors';
import type { SeatPack, SeatPackChanges } from '../../types/seat-pack';
import { retryWithBackoff, type RetryOptions } from '../../utils/retry';
import type { SeatPackRepository } from '../lineage/repository';

export interface VersionedWriteOptions {
  /** When set, the write only proceeds while this holder owns the lease */
  holderId?: string;
  retry?: Omit<RetryOptions, 'shouldRetry'>;
  clock?: () => Date;
}

export function isVersionConflict(error: unknown): boolean {
  return error instanceof VersionConflictError;
}

export async function updatePackWithRetry(
  repository: SeatPackRepository,
  packId: string,
  mutate: (current: SeatPack) => SeatPackChanges,
  options: VersionedWriteOptions = {}
): Promise<SeatPack> {
  const clock = options.clock ?? (() => new Date());

  return retryWithBackoff(
    async () => {
      const current = await repository.getPack(packId);
      if (!current) {
        throw new NotFoundError('Seat pack', packId);
      }
      if (options.holderId !== undefined && current.lockedBy !== options.holderId) {
        throw new LeaseContentionError(packId, current.lockedBy);
      }

      const next: SeatPack = { ...current, ...mutate(current), updatedAt: clock() };
      return repository.upsert(next, current.version);
    },
    `Versioned write on ${packId}`,
    { ...options.retry, shouldRetry: isVersionConflict }
  );
}
