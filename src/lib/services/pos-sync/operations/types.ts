/**
 * Shared types for per-pack POS operations
 */

import type { SeatPack } from '../../../types/seat-pack';
import type { PosApi } from '../../../types/pos';
import type { RetryOptions } from '../../../utils/retry';
import type { FailedRollbackLog, ListingRecordStore, SeatPackRepository } from '../../lineage/repository';
import type { PosSyncSettings } from '../config/constants';
import type { SyncErrorType } from '../utils/error-classifier';
import type { GhostPackGuard } from '../utils/pack-validator';

export type SyncOperation = 'push' | 'delist';

export type SkipReason = 'nothing_to_do' | 'leased' | 'missing' | 'disabled' | 'performance_disabled';

export type PackSyncOutcome =
  | { packId: string; operation: SyncOperation; status: 'succeeded'; pack: SeatPack; listingGone?: boolean }
  | {
      packId: string;
      operation: SyncOperation;
      status: 'failed';
      pack: SeatPack;
      error: string;
      errorType: SyncErrorType;
      exhausted: boolean;
    }
  | { packId: string; operation: SyncOperation | 'none'; status: 'skipped'; reason: SkipReason };

export interface PackOperationContext {
  repository: SeatPackRepository & ListingRecordStore & FailedRollbackLog;
  posApi: PosApi;
  guard: GhostPackGuard;
  settings: PosSyncSettings;
  holderId: string;
  clock: () => Date;
  retry?: Omit<RetryOptions, 'shouldRetry'>;
}
