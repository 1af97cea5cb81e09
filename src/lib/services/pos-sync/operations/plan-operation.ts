/**
 * Which POS call, if any, brings a pack's POS state in line with its lifecycle state
 */

import type { PosStatus, SeatPack } from '../../../types/seat-pack';
import { isLivePackState } from '../../lineage/state-rules';
import type { SyncOperation } from './types';

const PUSHABLE_POS_STATUSES: readonly PosStatus[] = ['pending', 'failed'];
const DELISTABLE_POS_STATUSES: readonly PosStatus[] = ['active', 'pending', 'failed'];

export function planOperation(pack: SeatPack): SyncOperation | 'none' {
  if (pack.packState === 'delist' || pack.packState === 'transformed') {
    return DELISTABLE_POS_STATUSES.includes(pack.posStatus) ? 'delist' : 'none';
  }
  if (pack.packStatus === 'active' && isLivePackState(pack.packState) && PUSHABLE_POS_STATUSES.includes(pack.posStatus)) {
    return 'push';
  }
  return 'none';
}
