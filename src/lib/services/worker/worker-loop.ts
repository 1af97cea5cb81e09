/**
 * Seat Pack Reconciler - Worker Loop
 * ==================================
 * One maintenance pass per interval: sweep stale leases, time out stuck
 * POS operations, then drain the sync queue. Any number of workers may
 * run this loop against the same store; per-pack leases keep them apart.
 */

import { errorMessage } from '../../errors';
import { log } from '../../utils/log';
import type { LeaseManager, LeaseSweepResult } from '../locking/lease-manager';
import type { PosSyncEngine, SyncRunResult } from '../pos-sync';
import type { StaleOperationCleanup, SyncHealthMonitor } from '../reconciliation/health';

export interface WorkerServices {
  leases: LeaseManager;
  health: SyncHealthMonitor;
  engine: PosSyncEngine;
  /** Max packs per sync pass */
  passLimit: number;
}

export interface WorkerHolderIds {
  sync: string;
  health: string;
}

/**
 * Leases are re-entrant for their holder, so each component of a worker
 * leases under its own id to stay excluded from the other.
 */
export function workerHolderIds(workerId: string): WorkerHolderIds {
  return { sync: `${workerId}:sync`, health: `${workerId}:health` };
}

export interface WorkerPassResult {
  sweep: LeaseSweepResult;
  cleanup: StaleOperationCleanup;
  sync: SyncRunResult;
}

export async function runWorkerPass(services: WorkerServices): Promise<WorkerPassResult> {
  const sweep = await services.leases.sweepStaleLeases();
  const cleanup = await services.health.cleanupStaleOperations();
  const sync = await services.engine.syncPendingPacks({ limit: services.passLimit });
  return { sweep, cleanup, sync };
}

export interface WorkerLoop {
  stop(): Promise<void>;
}

/**
 * Run `pass` now and then every `intervalMs`. A tick that fires while the
 * previous pass is still running is skipped. A failed pass is logged and
 * the loop carries on.
 */
export function startWorkerLoop(pass: () => Promise<unknown>, intervalMs: number): WorkerLoop {
  let inFlight: Promise<void> | null = null;
  let stopped = false;

  const tick = () => {
    if (stopped || inFlight) {
      if (inFlight) log.debug('⏭️ Previous worker pass still running, skipping tick');
      return;
    }
    inFlight = pass()
      .then(() => undefined)
      .catch((error: unknown) => {
        log.error(`❌ Worker pass failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        inFlight = null;
      });
  };

  log.info(`🔄 Worker loop started (interval=${intervalMs}ms)`);
  tick();
  const timer = setInterval(tick, intervalMs);

  return {
    async stop() {
      stopped = true;
      clearInterval(timer);
      if (inFlight) await inFlight;
      log.info('✅ Worker loop stopped');
    },
  };
}
