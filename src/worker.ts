/**
 * Seat Pack Reconciler - Worker Entry Point
 * =========================================
 * Builds the services from the environment and runs the maintenance loop
 * until SIGTERM or SIGINT.
 */

import 'dotenv/config';
import { randomUUID } from 'crypto';
import { getReconcilerConfig, logConfigurationStatus, validateConfiguration } from './lib/config';
import { closePostgresConnection, getDatabase } from './lib/db/postgres';
import { closeRedisConnection, getRedisClient } from './lib/db/redis';
import { errorMessage } from './lib/errors';
import { DrizzleReconcilerStore } from './lib/services/lineage/drizzle-repository';
import { LeaseManager } from './lib/services/locking';
import { RedisSyncEventPublisher } from './lib/services/notifications';
import { HttpPosApiClient, PosSyncEngine } from './lib/services/pos-sync';
import { SyncHealthMonitor } from './lib/services/reconciliation';
import { runWorkerPass, startWorkerLoop, workerHolderIds } from './lib/services/worker/worker-loop';
import { log } from './lib/utils/log';

async function main(): Promise<void> {
  const config = getReconcilerConfig();
  const validation = validateConfiguration(config);
  validation.warnings.forEach((warning) => log.warn(`⚠️ ${warning}`));
  if (!validation.valid) {
    validation.errors.forEach((error) => log.error(`❌ ${error}`));
    process.exitCode = 1;
    return;
  }
  logConfigurationStatus(config);

  const workerId = `worker-${randomUUID()}`;
  const holders = workerHolderIds(workerId);
  const store = new DrizzleReconcilerStore(getDatabase(config.database));
  const leases = new LeaseManager(store, { staleAfterMs: config.worker.leaseStaleAfterMs });
  const publisher = config.redisUrl ? new RedisSyncEventPublisher(getRedisClient(config.redisUrl)) : null;

  const engine = new PosSyncEngine({
    repository: store,
    posApi: new HttpPosApiClient({ baseUrl: config.pos.baseUrl, token: config.pos.token, timeoutMs: config.pos.timeoutMs }),
    leases,
    publisher,
    settings: config.sync,
    holderId: holders.sync,
  });
  const health = new SyncHealthMonitor({
    repository: store,
    leases,
    metrics: engine.metrics,
    holderId: holders.health,
    leaseStaleAfterMs: config.worker.leaseStaleAfterMs,
    staleOperationAfterMs: config.worker.staleOperationAfterMs,
  });

  const loop = startWorkerLoop(async () => {
    await runWorkerPass({ leases, health, engine, passLimit: config.worker.passLimit });
    const report = await health.getHealthMetrics();
    if (report.status !== 'healthy') {
      log.warn(`⚠️ Sync health ${report.status}: ${report.issues.join('; ')}`);
    }
  }, config.worker.intervalMs);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`🛑 ${signal} received, shutting down worker ${workerId}`);
    await loop.stop();
    await closeRedisConnection();
    await closePostgresConnection();
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error(`❌ Shutdown failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  log.error(`❌ Worker failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
});
