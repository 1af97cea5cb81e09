export * from './lib/errors';
export * from './lib/types/seat-pack';
export * from './lib/types/pos';
export { getConfig, validateEnvironment, resetEnvironment } from './lib/env';
export type { EnvConfig, Environment, EnvironmentConfig } from './lib/env';
export { buildReconcilerConfig, getReconcilerConfig, validateConfiguration } from './lib/config';
export type { ReconcilerConfig } from './lib/config';
export { getDatabase, closePostgresConnection, checkPostgresHealth } from './lib/db/postgres';
export type { ReconcilerDatabase, PostgresOptions } from './lib/db/postgres';
export { getRedisClient, closeRedisConnection, checkRedisHealth } from './lib/db/redis';
export * from './lib/services/pack-generator';
export * from './lib/services/pack-diff';
export * from './lib/services/lineage/state-rules';
export type * from './lib/services/lineage/repository';
export { DrizzleReconcilerStore } from './lib/services/lineage/drizzle-repository';
export * from './lib/services/locking';
export * from './lib/services/notifications';
export * from './lib/services/pos-sync';
export * from './lib/services/reconciliation';
export { runWorkerPass, startWorkerLoop } from './lib/services/worker/worker-loop';
export type { WorkerLoop, WorkerPassResult, WorkerServices } from './lib/services/worker/worker-loop';
