/**
 * Seat Pack Reconciler - Application Configuration
 * ================================================
 * Profile defaults per environment, merged with the validated environment
 * into the one config object the worker hands to every service.
 */

import type { PostgresOptions } from './db/postgres';
import { getConfig, type Environment, type EnvironmentConfig } from './env';
import type { PackingStrategy } from './types/seat-pack';
import type { PosSyncSettings } from './services/pos-sync/config/constants';
import type { ReconcileSettings } from './services/reconciliation/types';
import { log } from './utils/log';

// ================================================
// CONFIGURATION PROFILES
// ================================================

interface ProfileConfig {
  database: {
    maxConnections: number;
    idleTimeout: number;
    connectTimeout: number;
    ssl: boolean;
  };
  reconcile: {
    minPackSize: number;
    strategy: PackingStrategy;
  };
  worker: {
    /** Packs pulled per sync pass, as a multiple of the batch size */
    batchesPerPass: number;
  };
}

export interface ReconcilerConfig {
  env: Environment;
  database: PostgresOptions;
  redisUrl: string | null;
  pos: EnvironmentConfig['pos'];
  sync: PosSyncSettings;
  reconcile: ReconcileSettings;
  worker: EnvironmentConfig['worker'] & { passLimit: number };
}

// ================================================
// ENVIRONMENT-SPECIFIC CONFIGS
// ================================================

const developmentConfig: ProfileConfig = {
  database: {
    maxConnections: 5,
    idleTimeout: 20,
    connectTimeout: 10,
    ssl: false,
  },
  reconcile: {
    minPackSize: 2,
    strategy: 'maximal',
  },
  worker: {
    batchesPerPass: 2,
  },
};

const stagingConfig: ProfileConfig = {
  database: {
    maxConnections: 10,
    idleTimeout: 30,
    connectTimeout: 15,
    ssl: true,
  },
  reconcile: {
    minPackSize: 2,
    strategy: 'maximal',
  },
  worker: {
    batchesPerPass: 5,
  },
};

const productionConfig: ProfileConfig = {
  database: {
    maxConnections: 20,
    idleTimeout: 60,
    connectTimeout: 30,
    ssl: true,
  },
  reconcile: {
    minPackSize: 2,
    strategy: 'maximal',
  },
  worker: {
    batchesPerPass: 10,
  },
};

// ================================================
// CONFIGURATION FACTORY
// ================================================

export function getProfileConfig(env: Environment): ProfileConfig {
  switch (env) {
    case 'production':
      return productionConfig;
    case 'staging':
      return stagingConfig;
    case 'development':
    case 'test':
      return developmentConfig;
  }
}

export function buildReconcilerConfig(envConfig: EnvironmentConfig): ReconcilerConfig {
  const profile = getProfileConfig(envConfig.env);

  return {
    env: envConfig.env,
    database: {
      url: envConfig.database.postgresUrl,
      ...profile.database,
      enableSqlLogging: envConfig.database.enableSqlLogging,
    },
    redisUrl: envConfig.database.redisUrl,
    pos: envConfig.pos,
    sync: {
      enabled: envConfig.sync.enabled,
      createEnabled: envConfig.sync.createEnabled,
      deleteEnabled: envConfig.sync.deleteEnabled,
      maxRetryAttempts: envConfig.sync.maxRetryAttempts,
      batchSize: envConfig.sync.batchSize,
      batchDelayMs: envConfig.sync.batchDelayMs,
      failedRetryCooldownMs: envConfig.sync.failedRetryCooldownMs,
    },
    reconcile: {
      ...profile.reconcile,
      syncMode: envConfig.sync.mode,
    },
    worker: {
      ...envConfig.worker,
      passLimit: envConfig.sync.batchSize * profile.worker.batchesPerPass,
    },
  };
}

export function getReconcilerConfig(source?: NodeJS.ProcessEnv): ReconcilerConfig {
  return buildReconcilerConfig(getConfig(source));
}

// ================================================
// CONFIGURATION VALIDATION
// ================================================

export function validateConfiguration(config: ReconcilerConfig): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.sync.batchSize < 1) {
    errors.push('POS_BATCH_SIZE must be at least 1');
  }
  if (config.sync.maxRetryAttempts < 1) {
    errors.push('POS_MAX_RETRY_ATTEMPTS must be at least 1');
  }
  if (config.pos.timeoutMs < 1) {
    errors.push('POS_API_TIMEOUT_MS must be at least 1');
  }
  if (config.worker.intervalMs < 1000) {
    errors.push('WORKER_INTERVAL_MS must be at least 1000');
  }

  if (!config.redisUrl) {
    warnings.push('REDIS_URL not configured, sync notifications disabled');
  }
  if (!config.sync.enabled) {
    warnings.push('POS sync disabled, packs will queue without being listed');
  }

  // Production-specific checks
  if (config.env === 'production') {
    if (config.sync.batchDelayMs === 0) {
      warnings.push('POS_BATCH_DELAY_MS is 0 in production (POS rate limits)');
    }
    if (config.database.enableSqlLogging) {
      warnings.push('SQL logging enabled in production (performance impact)');
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

export function logConfigurationStatus(config: ReconcilerConfig): void {
  log.info('\n🔧 Reconciler Configuration:');
  log.info(`   Environment: ${config.env}`);
  log.info(`   POS sync: ${config.sync.enabled ? '✅' : '❌'} (${config.reconcile.syncMode})`);
  log.info(`   Create/Delete: ${config.sync.createEnabled ? '✅' : '❌'} / ${config.sync.deleteEnabled ? '✅' : '❌'}`);
  log.info(`   Batches: ${config.sync.batchSize} every ${config.sync.batchDelayMs}ms`);
  log.info(`   Notifications: ${config.redisUrl ? '✅' : '⚠️ Disabled'}`);
}
