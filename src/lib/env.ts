/**
 * Seat Pack Reconciler - Environment Validation
 * =============================================
 * Validates environment variables once on boot and caches the result
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { log } from './utils/log';

// ================================================
// ENVIRONMENT SCHEMA VALIDATION
// ================================================

const numeric = (fallback: string) => z.string().regex(/^\d+$/, 'must be a whole number').default(fallback);
const flag = (fallback: 'true' | 'false') => z.enum(['true', 'false']).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),

  // Connections
  DATABASE_URL: z.string().startsWith('postgresql://'),
  REDIS_URL: z.string().startsWith('redis://').optional(),   // Notifications off without it

  // POS API
  POS_API_BASE_URL: z.string().url(),
  POS_API_TOKEN: z.string().min(1),
  POS_API_TIMEOUT_MS: numeric('30000'),

  // POS sync behaviour
  POS_SYNC_ENABLED: flag('true'),
  POS_SYNC_MODE: z.enum(['immediate', 'on_demand']).default('on_demand'),
  POS_CREATE_ENABLED: flag('true'),
  POS_DELETE_ENABLED: flag('true'),
  POS_MAX_RETRY_ATTEMPTS: numeric('5'),
  POS_BATCH_SIZE: numeric('50'),
  POS_BATCH_DELAY_MS: numeric('1000'),
  FAILED_RETRY_COOLDOWN_MS: numeric('3600000'),

  // Leases and worker
  LEASE_STALE_AFTER_MS: numeric('1800000'),
  STALE_OPERATION_AFTER_MS: numeric('3600000'),
  WORKER_INTERVAL_MS: numeric('60000'),

  // Logging and debugging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  ENABLE_SQL_LOGGING: flag('false'),
});

// ================================================
// ENVIRONMENT PROFILES
// ================================================

export type Environment = z.infer<typeof envSchema>['NODE_ENV'];
export type EnvConfig = z.infer<typeof envSchema>;

// ================================================
// VALIDATION FUNCTION
// ================================================

let validatedEnv: EnvConfig | null = null;

/**
 * Parse `source` (process.env by default). The first successful parse is
 * cached; call resetEnvironment() to parse again.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (validatedEnv) {
    return validatedEnv;
  }

  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    log.error('❌ Environment validation failed:');
    issues.forEach((issue) => log.error(`  • ${issue}`));
    throw new ConfigurationError(issues);
  }

  validatedEnv = parsed.data;
  log.info(`✅ Environment validation passed (${validatedEnv.NODE_ENV})`);
  return validatedEnv;
}

export function resetEnvironment(): void {
  validatedEnv = null;
}

// ================================================
// TYPED ENVIRONMENT
// ================================================

export interface EnvironmentConfig {
  env: Environment;
  isDevelopment: boolean;
  isStaging: boolean;
  isProduction: boolean;
  database: {
    postgresUrl: string;
    redisUrl: string | null;
    enableSqlLogging: boolean;
  };
  pos: {
    baseUrl: string;
    token: string;
    timeoutMs: number;
  };
  sync: {
    enabled: boolean;
    mode: 'immediate' | 'on_demand';
    createEnabled: boolean;
    deleteEnabled: boolean;
    maxRetryAttempts: number;
    batchSize: number;
    batchDelayMs: number;
    failedRetryCooldownMs: number;
  };
  worker: {
    intervalMs: number;
    leaseStaleAfterMs: number;
    staleOperationAfterMs: number;
  };
  logging: {
    level: EnvConfig['LOG_LEVEL'];
  };
}

export function getConfig(source?: NodeJS.ProcessEnv): EnvironmentConfig {
  const env = validateEnvironment(source);

  return {
    env: env.NODE_ENV,
    isDevelopment: env.NODE_ENV === 'development',
    isStaging: env.NODE_ENV === 'staging',
    isProduction: env.NODE_ENV === 'production',
    database: {
      postgresUrl: env.DATABASE_URL,
      redisUrl: env.REDIS_URL ?? null,
      enableSqlLogging: env.ENABLE_SQL_LOGGING === 'true',
    },
    pos: {
      baseUrl: env.POS_API_BASE_URL,
      token: env.POS_API_TOKEN,
      timeoutMs: parseInt(env.POS_API_TIMEOUT_MS, 10),
    },
    sync: {
      enabled: env.POS_SYNC_ENABLED === 'true',
      mode: env.POS_SYNC_MODE,
      createEnabled: env.POS_CREATE_ENABLED === 'true',
      deleteEnabled: env.POS_DELETE_ENABLED === 'true',
      maxRetryAttempts: parseInt(env.POS_MAX_RETRY_ATTEMPTS, 10),
      batchSize: parseInt(env.POS_BATCH_SIZE, 10),
      batchDelayMs: parseInt(env.POS_BATCH_DELAY_MS, 10),
      failedRetryCooldownMs: parseInt(env.FAILED_RETRY_COOLDOWN_MS, 10),
    },
    worker: {
      intervalMs: parseInt(env.WORKER_INTERVAL_MS, 10),
      leaseStaleAfterMs: parseInt(env.LEASE_STALE_AFTER_MS, 10),
      staleOperationAfterMs: parseInt(env.STALE_OPERATION_AFTER_MS, 10),
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}
