/**
 * POS Sync Constants
 * ==================
 *
 * Defaults for the sync engine. The worker overrides them from the
 * environment through ReconcilerConfig.
 */

// ================================================
// ENGINE SETTINGS
// ================================================

export interface PosSyncSettings {
  enabled: boolean;
  createEnabled: boolean;
  deleteEnabled: boolean;
  maxRetryAttempts: number;
  batchSize: number;
  batchDelayMs: number;
  /** Packs that exhausted their attempts are retried once this long has passed */
  failedRetryCooldownMs: number;
}

export const DEFAULT_POS_SYNC_SETTINGS: PosSyncSettings = {
  enabled: true,
  createEnabled: true,
  deleteEnabled: true,
  maxRetryAttempts: 5,
  batchSize: 50,
  batchDelayMs: 1000,
  failedRetryCooldownMs: 60 * 60 * 1000,
};

// ================================================
// POS API
// ================================================

export const POS_API_CONFIG = {
  TIMEOUT_MS: 30000,
  INVENTORY_PATH: '/inventory',
  CURRENCY_CODE: 'USD',
  DELIVERY_TYPE: 'InApp',
  DEFAULT_COUNTRY_CODE: 'US',
  ACCESSIBLE_NOTE: 'Wheelchair accessible seating',
  ADMIN_HOLD_DAYS: 30,
} as const;

// ================================================
// HEALTH
// ================================================

export const SYNC_HEALTH_CONFIG = {
  HIGH_RETRY_THRESHOLD: 3,
  STALE_OPERATION_AFTER_MS: 60 * 60 * 1000,
  OPERATION_TIMEOUT_ERROR: 'operation timed out',
} as const;
