/**
 * POS Error Classification
 * ========================
 *
 * Pure functions mapping HTTP responses and thrown failures onto
 * PosApiError kinds, and POS failures onto notification error types.
 */

import { PackValidationError, PosApiError, RollbackFailureError, type PosApiErrorKind } from '../../../errors';

// ================================================
// HTTP CLASSIFICATION
// ================================================

export function classifyHttpStatus(status: number): PosApiErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'server';
  return 'client';
}

export function httpError(status: number, body: string): PosApiError {
  const detail = body.trim().slice(0, 200);
  const message = detail ? `POS API returned ${status}: ${detail}` : `POS API returned ${status}`;
  return new PosApiError(classifyHttpStatus(status), message, status);
}

/**
 * Failures thrown by fetch itself: aborts are timeouts, everything else is network.
 */
export function transportError(error: unknown, timeoutMs: number): PosApiError {
  if (error instanceof Error && error.name === 'AbortError') {
    return new PosApiError('timeout', `POS API request timed out after ${timeoutMs}ms`);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PosApiError('network', `POS API request failed: ${message}`);
}

// ================================================
// NOTIFICATION ERROR TYPES
// ================================================

export type SyncErrorType = 'api_error' | 'network_error' | 'validation_error' | 'rollback_error' | 'unknown_error';

export interface SyncErrorClassification {
  type: SyncErrorType;
  code: string;
  message: string;
}

export function classifySyncError(error: unknown): SyncErrorClassification {
  const type = syncErrorType(error);
  return {
    type,
    code: `POS_${type.toUpperCase()}`,
    message: error instanceof Error ? error.message : String(error),
  };
}

function syncErrorType(error: unknown): SyncErrorType {
  if (error instanceof PosApiError) {
    return error.kind === 'timeout' || error.kind === 'network' ? 'network_error' : 'api_error';
  }
  if (error instanceof PackValidationError) return 'validation_error';
  if (error instanceof RollbackFailureError) return 'rollback_error';
  return 'unknown_error';
}
