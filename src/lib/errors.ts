/**
 * Seat Pack Reconciler - Error Taxonomy
 * =====================================
 * Typed errors shared by the generator, the lineage store and the POS sync engine.
 * Expected outcomes (404 on delete, lease already held, ghost pack) are
 * modelled as result objects instead; these classes cover the rest.
 */

import type { PackState } from './types/seat-pack';

export type ReconcilerErrorCode =
  | 'VALIDATION_ERROR'
  | 'POS_API_ERROR'
  | 'VERSION_CONFLICT'
  | 'LEASE_CONTENTION'
  | 'ROLLBACK_FAILURE'
  | 'INVALID_TRANSITION'
  | 'INVARIANT_VIOLATION'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND';

export class ReconcilerError extends Error {
  readonly code: ReconcilerErrorCode;

  constructor(code: ReconcilerErrorCode, message: string) {
    super(message);
    this.name = 'ReconcilerError';
    this.code = code;
  }
}

export class PackValidationError extends ReconcilerError {
  readonly issues: readonly string[];

  constructor(packId: string, issues: readonly string[]) {
    super('VALIDATION_ERROR', `Pack ${packId} failed validation: ${issues.join('; ')}`);
    this.name = 'PackValidationError';
    this.issues = issues;
  }
}

export type PosApiErrorKind = 'network' | 'timeout' | 'auth' | 'rate_limited' | 'client' | 'server';

export class PosApiError extends ReconcilerError {
  readonly kind: PosApiErrorKind;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(kind: PosApiErrorKind, message: string, status: number | null = null) {
    super('POS_API_ERROR', message);
    this.name = 'PosApiError';
    this.kind = kind;
    this.status = status;
    this.retryable = kind !== 'auth' && kind !== 'client';
  }
}

export class VersionConflictError extends ReconcilerError {
  readonly packId: string;
  readonly expectedVersion: number;
  readonly actualVersion: number | null;

  constructor(packId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      'VERSION_CONFLICT',
      `Stale write on pack ${packId}: expected version ${expectedVersion}, found ${actualVersion ?? 'none'}`
    );
    this.name = 'VersionConflictError';
    this.packId = packId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class LeaseContentionError extends ReconcilerError {
  readonly packId: string;
  readonly holder: string | null;

  constructor(packId: string, holder: string | null) {
    super('LEASE_CONTENTION', `Pack ${packId} is leased by ${holder ?? 'another holder'}`);
    this.name = 'LeaseContentionError';
    this.packId = packId;
    this.holder = holder;
  }
}

export class RollbackFailureError extends ReconcilerError {
  readonly operationId: string;

  constructor(operationId: string, message: string) {
    super('ROLLBACK_FAILURE', message);
    this.name = 'RollbackFailureError';
    this.operationId = operationId;
  }
}

export class InvalidTransitionError extends ReconcilerError {
  constructor(packId: string, from: PackState, to: PackState) {
    super('INVALID_TRANSITION', `Pack ${packId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class InvariantViolationError extends ReconcilerError {
  readonly packId: string;
  readonly violations: readonly string[];

  constructor(packId: string, violations: readonly string[]) {
    super('INVARIANT_VIOLATION', `Pack ${packId} violates: ${violations.join('; ')}`);
    this.name = 'InvariantViolationError';
    this.packId = packId;
    this.violations = violations;
  }
}

export class ConfigurationError extends ReconcilerError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('CONFIGURATION_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class NotFoundError extends ReconcilerError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
