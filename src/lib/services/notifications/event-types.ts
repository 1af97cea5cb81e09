/**
 * Seat Pack Reconciler - Sync Event Types
 * =======================================
 * Progress events emitted to the upstream notification channel
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';

export const SYNC_EVENT_SCHEMA_VERSION = '1.0';

// ================================================
// EVENT SCHEMAS
// ================================================

const baseEventSchema = z.object({
  eventId: z.string().uuid(),
  performanceId: z.string().min(1).nullable(),   // null for a run across all performances
  timestamp: z.string().datetime(),
  version: z.literal(SYNC_EVENT_SCHEMA_VERSION),
});

export const syncStartedEventSchema = baseEventSchema.extend({
  type: z.literal('sync_started'),
  packCount: z.number().int().nonnegative(),
});

export const syncCompletedEventSchema = baseEventSchema.extend({
  type: z.literal('sync_completed'),
  processed: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
});

export const syncFailedEventSchema = baseEventSchema.extend({
  type: z.literal('sync_failed'),
  error: z.object({
    type: z.enum(['api_error', 'network_error', 'validation_error', 'rollback_error', 'unknown_error']),
    code: z.string(),
    message: z.string(),
  }),
});

export const syncEventSchema = z.discriminatedUnion('type', [
  syncStartedEventSchema,
  syncCompletedEventSchema,
  syncFailedEventSchema,
]);

export type SyncStartedEvent = z.infer<typeof syncStartedEventSchema>;
export type SyncCompletedEvent = z.infer<typeof syncCompletedEventSchema>;
export type SyncFailedEvent = z.infer<typeof syncFailedEventSchema>;
export type SyncEvent = z.infer<typeof syncEventSchema>;
export type SyncEventType = SyncEvent['type'];

// ================================================
// EVENT CHANNELS
// ================================================

export const SYNC_EVENTS_CHANNEL = 'pos_sync:events';

export function performanceEventsChannel(performanceId: string): string {
  return `${SYNC_EVENTS_CHANNEL}:${performanceId}`;
}

export function channelsForEvent(event: SyncEvent): string[] {
  return event.performanceId === null
    ? [SYNC_EVENTS_CHANNEL]
    : [SYNC_EVENTS_CHANNEL, performanceEventsChannel(event.performanceId)];
}

// ================================================
// CONSTRUCTION & VALIDATION
// ================================================

function eventEnvelope(performanceId: string | null, at: Date) {
  return {
    eventId: randomUUID(),
    performanceId,
    timestamp: at.toISOString(),
    version: SYNC_EVENT_SCHEMA_VERSION,
  } as const;
}

export function syncStartedEvent(performanceId: string | null, packCount: number, at: Date = new Date()): SyncStartedEvent {
  return { ...eventEnvelope(performanceId, at), type: 'sync_started', packCount };
}

export function syncCompletedEvent(
  performanceId: string | null,
  counts: Omit<SyncCompletedEvent, 'eventId' | 'performanceId' | 'timestamp' | 'version' | 'type'>,
  at: Date = new Date()
): SyncCompletedEvent {
  return { ...eventEnvelope(performanceId, at), type: 'sync_completed', ...counts };
}

export function syncFailedEvent(
  performanceId: string | null,
  error: SyncFailedEvent['error'],
  at: Date = new Date()
): SyncFailedEvent {
  return { ...eventEnvelope(performanceId, at), type: 'sync_failed', error };
}

export interface EventValidationResult {
  isValid: boolean;
  errors: string[];
}

export function validateSyncEvent(event: unknown): EventValidationResult {
  const parsed = syncEventSchema.safeParse(event);
  if (parsed.success) {
    return { isValid: true, errors: [] };
  }
  return {
    isValid: false,
    errors: parsed.error.errors.map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`),
  };
}

export function serializeEvent(event: SyncEvent): string {
  return JSON.stringify(event);
}
