/**
 * Seat Pack Reconciler - Sync Event Publisher
 * ===========================================
 * Best-effort Redis pub/sub for sync progress. Delivery problems are
 * reported in the result and logged, never thrown into the sync run.
 */

import { errorMessage } from '../../errors';
import { log } from '../../utils/log';
import { channelsForEvent, serializeEvent, validateSyncEvent, type SyncEvent } from './event-types';

// ================================================
// PUBLISHER INTERFACES
// ================================================

export interface PublishResult {
  success: boolean;
  channelsSent: number;
  error?: string;
  eventId: string;
}

export interface SyncEventPublisher {
  publish(event: SyncEvent): Promise<PublishResult>;
}

/** The slice of an ioredis client the publisher uses */
export interface RedisPublishClient {
  publish(channel: string, message: string): Promise<number>;
}

// ================================================
// REDIS PUBLISHER
// ================================================

export class RedisSyncEventPublisher implements SyncEventPublisher {
  constructor(private readonly redis: RedisPublishClient) {}

  async publish(event: SyncEvent): Promise<PublishResult> {
    const validation = validateSyncEvent(event);
    if (!validation.isValid) {
      return {
        success: false,
        channelsSent: 0,
        error: `Event validation failed: ${validation.errors.join(', ')}`,
        eventId: event.eventId,
      };
    }

    const payload = serializeEvent(event);
    const results = await Promise.allSettled(
      channelsForEvent(event).map((channel) => this.redis.publish(channel, payload))
    );

    const channelsSent = results.filter((result) => result.status === 'fulfilled').length;
    const firstFailure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');

    if (channelsSent === 0 && firstFailure) {
      return {
        success: false,
        channelsSent: 0,
        error: `Failed to publish to any channel: ${errorMessage(firstFailure.reason)}`,
        eventId: event.eventId,
      };
    }

    return { success: true, channelsSent, eventId: event.eventId };
  }
}

/**
 * Fire-and-forget delivery: a missing publisher or a failed publish is logged and ignored.
 */
export async function notifySafely(publisher: SyncEventPublisher | null, event: SyncEvent): Promise<void> {
  if (!publisher) return;

  try {
    const result = await publisher.publish(event);
    if (result.success) {
      log.debug(`📡 ${event.type} sent to ${result.channelsSent} channel(s)`);
    } else {
      log.warn(`⚠️ ${event.type} notification not delivered: ${result.error ?? 'unknown error'}`);
    }
  } catch (error) {
    log.warn(`⚠️ ${event.type} notification threw: ${errorMessage(error)}`);
  }
}
