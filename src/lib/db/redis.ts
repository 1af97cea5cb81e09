/**
 * Seat Pack Reconciler - Redis Connection
 * =======================================
 * Redis publisher used for upstream sync notifications
 */

import Redis from 'ioredis';

// ================================================
// REDIS CLIENT SINGLETON
// ================================================

let redis: Redis | null = null;

export function getRedisClient(redisUrl: string): Redis {
  if (!redis) {
    redis = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      lazyConnect: true,
      keepAlive: 30000,
      commandTimeout: 5000,
    });

    redis.on('connect', () => {
      console.log('✅ Redis connected successfully');
    });

    redis.on('error', (error) => {
      console.error('❌ Redis connection error:', error);
    });
  }

  return redis;
}

// ================================================
// CONNECTION HEALTH CHECK
// ================================================

export async function checkRedisHealth(): Promise<{
  status: 'connected' | 'error';
  responseTime?: number;
  error?: string;
}> {
  if (!redis) {
    return { status: 'error', error: 'Redis connection not initialised' };
  }

  const startTime = Date.now();
  try {
    await redis.ping();
    return { status: 'connected', responseTime: Date.now() - startTime };
  } catch (error) {
    console.error('Redis health check failed:', error);
    return {
      status: 'error',
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

export async function closeRedisConnection(): Promise<void> {
  if (!redis) return;

  try {
    await redis.quit();
    console.log('✅ Redis connection closed gracefully');
  } catch (error) {
    console.error('❌ Error closing Redis connection:', error);
  } finally {
    redis = null;
  }
}
