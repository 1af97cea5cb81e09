/**
 * Seat Pack Reconciler - PostgreSQL Connection
 * ============================================
 * Drizzle ORM over postgres-js, created lazily so importing the library
 * never opens a connection.
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export type ReconcilerDatabase = PostgresJsDatabase<typeof schema>;

export interface PostgresOptions {
  url: string;
  maxConnections?: number;
  idleTimeout?: number;
  connectTimeout?: number;
  ssl?: boolean;
  enableSqlLogging?: boolean;
}

// ================================================
// CONNECTION POOL SETUP
// ================================================

let sqlClient: ReturnType<typeof postgres> | null = null;
let database: ReconcilerDatabase | null = null;

export function getDatabase(options: PostgresOptions): ReconcilerDatabase {
  if (!database) {
    sqlClient = postgres(options.url, {
      max: options.maxConnections ?? 5,
      idle_timeout: options.idleTimeout ?? 20,
      connect_timeout: options.connectTimeout ?? 10,
      ssl: options.ssl ? 'require' : false,
    });

    database = drizzle(sqlClient, {
      schema,
      logger: options.enableSqlLogging ?? false,
    });
  }

  return database;
}

// ================================================
// CONNECTION HEALTH CHECK
// ================================================

export async function checkPostgresHealth(): Promise<{
  status: 'connected' | 'error';
  responseTime?: number;
  error?: string;
}> {
  if (!sqlClient) {
    return { status: 'error', error: 'PostgreSQL connection not initialised' };
  }

  const startTime = Date.now();
  try {
    await sqlClient`SELECT 1 as health_check`;
    return { status: 'connected', responseTime: Date.now() - startTime };
  } catch (error) {
    console.error('PostgreSQL health check failed:', error);
    return {
      status: 'error',
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

// ================================================
// GRACEFUL SHUTDOWN
// ================================================

export async function closePostgresConnection(): Promise<void> {
  if (!sqlClient) return;

  try {
    await sqlClient.end();
    console.log('✅ PostgreSQL connection closed gracefully');
  } catch (error) {
    console.error('❌ Error closing PostgreSQL connection:', error);
  } finally {
    sqlClient = null;
    database = null;
  }
}
