/**
 * Drizzle ORM Database Client
 *
 * One connection pool per RAG context. The context that opens it closes it
 * on shutdown.
 */

import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { logger } from '@/lib/logger';
import * as schema from './schema';

const log = logger.child({ layer: 'db', service: 'DatabaseClient' });

// =============================================================================
// Types
// =============================================================================

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  close(): Promise<void>;
}

export interface DatabaseOptions {
  max?: number;
  idleTimeout?: number;
  connectTimeout?: number;
}

// =============================================================================
// Client Factory
// =============================================================================

/**
 * Open a connection pool and wrap it in a Drizzle client.
 */
export function createDatabase(
  connectionString: string,
  options: DatabaseOptions = {}
): DatabaseConnection {
  const client = postgres(connectionString, {
    max: options.max ?? 10,
    idle_timeout: options.idleTimeout ?? 20,
    connect_timeout: options.connectTimeout ?? 10,
  });

  const db = drizzle(client, { schema });
  let closed = false;

  log.debug({ event: 'db_pool_opened', max: options.max ?? 10 }, 'Database pool opened');

  return {
    db,
    async close() {
      if (closed) return;
      closed = true;
      await client.end();
      log.info({ event: 'db_pool_closed' }, 'Database connections closed');
    },
  };
}
