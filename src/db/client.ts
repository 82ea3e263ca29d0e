/**
 * Drizzle ORM Database Client
 *
 * One postgres-js pool per connection string, wrapped in a Drizzle client.
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { loggers } from '@/lib/logger';
import * as schema from './schema';

const log = loggers.db.child({ service: 'DatabaseClient' });

// =============================================================================
// Types
// =============================================================================

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  /** Close the underlying pool. Call during graceful shutdown. */
  close(): Promise<void>;
}

export interface DatabaseOptions {
  maxConnections?: number;
  idleTimeoutSeconds?: number;
  connectTimeoutSeconds?: number;
}

// =============================================================================
// Client Factory
// =============================================================================

/**
 * Open a Drizzle client over a new postgres-js pool.
 *
 * @param connectionString - PostgreSQL connection string
 */
export function createDb(connectionString: string, options: DatabaseOptions = {}): DatabaseConnection {
  const client = postgres(connectionString, {
    max: options.maxConnections ?? 10,
    idle_timeout: options.idleTimeoutSeconds ?? 20,
    connect_timeout: options.connectTimeoutSeconds ?? 10,
    onnotice: () => {},
  });

  const db = drizzle(client, { schema });

  log.debug({ maxConnections: options.maxConnections ?? 10 }, 'Created database pool');

  return {
    db,
    async close() {
      await client.end();
      log.debug('Closed database pool');
    },
  };
}
