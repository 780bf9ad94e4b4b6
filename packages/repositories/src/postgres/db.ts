// Postgres connection for saved games

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;

  /** Seconds before an idle connection is closed */
  idleTimeout?: number;
};

/**
 * Open a small pool and a Drizzle instance over the game schema.
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 4,
    idle_timeout: config.idleTimeout ?? 30,
  });

  const db = drizzle(client, { schema });

  return {
    db,
    close: () => client.end({ timeout: 5 }),
  };
}

export type Database = ReturnType<typeof createDatabase>['db'];
