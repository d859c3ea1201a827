import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { config } from '@/config';
import * as schema from './schema';

function createDatabase(connectionString: string) {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
  });
  return { client, db: drizzle(client, { schema }) };
}

type Connection = ReturnType<typeof createDatabase>;

let connection: Connection | null = null;

/**
 * Shared drizzle instance. Created on first use so that modules importing
 * the schema do not need DATABASE_URL.
 */
export function getDb(): Database {
  if (!connection) {
    if (!config.databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set. Please configure your database connection.');
    }
    connection = createDatabase(config.databaseUrl);
  }
  return connection.db;
}

export async function closeDb(): Promise<void> {
  if (connection) {
    await connection.client.end({ timeout: 5 });
    connection = null;
  }
}

// Type exports for convenience
export type Database = Connection['db'];
export * from './schema';
