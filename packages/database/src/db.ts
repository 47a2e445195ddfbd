import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export { sql, schema };

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  close(): Promise<void>;
}

export interface ConnectionOptions {
  max?: number;
  idleTimeoutSeconds?: number;
  connectTimeoutSeconds?: number;
}

export function createDatabase(url: string, options: ConnectionOptions = {}): DatabaseConnection {
  const queryClient = postgres(url, {
    max: options.max ?? 20,
    idle_timeout: options.idleTimeoutSeconds ?? 20,
    connect_timeout: options.connectTimeoutSeconds ?? 10,
  });
  const db = drizzle(queryClient, { schema });

  return {
    db,
    close: () => queryClient.end(),
  };
}
