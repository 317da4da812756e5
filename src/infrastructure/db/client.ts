import { drizzle } from 'drizzle-orm/postgres-js';
import type { Logger } from 'pino';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. Turns are written by a single persister, reads come from the history route. */
  maxConnections?: number;
  /** Receives server notices (e.g. "relation already exists, skipping") at debug. */
  log?: Logger;
}

/**
 * Opens a postgres.js pool and wraps it in a typed Drizzle instance.
 *
 * `sql` is kept for schema bootstrap, health pings and `end()`;
 * `db` is what the durable store queries through.
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const { log } = options;
  const sql = postgres(databaseUrl, {
    max: options.maxConnections ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: { application_name: 'turnwise' },
    onnotice: (notice) => {
      log?.debug({ code: notice['code'], notice: notice['message'] }, 'Postgres notice');
    },
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
export type SqlClient = DbClient['sql'];
