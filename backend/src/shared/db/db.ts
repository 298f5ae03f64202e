/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in db.schema.ts and must stay aligned with migrations.
 *
 * HOW TO USE:
 * - createDb(config.databaseUrl) once in app/di.ts.
 * - DAL/queries accept DbExecutor; services pass either the root db or a `trx`.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { Database } from './db.schema';

export type Db = Kysely<Database>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (services pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<Database>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
}
