/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One function that brings any Kysely instance (pg pool, in-process test DB) to the
 *   latest schema.
 *
 * RULES:
 * - Throws on the first failing migration; callers decide whether to exit.
 */

import { Migrator } from 'kysely';
import type { Kysely } from 'kysely';

import { migrations } from './migrations';
import { logger } from '../logger/logger';

export async function migrateToLatest<DB>(db: Kysely<DB>): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(migrations),
    },
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }
}
