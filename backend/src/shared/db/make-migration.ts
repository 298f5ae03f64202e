/**
 * backend/src/shared/db/make-migration.ts
 *
 * WHY:
 * - "One command" way to create a new migration file with the next number.
 *
 * HOW TO USE:
 * - npm run db:make --workspace backend -- add_inbox_archived_flag
 *
 * RESULT:
 * - backend/src/shared/db/migrations/0004_add_inbox_archived_flag.ts
 * - Remember to register it in migrations/index.ts and mirror it in db.schema.ts.
 */

import fs from 'node:fs';
import path from 'node:path';

import { logger } from '../logger/logger';

function normalizeMigrationName(input: string): string {
  // "Add Inbox Flag" -> "add_inbox_flag"
  return input
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

function getNextMigrationNumber(existingFiles: string[]): string {
  const numbers = existingFiles
    .map((file) => file.match(/^(\d{4})_/))
    .filter((m): m is RegExpMatchArray => Boolean(m))
    .map((m) => Number(m[1]));

  const max = numbers.length ? Math.max(...numbers) : 0;
  return String(max + 1).padStart(4, '0');
}

function buildMigrationFileContents(fileName: string): string {
  return `/**
 * src/shared/db/migrations/${fileName}
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema;
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema;
}
`;
}

function main(): void {
  const rawName = process.argv[2];

  if (!rawName) {
    logger.error('db.make.missing_name', {
      example: 'npm run db:make --workspace backend -- add_inbox_archived_flag',
    });
    process.exit(1);
  }

  const safeName = normalizeMigrationName(rawName);

  // The package script runs from backend/, so process.cwd() is backend/.
  const migrationsDir = path.join(process.cwd(), 'src/shared/db/migrations');
  fs.mkdirSync(migrationsDir, { recursive: true });

  const nextNumber = getNextMigrationNumber(fs.readdirSync(migrationsDir));
  const fileName = `${nextNumber}_${safeName}.ts`;
  const fullPath = path.join(migrationsDir, fileName);

  if (fs.existsSync(fullPath)) {
    logger.error('db.make.exists', { fileName });
    process.exit(1);
  }

  fs.writeFileSync(fullPath, buildMigrationFileContents(fileName), 'utf8');
  logger.info('db.make.created', { path: fullPath });
}

main();
