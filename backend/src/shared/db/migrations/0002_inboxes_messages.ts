/**
 * src/shared/db/migrations/0002_inboxes_messages.ts
 *
 * WHY:
 * - Ownership chain: users -> inboxes -> messages, each a required FK.
 * - Inbox names are unique per owner (UNIQUE (user_id, name)).
 *   The public inbox URL is derived from the id at read time, so it has no column.
 *
 * RULES:
 * - FKs are ON DELETE RESTRICT: repos delete children explicitly inside the caller's
 *   transaction, so a forgotten cascade fails loudly instead of silently orphaning rows.
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('inboxes')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) =>
      col.notNull().references('users.id').onDelete('restrict'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE inboxes
      ADD CONSTRAINT inboxes_user_name_unique
      UNIQUE (user_id, name);
  `.execute(db);

  await db.schema
    .createTable('messages')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('inbox_id', 'uuid', (col) =>
      col.notNull().references('inboxes.id').onDelete('restrict'),
    )
    .addColumn('subject', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('body', 'text', (col) => col.notNull())
    .addColumn('is_read', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX messages_inbox_id_idx ON messages(inbox_id);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('messages').ifExists().execute();
  await db.schema.dropTable('inboxes').ifExists().execute();
}
