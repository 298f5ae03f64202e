/**
 * backend/src/shared/db/db.schema.ts
 *
 * WHY:
 * - Kysely needs the table shapes to type queries.
 * - Mirrors the schema built by ./migrations (snake_case, as stored).
 *
 * RULES:
 * - Update together with a new migration; never edit a shipped migration instead.
 * - DB naming stays inside DAL/queries; domain types are camelCase.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type JsonObject = { [key: string]: unknown };

export interface UsersTable {
  id: Generated<string>;
  username: string;
  email: string;
  password_hash: string;
  is_active: Generated<boolean>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface InboxesTable {
  id: Generated<string>;
  user_id: string;
  name: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface MessagesTable {
  id: Generated<string>;
  inbox_id: string;
  subject: Generated<string>;
  body: string;
  is_read: Generated<boolean>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface AuditEventsTable {
  id: Generated<string>;
  user_id: string | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  // Inserted as serialized JSON text; read back parsed.
  metadata: ColumnType<JsonObject, string, never>;
  created_at: Timestamp;
}

export interface Database {
  users: UsersTable;
  inboxes: InboxesTable;
  messages: MessagesTable;
  audit_events: AuditEventsTable;
}
