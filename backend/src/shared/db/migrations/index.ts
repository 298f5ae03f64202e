/**
 * src/shared/db/migrations/index.ts
 *
 * Static registry of migrations (name -> module), so the same list runs from the CLI
 * (migrate.ts) and in-process in tests. Add new files here in order.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_inboxes_messages';
import * as m0003 from './0003_audit_events';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_inboxes_messages': m0002,
  '0003_audit_events': m0003,
};
