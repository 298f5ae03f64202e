/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Uniqueness is enforced by the DB, not by check-then-insert.
 *   Repos translate the constraint violation into a domain error.
 *
 * RULES:
 * - Works with any driver error that carries the Postgres SQLSTATE in `code`
 *   (pg's DatabaseError, the in-process test DB).
 */

const UNIQUE_VIOLATION = '23505';

function readStringField(err: object, field: string): string | undefined {
  const value: unknown = Reflect.get(err, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * True when `err` is a unique violation, optionally on a specific constraint/index.
 */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if (readStringField(err, 'code') !== UNIQUE_VIOLATION) return false;
  if (!constraint) return true;

  const actual = readStringField(err, 'constraint');
  // Some drivers omit the constraint name; the code alone is then authoritative.
  return actual === undefined || actual === constraint;
}
