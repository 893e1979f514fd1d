/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Uniqueness is enforced by Postgres constraints, not by check-then-insert.
 * - Repos need one place to recognise "unique constraint violated" (SQLSTATE 23505).
 */

const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!error || typeof error !== 'object' || !('code' in error)) return false;
  if (error.code !== PG_UNIQUE_VIOLATION) return false;

  if (constraint === undefined) return true;
  return 'constraint' in error && error.constraint === constraint;
}
