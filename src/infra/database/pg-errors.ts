/**
 * PostgreSQL error classification helpers.
 */

import pg from 'pg';

const { DatabaseError: PgDatabaseError } = pg;

/** SQLSTATE class 23: integrity constraint violation */
const INTEGRITY_CONSTRAINT_CLASS = '23';

export interface IntegrityViolation {
  code: string;
  message: string;
  constraint: string | undefined;
}

/**
 * Returns the violation details when `error` is a Postgres integrity
 * constraint failure (FK, unique, not-null, check), otherwise null.
 */
export const asIntegrityViolation = (error: unknown): IntegrityViolation | null => {
  if (!(error instanceof PgDatabaseError)) {
    return null;
  }
  const code = error.code;
  if (code === undefined || !code.startsWith(INTEGRITY_CONSTRAINT_CLASS)) {
    return null;
  }
  return { code, message: error.message, constraint: error.constraint };
};
