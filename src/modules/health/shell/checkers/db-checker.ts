/**
 * Database readiness checker
 *
 * Looks up every table the service reads or writes with `to_regclass`. The
 * database is unhealthy when the lookup fails, times out, or a table is
 * missing (schema.sql not applied, wrong search_path, wrong database).
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name reported in the readiness body */
  name: string;
  /** Tables that must resolve on the connection's search_path */
  tables: readonly string[];
  timeoutMs?: number;
}

/**
 * Returns the names in `tables` that do not resolve to a relation, in the
 * order given.
 */
const findMissingTables = async <T>(
  db: Kysely<T>,
  tables: readonly string[]
): Promise<string[]> => {
  if (tables.length === 0) {
    await sql`SELECT 1`.execute(db);
    return [];
  }

  const candidates = sql.join(tables.map((table) => sql`(${table}::text)`));
  const { rows } = await sql<{ name: string }>`
    SELECT t.name
    FROM (VALUES ${candidates}) AS t(name)
    WHERE to_regclass(t.name) IS NULL
  `.execute(db);

  const missing = new Set(rows.map((row) => row.name));
  return tables.filter((table) => missing.has(table));
};

/**
 * Creates a readiness checker for the PPA database.
 *
 * @example
 * ```typescript
 * const checker = makeDbHealthChecker(ppaDb, { name: 'database', tables: PPA_TABLES });
 * await checker();
 * // { name: 'database', status: 'healthy', latencyMs: 4 }
 * ```
 */
export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, tables, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Database health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      const missing = await Promise.race([findMissingTables(db, tables), timeoutPromise]);
      const latencyMs = Date.now() - startTime;

      if (missing.length > 0) {
        return {
          name,
          status: 'unhealthy',
          message: `Missing tables: ${missing.join(', ')}`,
          latencyMs,
        };
      }

      return { name, status: 'healthy', latencyMs };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
