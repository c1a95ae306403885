import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { PpaDatabase } from './ppa/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL, types: PG_TYPES } = pg;

/** OID of the PostgreSQL DATE type */
export const PG_DATE_OID = 1082;

export type PpaDbClient = Kysely<PpaDatabase>;

export interface DatabaseClients {
  ppaDb: PpaDbClient;
}

/**
 * Keep DATE values as 'YYYY-MM-DD' strings instead of local-midnight Dates.
 */
const configureTypeParsers = (): void => {
  PG_TYPES.setTypeParser(PG_DATE_OID, (value: string) => value);
};

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string, max: number): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max,
      }),
    }),
  });
};

/**
 * Initialize database clients
 */
export const initDatabases = (config: AppConfig): DatabaseClients => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for database (DATABASE_URL)');
  }

  configureTypeParsers();

  return {
    ppaDb: createClient<PpaDatabase>(database.url, database.poolMax),
  };
};

// Re-export types
export * from './ppa/types.js';
