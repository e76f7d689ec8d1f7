import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { LearnerDatabase } from './user/types.js';

const { Pool: PG_POOL } = pg;

export type LearnerDbClient = Kysely<LearnerDatabase>;

export interface DatabaseClientOptions {
  connectionString: string;
  /** Connection pool size */
  maxConnections?: number;
}

/**
 * Create a Kysely instance for the learner database
 */
export const createDatabaseClient = (options: DatabaseClientOptions): LearnerDbClient => {
  if (options.connectionString === '') {
    throw new Error('Missing configuration for learner database (DATABASE_URL)');
  }

  return new Kysely<LearnerDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: options.connectionString,
        max: options.maxConnections ?? 10,
      }),
    }),
  });
};

export type { LearnerDatabase, LearnerStates, Submissions, Questions } from './user/types.js';
