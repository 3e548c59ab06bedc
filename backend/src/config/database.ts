import { Pool, types } from 'pg';
import type { PoolClient } from 'pg';
import { env } from './env';

// BIGINT currency columns come back as strings by default
types.setTypeParser(20 /* int8 */, (value: string) => parseInt(value, 10));

/** Mapped copy of an entity type; pg row generics need an index-signature-compatible type. */
export type Row<T> = { [K in keyof T]: T[K] };

/** The slice of a pooled client the models need. */
export type SqlClient = Pick<PoolClient, 'query'>;

// PostgreSQL connection pool
export const pool = new Pool({
  connectionString: env.databaseUrl,
  ssl: env.nodeEnv === 'production' ? { rejectUnauthorized: false } : false,
  max: 20, // Maximum number of clients in pool
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('connect', () => {
  console.log('Connected to PostgreSQL database');
});

pool.on('error', (err: Error) => {
  console.error('PostgreSQL pool error:', err);
  // Idle client errors should not take the API down
});

export default pool;
