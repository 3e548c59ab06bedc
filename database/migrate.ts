/**
 * Database Migration Runner
 * Reads and executes SQL migration files in order, each in its own transaction.
 * Usage: npm run build && npm run migrate
 */

import { Pool } from 'pg';
import type { PoolClient } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../backend/src/config/env';

export type MigrationClient = Pick<PoolClient, 'query'>;

export function listMigrations(dir: string): string[] {
  return fs.readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/** Applies every migration not yet recorded in _migrations. Returns the files it ran. */
export async function runMigrations(client: MigrationClient, dir: string): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      filename VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
    );
  `);

  const executed = await client.query<{ filename: string }>('SELECT filename FROM _migrations ORDER BY filename');
  const executedSet = new Set(executed.rows.map((r) => r.filename));

  const files = listMigrations(dir);
  if (files.length === 0) {
    console.log('[Migrate] No migration files found.');
    return [];
  }

  const ran: string[] = [];
  for (const file of files) {
    if (executedSet.has(file)) {
      console.log(`[Migrate] ${file} (already applied)`);
      continue;
    }

    const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
    console.log(`[Migrate] Running ${file}...`);

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (filename) VALUES ($1)', [file]);
      await client.query('COMMIT');
      ran.push(file);
    } catch (err) {
      await client.query('ROLLBACK');
      console.error(`[Migrate] ${file} failed:`, err);
      throw err;
    }
  }

  console.log(`[Migrate] Complete. ${ran.length} new migration(s) applied.`);
  return ran;
}

async function main(): Promise<void> {
  if (!env.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = new Pool({
    connectionString: env.databaseUrl,
    ssl: env.nodeEnv === 'production' ? { rejectUnauthorized: false } : undefined,
  });
  // One connection, so BEGIN/COMMIT wrap the migration they belong to
  const client = await pool.connect();
  try {
    const dir = process.env.MIGRATIONS_DIR ?? path.join(process.cwd(), 'database', 'migrations');
    await runMigrations(client, dir);
  } finally {
    client.release();
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error('Migration failed:', err);
    process.exit(1);
  });
}
