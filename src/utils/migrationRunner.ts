/**
 * Migration runner for the trace store schema.
 *
 * Applies numbered SQL files from `src/migrations` in order, each inside
 * its own transaction, and records them in `schema_migrations` so a rerun
 * only applies what is new.
 *
 * @module utils/migrationRunner
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Queryable } from './db.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** SQL files stay in the source tree; the compiled runner resolves back to them. */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, '..', '..', 'src', 'migrations');

export interface MigrationClient extends Queryable {
  release(): void;
}

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

async function ensureMigrationsTable(client: Queryable): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename VARCHAR(255) UNIQUE NOT NULL,
      applied_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(client: Queryable): Promise<Set<string>> {
  const result = await client.query('SELECT filename FROM schema_migrations ORDER BY filename');
  return new Set(result.rows.map((row) => String(row['filename'])));
}

/**
 * Read and sort migration files from the given directory.
 * Only `.sql` files are considered, sorted lexicographically by name.
 */
export function getMigrationFiles(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * Run all pending migrations in order. A failing migration is rolled
 * back and stops the run.
 *
 * @returns Filenames applied in this run.
 */
export async function runMigrations(
  pool: MigrationPool,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
): Promise<string[]> {
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await ensureMigrationsTable(client);
    const alreadyApplied = await getAppliedMigrations(client);

    for (const file of getMigrationFiles(migrationsDir)) {
      if (alreadyApplied.has(file)) continue;

      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await client.query('COMMIT');
        applied.push(file);
      } catch (err) {
        await client.query('ROLLBACK');
        throw new Error(
          `Migration ${file} failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  } finally {
    client.release();
  }

  return applied;
}
