/**
 * Database connection pool utility.
 *
 * PostgreSQL pool for the Postgres trace store, configured from the
 * environment. The store itself only depends on the narrow `Queryable`
 * shape so tests can hand it a fake.
 *
 * @module utils/db
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl?: boolean;
}

export type QueryRow = Record<string, unknown>;

/** The subset of pg.Pool / pg.PoolClient the trace store and migrations use. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: QueryRow[]; rowCount: number | null }>;
}

function intFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const parsed = parseInt(env[key] ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Build database configuration from environment variables with defaults
 * suited to a local development database.
 */
export function getDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  return {
    host: env['DB_HOST'] ?? 'localhost',
    port: intFromEnv(env, 'DB_PORT', 5432),
    database: env['DB_NAME'] ?? 'traces',
    user: env['DB_USER'] ?? 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    max: intFromEnv(env, 'DB_POOL_MAX', 10),
    idleTimeoutMillis: intFromEnv(env, 'DB_IDLE_TIMEOUT', 30000),
    connectionTimeoutMillis: intFromEnv(env, 'DB_CONNECT_TIMEOUT', 5000),
    ssl: env['DB_SSL'] === 'true',
  };
}

/**
 * Create a new PostgreSQL connection pool with the given configuration.
 * Connections are opened lazily, on the first query.
 */
export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/**
 * Postgres error codes are five-character SQLSTATE strings; the first two
 * characters name the class.
 */
export function sqlStateOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const code: unknown = error.code;
    if (typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code)) return code;
  }
  return undefined;
}
