/**
 * Apply pending trace store migrations to the database named by the DB_*
 * environment variables.
 *
 *   npm run build && npm run migrate
 *
 * @module migrate
 */

import { fileURLToPath } from 'node:url';
import { createLogger } from './logging/logger.js';
import { toError } from './tracing/errors.js';
import { createPool } from './utils/db.js';
import { runMigrations } from './utils/migrationRunner.js';

const logger = createLogger({ context: { component: 'migrate' } });

async function main(): Promise<void> {
  const pool = createPool();
  try {
    const applied = await runMigrations(pool);
    for (const file of applied) {
      logger.info('Applied migration', { file });
    }
    logger.info('All migrations applied', { count: applied.length });
  } finally {
    await pool.end();
  }
}

const entry = process.argv[1];
if (entry !== undefined && fileURLToPath(import.meta.url) === entry) {
  main().catch((error: unknown) => {
    logger.fatal('Migration failed', toError(error));
    process.exitCode = 1;
  });
}
