import type { Pool, PoolClient } from 'pg';
import { createPool } from './connection';
import { migrations } from './migrations';
import type { Migration } from './migrations';
import { loadConfig } from '../config';
import { configureLogging, logger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';

// Create migrations table if not exists
const createMigrationsTable = async (pool: Pool) => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

// Check if migration has been executed
const isMigrationExecuted = async (pool: Pool, name: string): Promise<boolean> => {
  const result = await pool.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

// Chạy `step` và ghi/xóa bản ghi migration trong cùng một transaction
const runInTransaction = async (
  pool: Pool,
  step: (client: PoolClient) => Promise<void>,
  bookkeeping: string,
  name: string,
) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await step(client);
    await client.query(bookkeeping, [name]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};

const runMigration = async (pool: Pool, name: string, migration: Migration) => {
  try {
    await runInTransaction(pool, (client) => migration.up(client), 'INSERT INTO migrations (name) VALUES ($1)', name);
    logger.info(`✓ Migration ${name} executed successfully`);
  } catch (error) {
    logger.error(`✗ Migration ${name} failed`, { error: errorMessage(error) });
    throw error;
  }
};

const rollbackMigration = async (pool: Pool, name: string, migration: Migration) => {
  try {
    await runInTransaction(pool, (client) => migration.down(client), 'DELETE FROM migrations WHERE name = $1', name);
    logger.info(`✓ Migration ${name} rolled back successfully`);
  } catch (error) {
    logger.error(`✗ Migration ${name} rollback failed`, { error: errorMessage(error) });
    throw error;
  }
};

/**
 * Run all pending migrations
 */
export const migrate = async (pool: Pool): Promise<string[]> => {
  logger.info('Starting database migrations...');
  await createMigrationsTable(pool);
  logger.info(`Found ${migrations.length} migration files`);

  const executed: string[] = [];
  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(pool, name)) {
      logger.info(`⊘ Migration ${name} already executed, skipping...`);
      continue;
    }
    await runMigration(pool, name, migration);
    executed.push(name);
  }

  logger.info('All migrations completed successfully!');
  return executed;
};

/**
 * Rollback last migration
 */
export const rollback = async (pool: Pool): Promise<string | null> => {
  logger.info('Rolling back last migration...');
  await createMigrationsTable(pool);

  const result = await pool.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1',
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return null;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find((m) => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(pool, lastMigrationName, migrationInfo.migration);
  logger.info('Rollback completed successfully!');
  return lastMigrationName;
};

// Run if called directly
if (require.main === module) {
  const command = process.argv[2];
  const config = loadConfig();
  configureLogging(config.log);
  const pool = createPool(config.db);
  const run = command === 'rollback' ? rollback(pool) : migrate(pool);

  void run
    .catch((error: unknown) => {
      logger.error('Migration error', { error: errorMessage(error) });
      process.exitCode = 1;
    })
    .finally(() => pool.end().catch((error: unknown) => {
      logger.error('Failed to close database pool', { error: errorMessage(error) });
    }));
}
