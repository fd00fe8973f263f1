import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS merchants (
        id VARCHAR(64) PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'active',
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT chk_merchants_status CHECK (status IN ('active', 'suspended', 'closed'))
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_merchants_status ON merchants(status)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_merchants_status');
    await client.query('DROP TABLE IF EXISTS merchants CASCADE');
  },
};
