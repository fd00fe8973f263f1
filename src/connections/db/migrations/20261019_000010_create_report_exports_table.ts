import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS report_exports (
        id UUID PRIMARY KEY,
        merchant_id VARCHAR(64) NOT NULL,
        file_name VARCHAR(255) NOT NULL,
        -- Đường dẫn local hoặc URL http(s)
        file_path TEXT NOT NULL,
        expires_at TIMESTAMPTZ NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_report_exports_expires_at ON report_exports(expires_at)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_report_exports_expires_at');
    await client.query('DROP TABLE IF EXISTS report_exports CASCADE');
  },
};
