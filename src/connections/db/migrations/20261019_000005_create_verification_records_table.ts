import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    // Mỗi order chỉ được redeem một lần
    await client.query(`
      CREATE TABLE IF NOT EXISTS verification_records (
        id UUID PRIMARY KEY,
        order_id UUID UNIQUE NOT NULL REFERENCES orders(id) ON DELETE RESTRICT,
        merchant_id VARCHAR(64) NOT NULL,
        store_id VARCHAR(64),
        staff_id VARCHAR(64) NOT NULL,
        staff_name VARCHAR(255) NOT NULL,
        verification_method VARCHAR(20) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT chk_verification_records_method CHECK (verification_method IN ('code', 'qr', 'batch'))
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_verification_records_merchant_created
      ON verification_records(merchant_id, created_at)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_verification_records_merchant_created');
    await client.query('DROP TABLE IF EXISTS verification_records CASCADE');
  },
};
