import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS refunds (
        id UUID PRIMARY KEY,
        refund_number VARCHAR(50) UNIQUE NOT NULL,
        order_id UUID NOT NULL REFERENCES orders(id) ON DELETE RESTRICT,
        merchant_id VARCHAR(64) NOT NULL,
        amount BIGINT NOT NULL,
        reason TEXT NOT NULL,
        explanation TEXT,
        evidence JSONB,
        pre_refund_status VARCHAR(20) NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'requested',
        processed_by VARCHAR(64),
        reject_reason TEXT,
        requested_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        processed_at TIMESTAMPTZ,
        CONSTRAINT chk_refunds_status CHECK (status IN ('requested', 'approved', 'rejected'))
      )
    `);

    // Tối đa một yêu cầu đang mở cho mỗi order
    await client.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_refunds_open_per_order ON refunds(order_id)
      WHERE status = 'requested'
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_refunds_merchant_requested ON refunds(merchant_id, requested_at)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_refunds_merchant_requested');
    await client.query('DROP INDEX IF EXISTS uq_refunds_open_per_order');
    await client.query('DROP TABLE IF EXISTS refunds CASCADE');
  },
};
