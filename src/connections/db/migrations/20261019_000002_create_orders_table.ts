import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id UUID PRIMARY KEY,
        order_number VARCHAR(50) UNIQUE NOT NULL,
        merchant_id VARCHAR(64) NOT NULL REFERENCES merchants(id),
        store_id VARCHAR(64),
        user_id VARCHAR(64) NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        -- Tiền: số nguyên theo đơn vị nhỏ nhất
        total_amount BIGINT NOT NULL,
        discount_amount BIGINT NOT NULL DEFAULT 0,
        final_amount BIGINT NOT NULL,
        currency CHAR(3) NOT NULL DEFAULT 'VND',
        payment_method VARCHAR(20) NOT NULL,
        payment_status VARCHAR(20) NOT NULL DEFAULT 'pending',
        verification_code VARCHAR(16) UNIQUE NOT NULL,
        version INTEGER NOT NULL DEFAULT 1,
        -- Refund
        pre_refund_status VARCHAR(20),
        refund_reason TEXT,
        refund_explanation TEXT,
        refund_evidence JSONB,
        refund_requested_at TIMESTAMPTZ,
        refund_processed_at TIMESTAMPTZ,
        refund_processed_by VARCHAR(64),
        refund_reject_reason TEXT,
        -- Hủy đơn hàng
        cancellation_reason TEXT,
        cancelled_by VARCHAR(64),
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        paid_at TIMESTAMPTZ,
        verified_at TIMESTAMPTZ,
        completed_at TIMESTAMPTZ,
        cancelled_at TIMESTAMPTZ,
        refunded_at TIMESTAMPTZ,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT chk_orders_amounts CHECK (
          discount_amount >= 0 AND final_amount >= 0 AND final_amount = total_amount - discount_amount
        ),
        CONSTRAINT chk_orders_status CHECK (status IN (
          'pending', 'confirmed', 'preparing', 'ready', 'verified',
          'completed', 'cancelled', 'refunding', 'refunded'
        ))
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_merchant_status ON orders(merchant_id, status)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_merchant_refunded_at ON orders(merchant_id, refunded_at)
      WHERE status = 'refunded'
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at DESC)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_created_at');
    await client.query('DROP INDEX IF EXISTS idx_orders_merchant_refunded_at');
    await client.query('DROP INDEX IF EXISTS idx_orders_merchant_status');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
