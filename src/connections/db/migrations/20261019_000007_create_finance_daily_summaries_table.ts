import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS finance_daily_summaries (
        merchant_id VARCHAR(64) NOT NULL REFERENCES merchants(id),
        business_date DATE NOT NULL,
        order_count INTEGER NOT NULL DEFAULT 0,
        total_income BIGINT NOT NULL DEFAULT 0,
        discount_total BIGINT NOT NULL DEFAULT 0,
        platform_fee BIGINT NOT NULL DEFAULT 0,
        refund_count INTEGER NOT NULL DEFAULT 0,
        refund_amount BIGINT NOT NULL DEFAULT 0,
        net_income BIGINT NOT NULL DEFAULT 0,
        payment_breakdown JSONB NOT NULL DEFAULT '{}'::jsonb,
        currency CHAR(3) NOT NULL DEFAULT 'VND',
        generated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (merchant_id, business_date)
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS finance_daily_summaries CASCADE');
  },
};
