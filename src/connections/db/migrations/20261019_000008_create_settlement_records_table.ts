import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS settlement_records (
        merchant_id VARCHAR(64) NOT NULL REFERENCES merchants(id),
        period_start DATE NOT NULL,
        period_end DATE NOT NULL,
        settlement_number VARCHAR(50) UNIQUE NOT NULL,
        order_count INTEGER NOT NULL DEFAULT 0,
        gross_amount BIGINT NOT NULL DEFAULT 0,
        commission BIGINT NOT NULL DEFAULT 0,
        refund_amount BIGINT NOT NULL DEFAULT 0,
        net_payable BIGINT NOT NULL DEFAULT 0,
        currency CHAR(3) NOT NULL DEFAULT 'VND',
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        generated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (merchant_id, period_start, period_end),
        CONSTRAINT chk_settlement_period CHECK (period_start <= period_end)
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS settlement_records CASCADE');
  },
};
