import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS reconciliation_logs (
        merchant_id VARCHAR(64) NOT NULL REFERENCES merchants(id),
        business_date DATE NOT NULL,
        expected_total BIGINT NOT NULL DEFAULT 0,
        actual_total BIGINT NOT NULL DEFAULT 0,
        discrepancy BIGINT NOT NULL DEFAULT 0,
        mismatched_orders JSONB NOT NULL DEFAULT '[]'::jsonb,
        status VARCHAR(20) NOT NULL,
        notes TEXT,
        generated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        resolved_orders JSONB NOT NULL DEFAULT '[]'::jsonb,
        dispute_reason TEXT,
        disputed_at TIMESTAMPTZ,
        PRIMARY KEY (merchant_id, business_date),
        CONSTRAINT chk_reconciliation_status CHECK (status IN ('matched', 'mismatched'))
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS reconciliation_logs CASCADE');
  },
};
