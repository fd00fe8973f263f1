import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_status_history (
        id UUID PRIMARY KEY,
        seq BIGSERIAL,
        order_id UUID NOT NULL REFERENCES orders(id) ON DELETE RESTRICT,
        from_status VARCHAR(20) NOT NULL,
        to_status VARCHAR(20) NOT NULL,
        actor_id VARCHAR(64) NOT NULL,
        actor_role VARCHAR(20) NOT NULL,
        reason TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_order_status_history_order ON order_status_history(order_id, created_at)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_order_status_history_order');
    await client.query('DROP TABLE IF EXISTS order_status_history CASCADE');
  },
};
