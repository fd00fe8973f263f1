import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_items (
        id SERIAL PRIMARY KEY,
        order_id UUID NOT NULL REFERENCES orders(id) ON DELETE RESTRICT,
        position INTEGER NOT NULL,
        product_id VARCHAR(64) NOT NULL,
        -- Snapshot tên và giá tại thời điểm đặt hàng
        product_name VARCHAR(255) NOT NULL,
        unit_price BIGINT NOT NULL CHECK (unit_price >= 0),
        quantity INTEGER NOT NULL CHECK (quantity > 0),
        subtotal BIGINT NOT NULL,
        UNIQUE (order_id, position)
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS order_items CASCADE');
  },
};
