import { loadConfig } from '../connections/config';
import type { AppConfig } from '../connections/config';
import { MemoryDataStore } from '../connections/db/memory.datastore';
import type { Order } from '../connections/db/models';
import { buildApplication } from '../app';
import type { Application } from '../app';
import type { FileRemover } from '../modules/finance/finance.jobs';
import { MemoryJobLock } from '../modules/finance/finance.lock';

export const testConfig = (overrides: NodeJS.ProcessEnv = {}): AppConfig =>
  loadConfig({
    NODE_ENV: 'test',
    DATA_STORE: 'memory',
    JOB_LOCK: 'memory',
    JOBS_ENABLED: 'false',
    ...overrides,
  });

/**
 * Đồng hồ điều khiển bằng tay cho test.
 */
export class ManualClock {
  private ms: number;

  constructor(iso: string) {
    this.ms = new Date(iso).getTime();
  }

  readonly now = (): Date => new Date(this.ms);

  set(iso: string): void {
    this.ms = new Date(iso).getTime();
  }

  advance(ms: number): void {
    this.ms += ms;
  }
}

export interface TestApp {
  app: Application;
  store: MemoryDataStore;
  clock: ManualClock;
  lock: MemoryJobLock;
}

export const buildTestApp = (
  options: { env?: NodeJS.ProcessEnv; clock?: ManualClock; files?: FileRemover; merchants?: string[] } = {},
): TestApp => {
  const store = new MemoryDataStore();
  for (const id of options.merchants ?? ['M1']) {
    store.addMerchant({ id, name: `Merchant ${id}`, status: 'active' });
  }
  const clock = options.clock ?? new ManualClock('2026-10-19T03:00:00.000Z');
  const lock = new MemoryJobLock(() => clock.now().getTime());
  const app = buildApplication(testConfig(options.env), {
    store,
    jobLock: lock,
    now: clock.now,
    files: options.files,
  });
  return { app, store, clock, lock };
};

let orderSeq = 0;

/**
 * Build an order row for seeding. Amount overrides must stay consistent
 * (final_amount = total_amount - discount_amount).
 */
export const makeOrder = (overrides: Partial<Order> = {}): Order => {
  orderSeq += 1;
  const createdAt = new Date('2026-10-19T02:00:00.000Z');
  return {
    id: `order-${orderSeq}`,
    order_number: `ORD-T${String(orderSeq).padStart(4, '0')}`,
    merchant_id: 'M1',
    store_id: 'S1',
    user_id: 'U1',
    status: 'ready',
    total_amount: 100000,
    discount_amount: 0,
    final_amount: 100000,
    currency: 'VND',
    payment_method: 'momo',
    payment_status: 'paid',
    verification_code: `CODE${String(orderSeq).padStart(4, '0')}`,
    items: [{ product_id: 'P1', product_name: 'Combo bún chả', unit_price: 100000, quantity: 1, subtotal: 100000 }],
    version: 1,
    pre_refund_status: null,
    refund_reason: null,
    refund_explanation: null,
    refund_evidence: null,
    refund_requested_at: null,
    refund_processed_at: null,
    refund_processed_by: null,
    refund_reject_reason: null,
    cancellation_reason: null,
    cancelled_by: null,
    created_at: createdAt,
    paid_at: createdAt,
    verified_at: null,
    completed_at: null,
    cancelled_at: null,
    refunded_at: null,
    updated_at: createdAt,
    ...overrides,
  };
};

export const seedOrder = async (store: MemoryDataStore, overrides: Partial<Order> = {}): Promise<Order> => {
  const order = makeOrder(overrides);
  await store.orders.insert(order);
  return order;
};
