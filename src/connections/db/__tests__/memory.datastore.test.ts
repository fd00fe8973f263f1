import { describe, expect, it } from 'vitest';
import { makeOrder } from '../../../__tests__/helpers';
import { ConflictError } from '../../../utils/errors';
import { MemoryDataStore } from '../memory.datastore';

const verificationRecord = (orderId: string) => ({
  order_id: orderId,
  merchant_id: 'M1',
  store_id: 'S1',
  staff_id: 'staff1',
  staff_name: 'Staff One',
  verification_method: 'code' as const,
  created_at: new Date('2026-10-19T03:00:00.000Z'),
});

describe('MemoryDataStore', () => {
  it('rejects a duplicate verification code', async () => {
    const store = new MemoryDataStore();
    await store.orders.insert(makeOrder({ verification_code: 'SAME01' }));

    await expect(store.orders.insert(makeOrder({ verification_code: 'SAME01' }))).rejects.toBeInstanceOf(ConflictError);
  });

  it('hands out copies', async () => {
    const store = new MemoryDataStore();
    const order = makeOrder();
    await store.orders.insert(order);

    const copy = await store.orders.findById(order.id);
    if (copy) {
      copy.status = 'cancelled';
    }
    order.status = 'completed';

    await expect(store.orders.findById(order.id)).resolves.toMatchObject({ status: 'ready' });
  });

  it('applies a write only against the expected version', async () => {
    const store = new MemoryDataStore();
    const order = makeOrder();
    await store.orders.insert(order);
    const next = { ...order, status: 'verified' as const, version: 2 };

    await expect(store.orders.save({ order: next, expectedVersion: 2 })).resolves.toBe(false);
    await expect(store.orders.save({ order: next, expectedVersion: 1 })).resolves.toBe(true);
    await expect(store.orders.save({ order: { ...next, version: 3 }, expectedVersion: 1 })).resolves.toBe(false);
    await expect(store.orders.findById(order.id)).resolves.toMatchObject({ status: 'verified', version: 2 });
  });

  it('persists only the columns a Postgres update writes', async () => {
    const store = new MemoryDataStore();
    const order = makeOrder();
    await store.orders.insert(order);
    const next = { ...order, status: 'verified' as const, version: 2, final_amount: 1, verification_code: 'OTHER1' };

    await expect(store.orders.save({ order: next, expectedVersion: 1 })).resolves.toBe(true);
    await expect(store.orders.findById(order.id)).resolves.toMatchObject({
      status: 'verified',
      version: 2,
      final_amount: order.final_amount,
      verification_code: order.verification_code,
    });
  });

  it('keeps a single verification record per order', async () => {
    const store = new MemoryDataStore();
    const order = makeOrder();
    await store.orders.insert(order);
    await store.orders.save({
      order: { ...order, status: 'verified', version: 2 },
      expectedVersion: 1,
      verificationRecord: verificationRecord(order.id),
    });

    await expect(
      store.orders.save({
        order: { ...order, status: 'verified', version: 3 },
        expectedVersion: 2,
        verificationRecord: verificationRecord(order.id),
      }),
    ).rejects.toBeInstanceOf(ConflictError);
    expect(store.listAllVerificationRecords()).toHaveLength(1);
    await expect(store.orders.findById(order.id)).resolves.toMatchObject({ version: 2 });
  });

  it('never overwrites a settlement', async () => {
    const store = new MemoryDataStore();
    const record = {
      settlement_number: 'SET-FIRST',
      merchant_id: 'M1',
      period_start: '2026-10-12',
      period_end: '2026-10-18',
      order_count: 2,
      gross_amount: 150000,
      commission: 3000,
      refund_amount: 0,
      net_payable: 147000,
      currency: 'VND',
      status: 'pending' as const,
      generated_at: new Date('2026-10-19T02:00:00.000Z'),
    };

    await expect(store.finance.insertSettlementIfAbsent(record)).resolves.toMatchObject({ created: true });
    const again = await store.finance.insertSettlementIfAbsent({ ...record, settlement_number: 'SET-SECOND', gross_amount: 1 });

    expect(again).toEqual({ record, created: false });
  });
});
