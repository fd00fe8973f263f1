import { describe, expect, it } from 'vitest';
import { buildTestApp, seedOrder } from '../../../__tests__/helpers';
import { InvalidStateError, NotFoundError, ValidationError } from '../../../utils/errors';
import { encodeQrPayload } from '../verification.qr';

describe('VerificationService.verifyByCode', () => {
  it('redeems a ready order and writes one verification record', async () => {
    const { app, store, clock } = buildTestApp();
    const seeded = await seedOrder(store, { verification_code: 'ABC123' });

    const order = await app.verification.verifyByCode(' abc123 ', 'staff1', 'Staff One');

    expect(order).toMatchObject({ status: 'verified', verified_at: clock.now(), version: 2 });
    expect(store.listAllVerificationRecords()).toEqual([
      {
        id: expect.any(String),
        order_id: seeded.id,
        merchant_id: 'M1',
        store_id: 'S1',
        staff_id: 'staff1',
        staff_name: 'Staff One',
        verification_method: 'code',
        created_at: clock.now(),
      },
    ]);
    const history = await app.orders.getStatusHistory(seeded.id);
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ from_status: 'ready', to_status: 'verified', actor_id: 'staff1', actor_role: 'staff' });
  });

  it('reports an unknown code', async () => {
    const { app } = buildTestApp();

    await expect(app.verification.verifyByCode('NOPE99', 'staff1', 'Staff One')).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('requires staff identity', async () => {
    const { app, store } = buildTestApp();
    await seedOrder(store, { verification_code: 'ABC123' });

    await expect(app.verification.verifyByCode('ABC123', '', 'Staff One')).rejects.toBeInstanceOf(ValidationError);
  });

  it('refuses a second redemption', async () => {
    const { app, store } = buildTestApp();
    await seedOrder(store, { verification_code: 'ABC123' });
    await app.verification.verifyByCode('ABC123', 'staff1', 'Staff One');

    await expect(app.verification.verifyByCode('ABC123', 'staff2', 'Staff Two')).rejects.toThrow(InvalidStateError);
    expect(store.listAllVerificationRecords()).toHaveLength(1);
  });

  it('lets exactly one of two concurrent redemptions win', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { verification_code: 'ABC123' });

    const results = await Promise.allSettled([
      app.verification.verifyByCode('ABC123', 'staff1', 'Staff One'),
      app.verification.verifyByCode('ABC123', 'staff2', 'Staff Two'),
    ]);

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(InvalidStateError);
    expect(store.listAllVerificationRecords()).toHaveLength(1);
    expect(await app.orders.getStatusHistory(seeded.id)).toHaveLength(1);
  });

  it('only redeems configured statuses', async () => {
    const { app, store } = buildTestApp({ env: { REDEEMABLE_STATUSES: 'ready' } });
    await seedOrder(store, { status: 'confirmed', verification_code: 'EARLY1' });

    await expect(app.verification.verifyByCode('EARLY1', 'staff1', 'Staff One')).rejects.toThrow(
      "cannot be redeemed in status 'confirmed'",
    );
  });

  it('redeems a pending order under the default policy', async () => {
    const { app, store } = buildTestApp();
    await seedOrder(store, { status: 'pending', verification_code: 'EARLY2' });

    const order = await app.verification.verifyByCode('EARLY2', 'staff1', 'Staff One');

    expect(order.status).toBe('verified');
  });
});

describe('VerificationService.verifyByQR', () => {
  it('redeems through an encoded payload', async () => {
    const { app, store } = buildTestApp();
    await seedOrder(store, { verification_code: 'QR7788' });

    const order = await app.verification.verifyByQR(encodeQrPayload('QR7788'), 'staff1', 'Staff One');

    expect(order.status).toBe('verified');
    expect(store.listAllVerificationRecords()[0].verification_method).toBe('qr');
  });

  it('rejects a malformed payload before touching any order', async () => {
    const { app, store } = buildTestApp();
    await seedOrder(store, { verification_code: 'QR7788' });

    await expect(app.verification.verifyByQR('%%%', 'staff1', 'Staff One')).rejects.toBeInstanceOf(ValidationError);
    expect(store.listAllVerificationRecords()).toEqual([]);
  });
});

describe('VerificationService.batchVerify', () => {
  it('isolates each order', async () => {
    const { app, store } = buildTestApp();
    const first = await seedOrder(store);
    const done = await seedOrder(store, { status: 'completed' });
    const second = await seedOrder(store);

    const result = await app.verification.batchVerify([first.id, done.id, 'missing', second.id], 'staff1', 'Staff One');

    expect(result.succeeded.map((entry) => entry.order_id)).toEqual([first.id, second.id]);
    expect(result.succeeded[0].order.status).toBe('verified');
    expect(result.failed.map(({ order_id, error_code }) => ({ order_id, error_code }))).toEqual([
      { order_id: done.id, error_code: 'INVALID_STATE' },
      { order_id: 'missing', error_code: 'NOT_FOUND' },
    ]);
    expect(store.listAllVerificationRecords().map((record) => record.verification_method)).toEqual(['batch', 'batch']);
  });

  it('reports a blank id as its own failure and still redeems the rest', async () => {
    const { app, store } = buildTestApp();
    const ready = await seedOrder(store);

    const result = await app.verification.batchVerify([ready.id, '   '], 'staff1', 'Staff One');

    expect(result.succeeded.map((entry) => entry.order_id)).toEqual([ready.id]);
    expect(result.failed).toEqual([
      { order_id: '   ', error_code: 'VALIDATION_ERROR', reason: 'Order ID không hợp lệ' },
    ]);
    expect((await app.orders.getOrder(ready.id)).status).toBe('verified');
  });
});

describe('VerificationService reporting', () => {
  it('aggregates redemptions per staff member', async () => {
    const { app, store, clock } = buildTestApp();
    await seedOrder(store, { verification_code: 'STAT01', final_amount: 50000, total_amount: 50000 });
    await seedOrder(store, { verification_code: 'STAT02' });
    await seedOrder(store, { verification_code: 'STAT03' });
    await seedOrder(store, { merchant_id: 'M2', verification_code: 'STAT04' });

    await app.verification.verifyByCode('STAT01', 'staff1', 'Staff One');
    await app.verification.verifyByCode('STAT02', 'staff2', 'Staff Two');
    await app.verification.verifyByCode('STAT03', 'staff2', 'Staff Two');
    await app.verification.verifyByCode('STAT04', 'staff1', 'Staff One');
    clock.advance(60_000);

    await expect(app.verification.getStaffVerificationStats('M1', 7)).resolves.toEqual([
      { staff_id: 'staff2', staff_name: 'Staff Two', verification_count: 2, redeemed_amount: 200000 },
      { staff_id: 'staff1', staff_name: 'Staff One', verification_count: 1, redeemed_amount: 50000 },
    ]);

    const records = await app.verification.listVerificationRecords(
      'M1',
      new Date('2026-10-19T00:00:00.000Z'),
      new Date('2026-10-20T00:00:00.000Z'),
    );
    expect(records).toHaveLength(3);
  });
});
