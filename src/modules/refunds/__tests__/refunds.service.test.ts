import { describe, expect, it } from 'vitest';
import { buildTestApp, seedOrder } from '../../../__tests__/helpers';
import { InvalidStateError, ValidationError } from '../../../utils/errors';

const verifiedAt = new Date('2026-10-19T02:30:00.000Z');

describe('RefundService', () => {
  it('requests a refund for a redeemed order and opens a ledger row', async () => {
    const { app, store, clock } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'verified', verified_at: verifiedAt });

    const order = await app.refunds.requestRefund(seeded.id, 'Món bị nguội', 'Giao trễ 40 phút', ['photo-1.jpg']);

    expect(order).toMatchObject({
      status: 'refunding',
      pre_refund_status: 'verified',
      refund_reason: 'Món bị nguội',
      refund_explanation: 'Giao trễ 40 phút',
      refund_evidence: ['photo-1.jpg'],
      refund_requested_at: clock.now(),
    });
    const ledger = await app.refunds.getRefundLedger(seeded.id);
    expect(ledger).toHaveLength(1);
    expect(ledger[0]).toMatchObject({
      order_id: seeded.id,
      merchant_id: 'M1',
      amount: 100000,
      reason: 'Món bị nguội',
      pre_refund_status: 'verified',
      status: 'requested',
      processed_by: null,
    });
    expect(ledger[0].refund_number).toMatch(/^REF\d{19}$/);
    const history = await app.orders.getStatusHistory(seeded.id);
    expect(history[0]).toMatchObject({ actor_id: 'U1', actor_role: 'customer', reason: 'Món bị nguội' });
  });

  it('restores the redeemed status on rejection', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'verified', verified_at: verifiedAt });
    await app.refunds.requestRefund(seeded.id, 'Món bị nguội');

    const order = await app.refunds.rejectRefund(seeded.id, 'Không đủ bằng chứng', 'admin1');

    expect(order).toMatchObject({
      status: 'verified',
      pre_refund_status: null,
      refund_reject_reason: 'Không đủ bằng chứng',
      refund_processed_by: 'admin1',
      verified_at: verifiedAt,
    });
    const [row] = await app.refunds.getRefundLedger(seeded.id);
    expect(row).toMatchObject({ status: 'rejected', processed_by: 'admin1', reject_reason: 'Không đủ bằng chứng' });
    expect(store.listAllVerificationRecords()).toEqual([]);
  });

  it('restores pending for an order refunded before redemption', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'pending' });
    await app.refunds.requestRefund(seeded.id, 'Đổi ý');

    const order = await app.refunds.rejectRefund(seeded.id, 'Quá hạn', 'admin1');

    expect(order.status).toBe('pending');
    const history = await app.orders.getStatusHistory(seeded.id);
    expect(history.map((row) => row.to_status)).toEqual(['refunding', 'pending']);
  });

  it('approves a refund and marks the payment refunded', async () => {
    const { app, store, clock } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'verified', verified_at: verifiedAt });
    await app.refunds.requestRefund(seeded.id, 'Món bị nguội');

    const order = await app.refunds.approveRefund(seeded.id, 'admin1');

    expect(order).toMatchObject({
      status: 'refunded',
      payment_status: 'refunded',
      refunded_at: clock.now(),
      refund_processed_by: 'admin1',
      pre_refund_status: 'verified',
    });
    const [row] = await app.refunds.getRefundLedger(seeded.id);
    expect(row).toMatchObject({ status: 'approved', processed_by: 'admin1', processed_at: clock.now() });
  });

  it('leaves an unpaid order unpaid on approval', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'pending', payment_status: 'pending', paid_at: null });
    await app.refunds.requestRefund(seeded.id, 'Đổi ý');

    const order = await app.refunds.approveRefund(seeded.id, 'admin1');

    expect(order.payment_status).toBe('pending');
  });

  it('refuses a refund for a completed order and leaves it untouched', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'completed', verified_at: verifiedAt });

    await expect(app.refunds.requestRefund(seeded.id, 'Món bị nguội')).rejects.toBeInstanceOf(InvalidStateError);
    await expect(app.orders.getOrder(seeded.id)).resolves.toEqual(seeded);
    expect(await app.refunds.getRefundLedger(seeded.id)).toEqual([]);
  });

  it('requires a refund reason', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'verified', verified_at: verifiedAt });

    await expect(app.refunds.requestRefund(seeded.id, '  ')).rejects.toBeInstanceOf(ValidationError);
  });

  it('requires a rejection reason', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'verified', verified_at: verifiedAt });
    await app.refunds.requestRefund(seeded.id, 'Món bị nguội');

    await expect(app.refunds.rejectRefund(seeded.id, '', 'admin1')).rejects.toBeInstanceOf(ValidationError);
    expect((await app.orders.getOrder(seeded.id)).status).toBe('refunding');
  });

  it('only decides orders that are refunding', async () => {
    const { app, store } = buildTestApp();
    const seeded = await seedOrder(store, { status: 'verified', verified_at: verifiedAt });

    await expect(app.refunds.approveRefund(seeded.id, 'admin1')).rejects.toBeInstanceOf(InvalidStateError);
    await expect(app.refunds.rejectRefund(seeded.id, 'Không hợp lệ', 'admin1')).rejects.toBeInstanceOf(
      InvalidStateError,
    );
  });

  it('infers the restore target for rows without a stored pre-refund status', async () => {
    const { app, store } = buildTestApp();
    const redeemed = await seedOrder(store, {
      status: 'refunding',
      pre_refund_status: null,
      verified_at: verifiedAt,
      refund_reason: 'Món bị nguội',
    });
    const unredeemed = await seedOrder(store, { status: 'refunding', pre_refund_status: null, refund_reason: 'Đổi ý' });

    await expect(app.refunds.rejectRefund(redeemed.id, 'Không hợp lệ', 'admin1')).resolves.toMatchObject({
      status: 'verified',
    });
    await expect(app.refunds.rejectRefund(unredeemed.id, 'Không hợp lệ', 'admin1')).resolves.toMatchObject({
      status: 'pending',
    });
  });

  it('summarizes refunds per merchant', async () => {
    const { app, store } = buildTestApp();
    const approved = await seedOrder(store, { status: 'verified', verified_at: verifiedAt });
    const rejected = await seedOrder(store, { status: 'pending' });
    const open = await seedOrder(store, { status: 'verified', verified_at: verifiedAt, final_amount: 80000, discount_amount: 20000 });
    await app.refunds.requestRefund(approved.id, 'Món bị nguội');
    await app.refunds.requestRefund(rejected.id, 'Đổi ý');
    await app.refunds.requestRefund(open.id, 'Món bị nguội');
    await app.refunds.approveRefund(approved.id, 'admin1');
    await app.refunds.rejectRefund(rejected.id, 'Quá hạn', 'admin1');

    await expect(app.refunds.getRefundStats('M1', 30)).resolves.toEqual({
      merchant_id: 'M1',
      days: 30,
      pending_count: 1,
      refunded_count: 1,
      refunded_amount: 100000,
      rejected_count: 1,
      reasons: { 'Món bị nguội': 2, 'Đổi ý': 1 },
    });
    expect((await app.refunds.listPendingRefunds('M1')).map((order) => order.id)).toEqual([open.id]);
  });

  it('counts reasons that collide with object property names', async () => {
    const { app, store } = buildTestApp();
    const first = await seedOrder(store, { status: 'pending' });
    const second = await seedOrder(store, { status: 'pending' });
    const third = await seedOrder(store, { status: 'pending' });
    await app.refunds.requestRefund(first.id, 'constructor');
    await app.refunds.requestRefund(second.id, 'constructor');
    await app.refunds.requestRefund(third.id, '__proto__');

    const stats = await app.refunds.getRefundStats('M1', 30);

    expect(Object.entries(stats.reasons)).toEqual([
      ['constructor', 2],
      ['__proto__', 1],
    ]);
  });
});
