import { describe, expect, it } from 'vitest';
import { InvalidStateError } from '../utils/errors';
import { buildTestApp, seedOrder } from './helpers';

describe('order lifecycle scenarios', () => {
  it('redeems, refunds and settles the refund of an order', async () => {
    const { app, store, clock } = buildTestApp();
    await seedOrder(store, {
      id: 'O1',
      status: 'pending',
      total_amount: 150000,
      final_amount: 150000,
      verification_code: 'ABC123',
    });

    const verified = await app.verification.verifyByCode('ABC123', 'staff1', 'Staff One');
    expect(verified.status).toBe('verified');
    expect(store.listAllVerificationRecords()).toHaveLength(1);

    const refunding = await app.refunds.requestRefund('O1', 'quality issue');
    expect(refunding.status).toBe('refunding');

    clock.advance(5 * 60_000);
    const refunded = await app.refunds.approveRefund('O1', 'admin1');
    expect(refunded.status).toBe('refunded');
    expect(refunded.refunded_at).toEqual(new Date('2026-10-19T03:05:00.000Z'));
    expect(refunded.refund_processed_by).toBe('admin1');

    const history = await app.orders.getStatusHistory('O1');
    expect(history.map((row) => `${row.from_status}->${row.to_status}`)).toEqual([
      'pending->verified',
      'verified->refunding',
      'refunding->refunded',
    ]);
  });

  it('refuses to refund a completed order', async () => {
    const { app, store } = buildTestApp();
    await seedOrder(store, { id: 'O1', verification_code: 'ABC123', total_amount: 150000, final_amount: 150000 });
    await app.verification.verifyByCode('ABC123', 'staff1', 'Staff One');
    await app.orders.transition('O1', 'completed', { id: 'merchant-1', role: 'merchant' });

    await expect(app.refunds.requestRefund('O1', 'wrong item')).rejects.toBeInstanceOf(InvalidStateError);
    expect((await app.orders.getOrder('O1')).status).toBe('completed');
  });

  it('carries a business day from redemption through settlement', async () => {
    const { app, store, clock } = buildTestApp();
    await seedOrder(store, { verification_code: 'DAYA01', total_amount: 120000, final_amount: 120000 });
    const small = await seedOrder(store, {
      verification_code: 'DAYB01',
      total_amount: 30000,
      final_amount: 30000,
      payment_method: 'cash',
    });

    await app.verification.verifyByCode('DAYA01', 'staff1', 'Staff One');
    await app.verification.verifyByCode('DAYB01', 'staff1', 'Staff One');
    await app.refunds.requestRefund(small.id, 'Món bị nguội');
    await app.refunds.approveRefund(small.id, 'admin1');

    clock.set('2026-10-20T03:00:00.000Z');
    const summaryRun = await app.financeJobs.runDailySummary();
    expect(summaryRun).toMatchObject({ job: 'daily-summary', period: '2026-10-19', success_count: 1, error_count: 0 });
    await expect(store.finance.findDailySummary('M1', '2026-10-19')).resolves.toMatchObject({
      order_count: 2,
      total_income: 150000,
      platform_fee: 3000,
      refund_count: 1,
      refund_amount: 30000,
      net_income: 117000,
      payment_breakdown: { momo: { count: 1, amount: 120000 }, cash: { count: 1, amount: 30000 } },
    });

    await app.financeJobs.runDailyReconciliation();
    await expect(store.finance.findReconciliationLog('M1', '2026-10-19')).resolves.toMatchObject({
      expected_total: 150000,
      actual_total: 150000,
      discrepancy: 0,
      mismatched_orders: [],
      status: 'matched',
      notes: null,
    });

    clock.set('2026-10-26T03:00:00.000Z');
    const settlementRun = await app.financeJobs.runWeeklySettlement();
    expect(settlementRun.period).toBe('2026-10-19..2026-10-25');
    const settlement = await store.finance.findSettlement('M1', { start: '2026-10-19', end: '2026-10-25' });
    expect(settlement).toMatchObject({
      order_count: 2,
      gross_amount: 150000,
      commission: 3000,
      refund_amount: 30000,
      net_payable: 117000,
      status: 'pending',
    });
    expect(settlement?.settlement_number).toMatch(/^SET\d{19}$/);
  });
});
