import { describe, expect, it } from 'vitest';
import { ManualClock, buildTestApp, seedOrder } from '../../../__tests__/helpers';
import type { ReconciliationResult } from '../../../connections/db/models';
import { InvalidStateError, NotFoundError, ValidationError } from '../../../utils/errors';

const reconciliation = (overrides: Partial<ReconciliationResult> = {}): ReconciliationResult => ({
  merchant_id: 'M1',
  business_date: '2026-10-18',
  expected_total: 300000,
  actual_total: 300000,
  discrepancy: 0,
  mismatched_orders: ['ORD-A', 'ORD-B'],
  status: 'mismatched',
  notes: '2 redeemed order(s) not marked paid or refunded',
  generated_at: new Date('2026-10-19T03:00:00.000Z'),
  ...overrides,
});

describe('ReconciliationService.disputeReconciliation', () => {
  it('records the disputed orders that the log lists as mismatched', async () => {
    const { app, store } = buildTestApp({ clock: new ManualClock('2026-10-19T05:00:00.000Z') });
    await store.finance.upsertReconciliationLog(reconciliation());

    const updated = await app.reconciliation.disputeReconciliation(
      'M1',
      '2026-10-18',
      ['ORD-B', 'ORD-OTHER', 'ORD-B'],
      'Khách đã trả tiền mặt',
    );

    expect(updated).toMatchObject({
      resolved_orders: ['ORD-B'],
      dispute_reason: 'Khách đã trả tiền mặt',
      disputed_at: new Date('2026-10-19T05:00:00.000Z'),
      mismatched_orders: ['ORD-A', 'ORD-B'],
    });
    await expect(app.reconciliation.getReconciliationLog('M1', '2026-10-18')).resolves.toEqual(updated);
  });

  it('merges a later dispute into the resolved orders', async () => {
    const { app, store } = buildTestApp();
    await store.finance.upsertReconciliationLog(reconciliation());

    await app.reconciliation.disputeReconciliation('M1', '2026-10-18', ['ORD-B'], 'Đã thu tiền');
    const updated = await app.reconciliation.disputeReconciliation('M1', '2026-10-18', ['ORD-A', 'ORD-B'], 'Đã đối chiếu');

    expect(updated.resolved_orders).toEqual(['ORD-A', 'ORD-B']);
    expect(updated.dispute_reason).toBe('Đã đối chiếu');
  });

  it('refuses a log that is not mismatched', async () => {
    const { app, store } = buildTestApp();
    await store.finance.upsertReconciliationLog(reconciliation({ mismatched_orders: [], status: 'matched', notes: null }));

    await expect(
      app.reconciliation.disputeReconciliation('M1', '2026-10-18', ['ORD-A'], 'Đã thu tiền'),
    ).rejects.toBeInstanceOf(InvalidStateError);
    await expect(store.finance.findReconciliationLog('M1', '2026-10-18')).resolves.toMatchObject({
      resolved_orders: [],
      dispute_reason: null,
    });
  });

  it('refuses orders that are not in the mismatch list', async () => {
    const { app, store } = buildTestApp();
    await store.finance.upsertReconciliationLog(reconciliation());

    await expect(
      app.reconciliation.disputeReconciliation('M1', '2026-10-18', ['ORD-OTHER'], 'Đã thu tiền'),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(store.finance.findReconciliationLog('M1', '2026-10-18')).resolves.toMatchObject({ resolved_orders: [] });
  });

  it('validates the request and reports a missing log', async () => {
    const { app } = buildTestApp();

    await expect(app.reconciliation.disputeReconciliation('M1', '2026-10-18', ['ORD-A'], 'Đã thu tiền')).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(app.reconciliation.disputeReconciliation('M1', '2026-02-30', ['ORD-A'], 'Đã thu tiền')).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(app.reconciliation.disputeReconciliation('M1', '2026-10-18', [], 'Đã thu tiền')).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(app.reconciliation.disputeReconciliation('M1', '2026-10-18', ['ORD-A'], '  ')).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('keeps resolved orders when the reconciliation job runs again', async () => {
    const { app, store, clock } = buildTestApp();
    await seedOrder(store, {
      order_number: 'ORD-RECON1',
      verification_code: 'REC003',
      payment_status: 'pending',
      paid_at: null,
    });
    await app.verification.verifyByCode('REC003', 'staff1', 'Staff One');
    clock.set('2026-10-20T03:00:00.000Z');
    await app.financeJobs.runDailySummary();
    await app.financeJobs.runDailyReconciliation();

    await app.reconciliation.disputeReconciliation('M1', '2026-10-19', ['ORD-RECON1'], 'Đã thu tiền mặt');
    clock.advance(60_000);
    await app.financeJobs.runDailyReconciliation();

    await expect(store.finance.findReconciliationLog('M1', '2026-10-19')).resolves.toMatchObject({
      mismatched_orders: ['ORD-RECON1'],
      status: 'mismatched',
      resolved_orders: ['ORD-RECON1'],
      dispute_reason: 'Đã thu tiền mặt',
      generated_at: new Date('2026-10-20T03:01:00.000Z'),
    });
  });
});
