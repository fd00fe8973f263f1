import {
  ORDER_STATUS,
  PAYMENT_STATUS,
  RECONCILIATION_STATUS,
  SETTLEMENT_STATUS,
} from '../../constants';
import type { PaymentStatus } from '../../constants';
import type { Redemption } from '../../connections/db/datastore';
import type {
  FinanceDailySummary,
  Order,
  PaymentBreakdown,
  ReconciliationResult,
  SettlementRecord,
} from '../../connections/db/models';
import type { BusinessDate, BusinessPeriod } from '../../utils/date';

// Thanh toán đã hoàn tiền được tính vào refund_amount, không phải sai lệch
const SETTLED_PAYMENT_STATUSES: readonly PaymentStatus[] = [PAYMENT_STATUS.PAID, PAYMENT_STATUS.REFUNDED];

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

export const platformFee = (income: number, commissionRate: number): number => Math.round(income * commissionRate);

export const paymentBreakdown = (orders: Order[]): PaymentBreakdown => {
  const breakdown: PaymentBreakdown = {};
  for (const order of orders) {
    const entry = breakdown[order.payment_method] ?? { count: 0, amount: 0 };
    entry.count += 1;
    entry.amount += order.final_amount;
    breakdown[order.payment_method] = entry;
  }
  return breakdown;
};

export interface DailySummaryInput {
  merchantId: string;
  businessDate: BusinessDate;
  redemptions: Redemption[];
  /** Orders refunded during the day (status refunded). */
  refundedOrders: Order[];
  commissionRate: number;
  currency: string;
  generatedAt: Date;
}

/**
 * Income is recognized at redemption. Chỉ refund của đơn đã redeem (pre_refund_status
 * = verified) mới trừ vào doanh thu; đơn chưa redeem chưa từng được tính.
 * Returns null when the day has no activity.
 */
export const summarizeDay = (input: DailySummaryInput): FinanceDailySummary | null => {
  const redeemed = input.redemptions.map(({ order }) => order);
  const refunds = input.refundedOrders.filter(
    (order) => order.status === ORDER_STATUS.REFUNDED && order.pre_refund_status === ORDER_STATUS.VERIFIED,
  );

  if (redeemed.length === 0 && refunds.length === 0) {
    return null;
  }

  const totalIncome = sum(redeemed.map((order) => order.final_amount));
  const fee = platformFee(totalIncome, input.commissionRate);
  const refundAmount = sum(refunds.map((order) => order.final_amount));

  return {
    merchant_id: input.merchantId,
    business_date: input.businessDate,
    order_count: redeemed.length,
    total_income: totalIncome,
    discount_total: sum(redeemed.map((order) => order.discount_amount)),
    platform_fee: fee,
    refund_count: refunds.length,
    refund_amount: refundAmount,
    net_income: totalIncome - fee - refundAmount,
    payment_breakdown: paymentBreakdown(redeemed),
    currency: input.currency,
    generated_at: input.generatedAt,
  };
};

export interface SettlementInput {
  merchantId: string;
  period: BusinessPeriod;
  summaries: FinanceDailySummary[];
  settlementNumber: () => string;
  currency: string;
  generatedAt: Date;
}

/**
 * Returns null when there is nothing to settle.
 */
export const settlePeriod = (input: SettlementInput): SettlementRecord | null => {
  const gross = sum(input.summaries.map((summary) => summary.total_income));
  const refundAmount = sum(input.summaries.map((summary) => summary.refund_amount));

  if (input.summaries.length === 0 || (gross === 0 && refundAmount === 0)) {
    return null;
  }

  const commission = sum(input.summaries.map((summary) => summary.platform_fee));

  return {
    settlement_number: input.settlementNumber(),
    merchant_id: input.merchantId,
    period_start: input.period.start,
    period_end: input.period.end,
    order_count: sum(input.summaries.map((summary) => summary.order_count)),
    gross_amount: gross,
    commission,
    refund_amount: refundAmount,
    net_payable: gross - commission - refundAmount,
    currency: input.currency,
    status: SETTLEMENT_STATUS.PENDING,
    generated_at: input.generatedAt,
  };
};

export interface ReconciliationInput {
  merchantId: string;
  businessDate: BusinessDate;
  summary: FinanceDailySummary | null;
  redemptions: Redemption[];
  generatedAt: Date;
}

/**
 * So sánh tổng đã ghi trong daily summary với tổng tính lại từ verification records.
 * Returns null when there is neither a summary nor any redemption.
 */
export const reconcileDay = (input: ReconciliationInput): ReconciliationResult | null => {
  if (!input.summary && input.redemptions.length === 0) {
    return null;
  }

  const expected = input.summary?.total_income ?? 0;
  const actual = sum(input.redemptions.map(({ order }) => order.final_amount));
  const discrepancy = expected - actual;
  const mismatched = input.redemptions
    .filter(({ order }) => !SETTLED_PAYMENT_STATUSES.includes(order.payment_status))
    .map(({ order }) => order.order_number);

  const notes: string[] = [];
  if (discrepancy !== 0) {
    notes.push(`Summary total differs from redemptions by ${discrepancy}`);
  }
  if (mismatched.length > 0) {
    notes.push(`${mismatched.length} redeemed order(s) not marked paid or refunded`);
  }

  return {
    merchant_id: input.merchantId,
    business_date: input.businessDate,
    expected_total: expected,
    actual_total: actual,
    discrepancy,
    mismatched_orders: mismatched,
    status: discrepancy === 0 && mismatched.length === 0
      ? RECONCILIATION_STATUS.MATCHED
      : RECONCILIATION_STATUS.MISMATCHED,
    notes: notes.length > 0 ? notes.join('; ') : null,
    generated_at: input.generatedAt,
  };
};
