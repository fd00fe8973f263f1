import type { PaymentMethod } from '../../../constants';
import type { BusinessDate } from '../../../utils/date';

export interface PaymentBreakdownEntry {
  count: number;
  amount: number;
}

export type PaymentBreakdown = Partial<Record<PaymentMethod, PaymentBreakdownEntry>>;

// Unique (merchant_id, business_date)
export interface FinanceDailySummary {
  merchant_id: string;
  business_date: BusinessDate;
  order_count: number;
  total_income: number;
  discount_total: number;
  platform_fee: number;
  refund_count: number;
  refund_amount: number;
  net_income: number;
  payment_breakdown: PaymentBreakdown;
  currency: string;
  generated_at: Date;
}
