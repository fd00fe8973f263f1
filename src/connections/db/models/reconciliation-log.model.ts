import type { ReconciliationStatus } from '../../../constants';
import type { BusinessDate } from '../../../utils/date';

// Unique (merchant_id, business_date)
export interface ReconciliationLog {
  merchant_id: string;
  business_date: BusinessDate;
  expected_total: number;
  actual_total: number;
  discrepancy: number; // expected_total - actual_total
  mismatched_orders: string[]; // order_number
  status: ReconciliationStatus;
  notes: string | null;
  generated_at: Date;
  // Merchant dispute: order_number đã được xử lý, không bị ghi đè khi job chạy lại
  resolved_orders: string[];
  dispute_reason: string | null;
  disputed_at: Date | null;
}

/** What a reconciliation run computes; the dispute columns belong to the merchant. */
export type ReconciliationResult = Omit<ReconciliationLog, 'resolved_orders' | 'dispute_reason' | 'disputed_at'>;

export interface ReconciliationDispute {
  merchant_id: string;
  business_date: BusinessDate;
  order_numbers: string[];
  reason: string;
  disputed_at: Date;
}
