import type { SettlementStatus } from '../../../constants';
import type { BusinessDate } from '../../../utils/date';

// Unique (merchant_id, period_start, period_end); không ghi đè khi chạy lại
export interface SettlementRecord {
  settlement_number: string; // SET identifier
  merchant_id: string;
  period_start: BusinessDate;
  period_end: BusinessDate;
  order_count: number;
  gross_amount: number;
  commission: number;
  refund_amount: number;
  net_payable: number;
  currency: string;
  status: SettlementStatus;
  generated_at: Date;
}
