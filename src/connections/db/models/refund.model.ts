// Refund ledger - tạo khi request, cập nhật khi approve/reject, không bao giờ xóa

import type { OrderStatus, RefundStatus } from '../../../constants';

export interface RefundRecord {
  id: string;
  refund_number: string; // REF identifier
  order_id: string;
  merchant_id: string;
  amount: number;
  reason: string;
  explanation: string | null;
  evidence: string[] | null;
  pre_refund_status: OrderStatus;
  status: RefundStatus;
  processed_by: string | null;
  reject_reason: string | null;
  requested_at: Date;
  processed_at: Date | null;
}

export interface CloseRefundInput {
  order_id: string;
  status: Exclude<RefundStatus, 'requested'>;
  processed_by: string;
  reject_reason: string | null;
  processed_at: Date;
}
