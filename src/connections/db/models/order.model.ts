// Order Model

import type {
  OrderStatus,
  PaymentMethod,
  PaymentStatus,
} from '../../../constants';
import type { OrderItem } from './order-item.model';

export interface Order {
  id: string; // UUID
  order_number: string; // ORD identifier - unique
  merchant_id: string;
  store_id: string | null;
  user_id: string;
  status: OrderStatus;
  // Tiền tệ: số nguyên theo đơn vị nhỏ nhất (VND không có xu)
  total_amount: number;
  discount_amount: number;
  final_amount: number; // total_amount - discount_amount
  currency: string;
  payment_method: PaymentMethod;
  payment_status: PaymentStatus;
  verification_code: string; // unique, immutable
  items: OrderItem[];
  version: number; // optimistic concurrency
  // Refund
  pre_refund_status: OrderStatus | null;
  refund_reason: string | null;
  refund_explanation: string | null;
  refund_evidence: string[] | null;
  refund_requested_at: Date | null;
  refund_processed_at: Date | null;
  refund_processed_by: string | null;
  refund_reject_reason: string | null;
  // Hủy đơn hàng
  cancellation_reason: string | null;
  cancelled_by: string | null;
  // Timestamps
  created_at: Date;
  paid_at: Date | null;
  verified_at: Date | null;
  completed_at: Date | null;
  cancelled_at: Date | null;
  refunded_at: Date | null;
  updated_at: Date;
}

export interface CreateOrderItemInput {
  product_id: string;
  product_name: string;
  unit_price: number;
  quantity: number;
}

export interface CreateOrderInput {
  merchant_id: string; // REQUIRED
  store_id?: string | null;
  user_id: string; // REQUIRED
  items: CreateOrderItemInput[]; // REQUIRED - ít nhất 1
  discount_amount?: number; // default: 0
  currency?: string; // default: config.finance.currency
  payment_method: PaymentMethod; // REQUIRED
  payment_status?: PaymentStatus; // default: 'pending'
}
