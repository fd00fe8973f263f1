import type { OrderStatus } from '../../constants';
import type { BusinessDate, BusinessPeriod, DateRange } from '../../utils/date';
import type {
  CloseRefundInput,
  CreateOrderStatusHistoryInput,
  CreateVerificationRecordInput,
  FinanceDailySummary,
  Merchant,
  Order,
  OrderStatusHistory,
  ReconciliationDispute,
  ReconciliationLog,
  ReconciliationResult,
  RefundRecord,
  ReportExport,
  SettlementRecord,
  VerificationRecord,
} from './models';

/**
 * Columns an order write may change. Amounts, items, verification code and
 * ownership are fixed at creation.
 */
export type OrderUpdate = Pick<
  Order,
  | 'id'
  | 'order_number'
  | 'status'
  | 'payment_method'
  | 'payment_status'
  | 'version'
  | 'pre_refund_status'
  | 'refund_reason'
  | 'refund_explanation'
  | 'refund_evidence'
  | 'refund_requested_at'
  | 'refund_processed_at'
  | 'refund_processed_by'
  | 'refund_reject_reason'
  | 'cancellation_reason'
  | 'cancelled_by'
  | 'paid_at'
  | 'verified_at'
  | 'completed_at'
  | 'cancelled_at'
  | 'refunded_at'
  | 'updated_at'
>;

/**
 * One atomic write of an order: the new order state plus the rows that must
 * land with it. Applied only if the stored version still equals `expectedVersion`.
 */
export interface OrderWrite {
  order: OrderUpdate;
  expectedVersion: number;
  history?: CreateOrderStatusHistoryInput;
  verificationRecord?: CreateVerificationRecordInput;
  openRefund?: Omit<RefundRecord, 'id'>;
  closeRefund?: CloseRefundInput;
}

export interface Redemption {
  record: VerificationRecord;
  order: Order;
}

export interface OrderListFilter {
  statuses?: readonly OrderStatus[];
}

export interface OrderRepository {
  /** Throws ConflictError when id, order_number or verification_code already exists. */
  insert(order: Order): Promise<void>;
  findById(id: string): Promise<Order | null>;
  findByVerificationCode(code: string): Promise<Order | null>;
  /** Returns false when the version check fails; nothing is written in that case. */
  save(write: OrderWrite): Promise<boolean>;
  listByMerchant(merchantId: string, filter?: OrderListFilter): Promise<Order[]>;
  listStatusHistory(orderId: string): Promise<OrderStatusHistory[]>;
}

export interface VerificationRecordRepository {
  listRedemptions(merchantId: string, range: DateRange): Promise<Redemption[]>;
}

export interface RefundRepository {
  listByOrder(orderId: string): Promise<RefundRecord[]>;
  listByMerchant(merchantId: string, since: Date): Promise<RefundRecord[]>;
}

export interface SettlementInsertResult {
  record: SettlementRecord;
  created: boolean;
}

export interface FinanceRepository {
  /** Orders in `refunded` whose refunded_at falls in the range. */
  listRefundedOrders(merchantId: string, range: DateRange): Promise<Order[]>;
  upsertDailySummary(summary: FinanceDailySummary): Promise<FinanceDailySummary>;
  findDailySummary(merchantId: string, businessDate: BusinessDate): Promise<FinanceDailySummary | null>;
  listDailySummaries(merchantId: string, period: BusinessPeriod): Promise<FinanceDailySummary[]>;
  /** Keeps an existing record for the same (merchant, period) untouched. */
  insertSettlementIfAbsent(record: SettlementRecord): Promise<SettlementInsertResult>;
  findSettlement(merchantId: string, period: BusinessPeriod): Promise<SettlementRecord | null>;
  /** Replaces the computed columns; resolved_orders and the dispute fields are kept. */
  upsertReconciliationLog(log: ReconciliationResult): Promise<ReconciliationLog>;
  findReconciliationLog(merchantId: string, businessDate: BusinessDate): Promise<ReconciliationLog | null>;
  /** Merges order_numbers into resolved_orders; null when the log does not exist. */
  resolveReconciliationOrders(dispute: ReconciliationDispute): Promise<ReconciliationLog | null>;
}

export interface MerchantRepository {
  listActive(): Promise<Merchant[]>;
}

export interface ReportExportRepository {
  listExpired(now: Date): Promise<ReportExport[]>;
  delete(id: string): Promise<void>;
}

export interface DataStore {
  readonly kind: 'postgres' | 'memory';
  readonly orders: OrderRepository;
  readonly verificationRecords: VerificationRecordRepository;
  readonly refunds: RefundRepository;
  readonly finance: FinanceRepository;
  readonly merchants: MerchantRepository;
  readonly reportExports: ReportExportRepository;
  close(): Promise<void>;
}
