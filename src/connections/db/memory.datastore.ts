import { v4 as uuidv4 } from 'uuid';
import { MERCHANT_STATUS, ORDER_STATUS, REFUND_STATUS } from '../../constants';
import { ConflictError } from '../../utils/errors';
import type { BusinessDate, BusinessPeriod, DateRange } from '../../utils/date';
import type {
  DataStore,
  FinanceRepository,
  MerchantRepository,
  OrderListFilter,
  OrderRepository,
  OrderWrite,
  Redemption,
  RefundRepository,
  ReportExportRepository,
  SettlementInsertResult,
  VerificationRecordRepository,
} from './datastore';
import type {
  FinanceDailySummary,
  Merchant,
  Order,
  OrderStatusHistory,
  ReconciliationLog,
  RefundRecord,
  ReportExport,
  SettlementRecord,
  VerificationRecord,
} from './models';

const inRange = (value: Date, range: DateRange) =>
  value.getTime() >= range.start.getTime() && value.getTime() < range.end.getTime();

const dayKey = (merchantId: string, day: BusinessDate) => `${merchantId}|${day}`;
const periodKey = (merchantId: string, period: BusinessPeriod) => `${merchantId}|${period.start}|${period.end}`;

/**
 * In-process DataStore for tests and local runs.
 *
 * Mỗi thao tác ghi chạy đồng bộ từ lúc kiểm tra version tới lúc ghi xong
 * (không có await ở giữa), nên là một đơn vị nguyên tử trên event loop.
 * Dữ liệu luôn được clone khi đọc/ghi.
 */
export class MemoryDataStore implements DataStore {
  readonly kind = 'memory' as const;

  private readonly orderRows = new Map<string, Order>();
  private readonly historyRows: OrderStatusHistory[] = [];
  private readonly verificationRows: VerificationRecord[] = [];
  private readonly refundRows: RefundRecord[] = [];
  private readonly summaryRows = new Map<string, FinanceDailySummary>();
  private readonly settlementRows = new Map<string, SettlementRecord>();
  private readonly reconciliationRows = new Map<string, ReconciliationLog>();
  private readonly merchantRows = new Map<string, Merchant>();
  private readonly exportRows = new Map<string, ReportExport>();

  readonly orders: OrderRepository = {
    insert: async (order) => {
      for (const existing of this.orderRows.values()) {
        if (
          existing.id === order.id ||
          existing.order_number === order.order_number ||
          existing.verification_code === order.verification_code
        ) {
          throw new ConflictError(`Order ${order.order_number} trùng id, order_number hoặc verification_code`);
        }
      }
      this.orderRows.set(order.id, structuredClone(order));
    },

    findById: async (id) => {
      const order = this.orderRows.get(id);
      return order ? structuredClone(order) : null;
    },

    findByVerificationCode: async (code) => {
      for (const order of this.orderRows.values()) {
        if (order.verification_code === code) {
          return structuredClone(order);
        }
      }
      return null;
    },

    save: async (write) => this.applyOrderWrite(write),

    listByMerchant: async (merchantId, filter: OrderListFilter = {}) =>
      [...this.orderRows.values()]
        .filter((order) => order.merchant_id === merchantId)
        .filter((order) => !filter.statuses || filter.statuses.includes(order.status))
        .sort((a, b) => a.created_at.getTime() - b.created_at.getTime())
        .map((order) => structuredClone(order)),

    listStatusHistory: async (orderId) =>
      this.historyRows.filter((row) => row.order_id === orderId).map((row) => structuredClone(row)),
  };

  readonly verificationRecords: VerificationRecordRepository = {
    listRedemptions: async (merchantId, range) => {
      const redemptions: Redemption[] = [];
      for (const record of this.verificationRows) {
        const order = this.orderRows.get(record.order_id);
        if (record.merchant_id === merchantId && inRange(record.created_at, range) && order) {
          redemptions.push({ record: structuredClone(record), order: structuredClone(order) });
        }
      }
      return redemptions;
    },
  };

  readonly refunds: RefundRepository = {
    listByOrder: async (orderId) =>
      this.refundRows.filter((row) => row.order_id === orderId).map((row) => structuredClone(row)),

    listByMerchant: async (merchantId, since) =>
      this.refundRows
        .filter((row) => row.merchant_id === merchantId && row.requested_at.getTime() >= since.getTime())
        .map((row) => structuredClone(row)),
  };

  readonly finance: FinanceRepository = {
    listRefundedOrders: async (merchantId, range) =>
      [...this.orderRows.values()]
        .filter(
          (order) =>
            order.merchant_id === merchantId &&
            order.status === ORDER_STATUS.REFUNDED &&
            order.refunded_at !== null &&
            inRange(order.refunded_at, range),
        )
        .map((order) => structuredClone(order)),

    upsertDailySummary: async (summary) => {
      this.summaryRows.set(dayKey(summary.merchant_id, summary.business_date), structuredClone(summary));
      return structuredClone(summary);
    },

    findDailySummary: async (merchantId, businessDate) => {
      const row = this.summaryRows.get(dayKey(merchantId, businessDate));
      return row ? structuredClone(row) : null;
    },

    listDailySummaries: async (merchantId, period) =>
      [...this.summaryRows.values()]
        .filter(
          (row) =>
            row.merchant_id === merchantId &&
            row.business_date >= period.start &&
            row.business_date <= period.end,
        )
        .sort((a, b) => a.business_date.localeCompare(b.business_date))
        .map((row) => structuredClone(row)),

    insertSettlementIfAbsent: async (record): Promise<SettlementInsertResult> => {
      const key = periodKey(record.merchant_id, { start: record.period_start, end: record.period_end });
      const existing = this.settlementRows.get(key);
      if (existing) {
        return { record: structuredClone(existing), created: false };
      }
      this.settlementRows.set(key, structuredClone(record));
      return { record: structuredClone(record), created: true };
    },

    findSettlement: async (merchantId, period) => {
      const row = this.settlementRows.get(periodKey(merchantId, period));
      return row ? structuredClone(row) : null;
    },

    upsertReconciliationLog: async (log) => {
      const key = dayKey(log.merchant_id, log.business_date);
      const existing = this.reconciliationRows.get(key);
      const row: ReconciliationLog = {
        ...structuredClone(log),
        resolved_orders: existing?.resolved_orders ?? [],
        dispute_reason: existing?.dispute_reason ?? null,
        disputed_at: existing?.disputed_at ?? null,
      };
      this.reconciliationRows.set(key, row);
      return structuredClone(row);
    },

    findReconciliationLog: async (merchantId, businessDate) => {
      const row = this.reconciliationRows.get(dayKey(merchantId, businessDate));
      return row ? structuredClone(row) : null;
    },

    resolveReconciliationOrders: async (dispute) => {
      const row = this.reconciliationRows.get(dayKey(dispute.merchant_id, dispute.business_date));
      if (!row) {
        return null;
      }
      row.resolved_orders = [...new Set([...row.resolved_orders, ...dispute.order_numbers])].sort();
      row.dispute_reason = dispute.reason;
      row.disputed_at = new Date(dispute.disputed_at);
      return structuredClone(row);
    },
  };

  readonly merchants: MerchantRepository = {
    listActive: async () =>
      [...this.merchantRows.values()]
        .filter((merchant) => merchant.status === MERCHANT_STATUS.ACTIVE)
        .map((merchant) => structuredClone(merchant)),
  };

  readonly reportExports: ReportExportRepository = {
    listExpired: async (now) =>
      [...this.exportRows.values()]
        .filter((row) => row.expires_at.getTime() < now.getTime())
        .map((row) => structuredClone(row)),

    delete: async (id) => {
      this.exportRows.delete(id);
    },
  };

  // Seed helpers (merchants và report exports do hệ thống khác tạo ra)

  addMerchant(merchant: Merchant): void {
    this.merchantRows.set(merchant.id, structuredClone(merchant));
  }

  addReportExport(row: ReportExport): void {
    this.exportRows.set(row.id, structuredClone(row));
  }

  listReportExports(): ReportExport[] {
    return [...this.exportRows.values()].map((row) => structuredClone(row));
  }

  listAllVerificationRecords(): VerificationRecord[] {
    return this.verificationRows.map((row) => structuredClone(row));
  }

  async close(): Promise<void> {
    // Không có kết nối nào cần đóng
  }

  private applyOrderWrite(write: OrderWrite): boolean {
    const current = this.orderRows.get(write.order.id);
    if (!current || current.version !== write.expectedVersion) {
      return false;
    }

    if (write.verificationRecord && this.verificationRows.some((row) => row.order_id === write.order.id)) {
      throw new ConflictError(`Order ${write.order.order_number} đã có verification record`);
    }

    // Cùng tập cột với UPDATE của PgDataStore
    const { order } = write;
    this.orderRows.set(order.id, structuredClone({
      ...current,
      status: order.status,
      payment_method: order.payment_method,
      payment_status: order.payment_status,
      version: order.version,
      pre_refund_status: order.pre_refund_status,
      refund_reason: order.refund_reason,
      refund_explanation: order.refund_explanation,
      refund_evidence: order.refund_evidence,
      refund_requested_at: order.refund_requested_at,
      refund_processed_at: order.refund_processed_at,
      refund_processed_by: order.refund_processed_by,
      refund_reject_reason: order.refund_reject_reason,
      cancellation_reason: order.cancellation_reason,
      cancelled_by: order.cancelled_by,
      paid_at: order.paid_at,
      verified_at: order.verified_at,
      completed_at: order.completed_at,
      cancelled_at: order.cancelled_at,
      refunded_at: order.refunded_at,
      updated_at: order.updated_at,
    }));

    if (write.history) {
      this.historyRows.push({ id: uuidv4(), ...structuredClone(write.history) });
    }
    if (write.verificationRecord) {
      this.verificationRows.push({ id: uuidv4(), ...structuredClone(write.verificationRecord) });
    }
    if (write.openRefund) {
      this.refundRows.push({ id: uuidv4(), ...structuredClone(write.openRefund) });
    }
    if (write.closeRefund) {
      const close = write.closeRefund;
      const open = this.refundRows.find(
        (row) => row.order_id === close.order_id && row.status === REFUND_STATUS.REQUESTED,
      );
      if (open) {
        open.status = close.status;
        open.processed_by = close.processed_by;
        open.reject_reason = close.reject_reason;
        open.processed_at = new Date(close.processed_at);
      }
    }
    return true;
  }
}
