import { DatabaseError } from 'pg';
import type { Pool, PoolClient } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { z } from 'zod';
import {
  ACTOR_ROLES,
  MERCHANT_STATUS,
  MERCHANT_STATUSES,
  ORDER_STATUS,
  ORDER_STATUSES,
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
  RECONCILIATION_STATUSES,
  REFUND_STATUSES,
  SETTLEMENT_STATUSES,
  VERIFICATION_METHODS,
} from '../../constants';
import { ConflictError, ExternalIOError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logging';
import type { BusinessDate, BusinessPeriod, DateRange } from '../../utils/date';
import type {
  DataStore,
  FinanceRepository,
  MerchantRepository,
  OrderListFilter,
  OrderRepository,
  OrderWrite,
  RefundRepository,
  ReportExportRepository,
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

const UNIQUE_VIOLATION = '23505';

// BIGINT được pg trả về dạng string
type Bigint = string | number;

const orderStatusSchema = z.enum(ORDER_STATUSES);
const stringListSchema = z.array(z.string());
const orderItemsSchema = z.array(
  z.object({
    product_id: z.string(),
    product_name: z.string(),
    unit_price: z.coerce.number(),
    quantity: z.coerce.number(),
    subtotal: z.coerce.number(),
  }),
);
const paymentBreakdownSchema = z.record(
  z.enum(PAYMENT_METHODS),
  z.object({ count: z.coerce.number(), amount: z.coerce.number() }),
);

type OrderRow = {
  id: string;
  order_number: string;
  merchant_id: string;
  store_id: string | null;
  user_id: string;
  status: string;
  total_amount: Bigint;
  discount_amount: Bigint;
  final_amount: Bigint;
  currency: string;
  payment_method: string;
  payment_status: string;
  verification_code: string;
  items: unknown;
  version: number;
  pre_refund_status: string | null;
  refund_reason: string | null;
  refund_explanation: string | null;
  refund_evidence: unknown;
  refund_requested_at: Date | null;
  refund_processed_at: Date | null;
  refund_processed_by: string | null;
  refund_reject_reason: string | null;
  cancellation_reason: string | null;
  cancelled_by: string | null;
  created_at: Date;
  paid_at: Date | null;
  verified_at: Date | null;
  completed_at: Date | null;
  cancelled_at: Date | null;
  refunded_at: Date | null;
  updated_at: Date;
};

type VerificationRow = {
  vr_id: string;
  vr_order_id: string;
  vr_merchant_id: string;
  vr_store_id: string | null;
  vr_staff_id: string;
  vr_staff_name: string;
  vr_verification_method: string;
  vr_created_at: Date;
};

type HistoryRow = {
  id: string;
  order_id: string;
  from_status: string;
  to_status: string;
  actor_id: string;
  actor_role: string;
  reason: string | null;
  created_at: Date;
};

type RefundRow = {
  id: string;
  refund_number: string;
  order_id: string;
  merchant_id: string;
  amount: Bigint;
  reason: string;
  explanation: string | null;
  evidence: unknown;
  pre_refund_status: string;
  status: string;
  processed_by: string | null;
  reject_reason: string | null;
  requested_at: Date;
  processed_at: Date | null;
};

type SummaryRow = {
  merchant_id: string;
  business_date: string;
  order_count: number;
  total_income: Bigint;
  discount_total: Bigint;
  platform_fee: Bigint;
  refund_count: number;
  refund_amount: Bigint;
  net_income: Bigint;
  payment_breakdown: unknown;
  currency: string;
  generated_at: Date;
};

type SettlementRow = {
  settlement_number: string;
  merchant_id: string;
  period_start: string;
  period_end: string;
  order_count: number;
  gross_amount: Bigint;
  commission: Bigint;
  refund_amount: Bigint;
  net_payable: Bigint;
  currency: string;
  status: string;
  generated_at: Date;
};

type ReconciliationRow = {
  merchant_id: string;
  business_date: string;
  expected_total: Bigint;
  actual_total: Bigint;
  discrepancy: Bigint;
  mismatched_orders: unknown;
  status: string;
  notes: string | null;
  generated_at: Date;
  resolved_orders: unknown;
  dispute_reason: string | null;
  disputed_at: Date | null;
};

type MerchantRow = { id: string; name: string; status: string };

type ReportExportRow = {
  id: string;
  merchant_id: string;
  file_name: string;
  file_path: string;
  expires_at: Date;
  created_at: Date;
};

const ORDER_COLUMNS = `
  o.id, o.order_number, o.merchant_id, o.store_id, o.user_id, o.status,
  o.total_amount, o.discount_amount, o.final_amount, o.currency,
  o.payment_method, o.payment_status, o.verification_code, o.version,
  o.pre_refund_status, o.refund_reason, o.refund_explanation, o.refund_evidence,
  o.refund_requested_at, o.refund_processed_at, o.refund_processed_by, o.refund_reject_reason,
  o.cancellation_reason, o.cancelled_by,
  o.created_at, o.paid_at, o.verified_at, o.completed_at, o.cancelled_at, o.refunded_at, o.updated_at,
  COALESCE((
    SELECT json_agg(json_build_object(
      'product_id', oi.product_id,
      'product_name', oi.product_name,
      'unit_price', oi.unit_price,
      'quantity', oi.quantity,
      'subtotal', oi.subtotal
    ) ORDER BY oi.position)
    FROM order_items oi
    WHERE oi.order_id = o.id
  ), '[]'::json) AS items`;

const VERIFICATION_COLUMNS = `
  vr.id AS vr_id, vr.order_id AS vr_order_id, vr.merchant_id AS vr_merchant_id,
  vr.store_id AS vr_store_id, vr.staff_id AS vr_staff_id, vr.staff_name AS vr_staff_name,
  vr.verification_method AS vr_verification_method, vr.created_at AS vr_created_at`;

const SUMMARY_COLUMNS = `
  merchant_id, to_char(business_date, 'YYYY-MM-DD') AS business_date, order_count,
  total_income, discount_total, platform_fee, refund_count, refund_amount, net_income,
  payment_breakdown, currency, generated_at`;

const SETTLEMENT_COLUMNS = `
  settlement_number, merchant_id,
  to_char(period_start, 'YYYY-MM-DD') AS period_start, to_char(period_end, 'YYYY-MM-DD') AS period_end,
  order_count, gross_amount, commission, refund_amount, net_payable, currency, status, generated_at`;

const RECONCILIATION_COLUMNS = `
  merchant_id, to_char(business_date, 'YYYY-MM-DD') AS business_date,
  expected_total, actual_total, discrepancy, mismatched_orders, status, notes, generated_at,
  resolved_orders, dispute_reason, disputed_at`;

const toOrder = (row: OrderRow): Order => ({
  id: row.id,
  order_number: row.order_number,
  merchant_id: row.merchant_id,
  store_id: row.store_id,
  user_id: row.user_id,
  status: orderStatusSchema.parse(row.status),
  total_amount: Number(row.total_amount),
  discount_amount: Number(row.discount_amount),
  final_amount: Number(row.final_amount),
  currency: row.currency,
  payment_method: z.enum(PAYMENT_METHODS).parse(row.payment_method),
  payment_status: z.enum(PAYMENT_STATUSES).parse(row.payment_status),
  verification_code: row.verification_code,
  items: orderItemsSchema.parse(row.items),
  version: row.version,
  pre_refund_status: row.pre_refund_status === null ? null : orderStatusSchema.parse(row.pre_refund_status),
  refund_reason: row.refund_reason,
  refund_explanation: row.refund_explanation,
  refund_evidence: stringListSchema.nullable().parse(row.refund_evidence),
  refund_requested_at: row.refund_requested_at,
  refund_processed_at: row.refund_processed_at,
  refund_processed_by: row.refund_processed_by,
  refund_reject_reason: row.refund_reject_reason,
  cancellation_reason: row.cancellation_reason,
  cancelled_by: row.cancelled_by,
  created_at: row.created_at,
  paid_at: row.paid_at,
  verified_at: row.verified_at,
  completed_at: row.completed_at,
  cancelled_at: row.cancelled_at,
  refunded_at: row.refunded_at,
  updated_at: row.updated_at,
});

const toVerificationRecord = (row: VerificationRow): VerificationRecord => ({
  id: row.vr_id,
  order_id: row.vr_order_id,
  merchant_id: row.vr_merchant_id,
  store_id: row.vr_store_id,
  staff_id: row.vr_staff_id,
  staff_name: row.vr_staff_name,
  verification_method: z.enum(VERIFICATION_METHODS).parse(row.vr_verification_method),
  created_at: row.vr_created_at,
});

const toHistory = (row: HistoryRow): OrderStatusHistory => ({
  id: row.id,
  order_id: row.order_id,
  from_status: orderStatusSchema.parse(row.from_status),
  to_status: orderStatusSchema.parse(row.to_status),
  actor_id: row.actor_id,
  actor_role: z.enum(ACTOR_ROLES).parse(row.actor_role),
  reason: row.reason,
  created_at: row.created_at,
});

const toRefund = (row: RefundRow): RefundRecord => ({
  id: row.id,
  refund_number: row.refund_number,
  order_id: row.order_id,
  merchant_id: row.merchant_id,
  amount: Number(row.amount),
  reason: row.reason,
  explanation: row.explanation,
  evidence: stringListSchema.nullable().parse(row.evidence),
  pre_refund_status: orderStatusSchema.parse(row.pre_refund_status),
  status: z.enum(REFUND_STATUSES).parse(row.status),
  processed_by: row.processed_by,
  reject_reason: row.reject_reason,
  requested_at: row.requested_at,
  processed_at: row.processed_at,
});

const toSummary = (row: SummaryRow): FinanceDailySummary => ({
  merchant_id: row.merchant_id,
  business_date: row.business_date,
  order_count: row.order_count,
  total_income: Number(row.total_income),
  discount_total: Number(row.discount_total),
  platform_fee: Number(row.platform_fee),
  refund_count: row.refund_count,
  refund_amount: Number(row.refund_amount),
  net_income: Number(row.net_income),
  payment_breakdown: paymentBreakdownSchema.parse(row.payment_breakdown),
  currency: row.currency,
  generated_at: row.generated_at,
});

const toSettlement = (row: SettlementRow): SettlementRecord => ({
  settlement_number: row.settlement_number,
  merchant_id: row.merchant_id,
  period_start: row.period_start,
  period_end: row.period_end,
  order_count: row.order_count,
  gross_amount: Number(row.gross_amount),
  commission: Number(row.commission),
  refund_amount: Number(row.refund_amount),
  net_payable: Number(row.net_payable),
  currency: row.currency,
  status: z.enum(SETTLEMENT_STATUSES).parse(row.status),
  generated_at: row.generated_at,
});

const toReconciliation = (row: ReconciliationRow): ReconciliationLog => ({
  merchant_id: row.merchant_id,
  business_date: row.business_date,
  expected_total: Number(row.expected_total),
  actual_total: Number(row.actual_total),
  discrepancy: Number(row.discrepancy),
  mismatched_orders: stringListSchema.parse(row.mismatched_orders),
  status: z.enum(RECONCILIATION_STATUSES).parse(row.status),
  notes: row.notes,
  generated_at: row.generated_at,
  resolved_orders: stringListSchema.parse(row.resolved_orders),
  dispute_reason: row.dispute_reason,
  disputed_at: row.disputed_at,
});

const toMerchant = (row: MerchantRow): Merchant => ({
  id: row.id,
  name: row.name,
  status: z.enum(MERCHANT_STATUSES).parse(row.status),
});

const isUniqueViolation = (err: unknown): boolean =>
  err instanceof DatabaseError && err.code === UNIQUE_VIOLATION;

/**
 * Wrap driver errors; AppErrors thrown inside pass through unchanged.
 */
const wrap = async <T>(operation: string, task: () => Promise<T>): Promise<T> => {
  try {
    return await task();
  } catch (err: unknown) {
    if (err instanceof ConflictError || err instanceof ExternalIOError) {
      throw err;
    }
    logger.error(`Datastore operation failed: ${operation}`, { error: errorMessage(err) });
    throw new ExternalIOError(`Datastore operation failed: ${operation}`, err);
  }
};

/**
 * Run `task` inside BEGIN/COMMIT; ROLLBACK on any error or when task returns false.
 */
const inTransaction = async (pool: Pool, task: (client: PoolClient) => Promise<boolean>): Promise<boolean> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const committed = await task(client);
    await client.query(committed ? 'COMMIT' : 'ROLLBACK');
    return committed;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
};

export class PgDataStore implements DataStore {
  readonly kind = 'postgres' as const;

  constructor(readonly pool: Pool) {}

  readonly orders: OrderRepository = {
    insert: (order) =>
      wrap('orders.insert', async () => {
        try {
          await inTransaction(this.pool, async (client) => {
            await client.query(
              `INSERT INTO orders (
                 id, order_number, merchant_id, store_id, user_id, status,
                 total_amount, discount_amount, final_amount, currency,
                 payment_method, payment_status, verification_code, version,
                 created_at, paid_at, updated_at
               ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)`,
              [
                order.id, order.order_number, order.merchant_id, order.store_id, order.user_id, order.status,
                order.total_amount, order.discount_amount, order.final_amount, order.currency,
                order.payment_method, order.payment_status, order.verification_code, order.version,
                order.created_at, order.paid_at, order.updated_at,
              ],
            );
            for (const [position, item] of order.items.entries()) {
              await client.query(
                `INSERT INTO order_items (order_id, position, product_id, product_name, unit_price, quantity, subtotal)
                 VALUES ($1, $2, $3, $4, $5, $6, $7)`,
                [order.id, position, item.product_id, item.product_name, item.unit_price, item.quantity, item.subtotal],
              );
            }
            return true;
          });
        } catch (err: unknown) {
          if (isUniqueViolation(err)) {
            throw new ConflictError(`Order ${order.order_number} trùng id, order_number hoặc verification_code`);
          }
          throw err;
        }
      }),

    findById: (id) =>
      wrap('orders.findById', async () => {
        // orders.id là UUID: id sai định dạng coi như không tồn tại (tránh lỗi 22P02)
        if (!isUuid(id)) {
          return null;
        }
        const result = await this.pool.query<OrderRow>(`SELECT ${ORDER_COLUMNS} FROM orders o WHERE o.id = $1`, [id]);
        return result.rows.length > 0 ? toOrder(result.rows[0]) : null;
      }),

    findByVerificationCode: (code) =>
      wrap('orders.findByVerificationCode', async () => {
        const result = await this.pool.query<OrderRow>(
          `SELECT ${ORDER_COLUMNS} FROM orders o WHERE o.verification_code = $1`,
          [code],
        );
        return result.rows.length > 0 ? toOrder(result.rows[0]) : null;
      }),

    save: (write) =>
      wrap('orders.save', async () => {
        try {
          return await inTransaction(this.pool, (client) => this.applyOrderWrite(client, write));
        } catch (err: unknown) {
          if (isUniqueViolation(err)) {
            throw new ConflictError(`Order ${write.order.order_number} đã có verification record`);
          }
          throw err;
        }
      }),

    listByMerchant: (merchantId, filter: OrderListFilter = {}) =>
      wrap('orders.listByMerchant', async () => {
        const params: unknown[] = [merchantId];
        let statusClause = '';
        if (filter.statuses) {
          params.push(filter.statuses);
          statusClause = 'AND o.status = ANY($2)';
        }
        const result = await this.pool.query<OrderRow>(
          `SELECT ${ORDER_COLUMNS} FROM orders o
           WHERE o.merchant_id = $1 ${statusClause}
           ORDER BY o.created_at ASC`,
          params,
        );
        return result.rows.map(toOrder);
      }),

    listStatusHistory: (orderId) =>
      wrap('orders.listStatusHistory', async () => {
        if (!isUuid(orderId)) {
          return [];
        }
        const result = await this.pool.query<HistoryRow>(
          `SELECT id, order_id, from_status, to_status, actor_id, actor_role, reason, created_at
           FROM order_status_history
           WHERE order_id = $1
           ORDER BY created_at ASC, seq ASC`,
          [orderId],
        );
        return result.rows.map(toHistory);
      }),
  };

  readonly verificationRecords: VerificationRecordRepository = {
    listRedemptions: (merchantId, range) =>
      wrap('verificationRecords.listRedemptions', async () => {
        const result = await this.pool.query<OrderRow & VerificationRow>(
          `SELECT ${VERIFICATION_COLUMNS}, ${ORDER_COLUMNS}
           FROM verification_records vr
           JOIN orders o ON o.id = vr.order_id
           WHERE vr.merchant_id = $1 AND vr.created_at >= $2 AND vr.created_at < $3
           ORDER BY vr.created_at ASC`,
          [merchantId, range.start, range.end],
        );
        return result.rows.map((row) => ({ record: toVerificationRecord(row), order: toOrder(row) }));
      }),
  };

  readonly refunds: RefundRepository = {
    listByOrder: (orderId) =>
      wrap('refunds.listByOrder', async () => {
        if (!isUuid(orderId)) {
          return [];
        }
        const result = await this.pool.query<RefundRow>(
          'SELECT * FROM refunds WHERE order_id = $1 ORDER BY requested_at ASC',
          [orderId],
        );
        return result.rows.map(toRefund);
      }),

    listByMerchant: (merchantId, since) =>
      wrap('refunds.listByMerchant', async () => {
        const result = await this.pool.query<RefundRow>(
          'SELECT * FROM refunds WHERE merchant_id = $1 AND requested_at >= $2 ORDER BY requested_at ASC',
          [merchantId, since],
        );
        return result.rows.map(toRefund);
      }),
  };

  readonly finance: FinanceRepository = {
    listRefundedOrders: (merchantId, range: DateRange) =>
      wrap('finance.listRefundedOrders', async () => {
        const result = await this.pool.query<OrderRow>(
          `SELECT ${ORDER_COLUMNS} FROM orders o
           WHERE o.merchant_id = $1 AND o.status = $2
             AND o.refunded_at >= $3 AND o.refunded_at < $4`,
          [merchantId, ORDER_STATUS.REFUNDED, range.start, range.end],
        );
        return result.rows.map(toOrder);
      }),

    upsertDailySummary: (summary) =>
      wrap('finance.upsertDailySummary', async () => {
        const result = await this.pool.query<SummaryRow>(
          `INSERT INTO finance_daily_summaries (
             merchant_id, business_date, order_count, total_income, discount_total, platform_fee,
             refund_count, refund_amount, net_income, payment_breakdown, currency, generated_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
           ON CONFLICT (merchant_id, business_date) DO UPDATE SET
             order_count = EXCLUDED.order_count,
             total_income = EXCLUDED.total_income,
             discount_total = EXCLUDED.discount_total,
             platform_fee = EXCLUDED.platform_fee,
             refund_count = EXCLUDED.refund_count,
             refund_amount = EXCLUDED.refund_amount,
             net_income = EXCLUDED.net_income,
             payment_breakdown = EXCLUDED.payment_breakdown,
             currency = EXCLUDED.currency,
             generated_at = EXCLUDED.generated_at
           RETURNING ${SUMMARY_COLUMNS}`,
          [
            summary.merchant_id, summary.business_date, summary.order_count, summary.total_income,
            summary.discount_total, summary.platform_fee, summary.refund_count, summary.refund_amount,
            summary.net_income, JSON.stringify(summary.payment_breakdown), summary.currency, summary.generated_at,
          ],
        );
        return toSummary(result.rows[0]);
      }),

    findDailySummary: (merchantId, businessDate: BusinessDate) =>
      wrap('finance.findDailySummary', async () => {
        const result = await this.pool.query<SummaryRow>(
          `SELECT ${SUMMARY_COLUMNS} FROM finance_daily_summaries WHERE merchant_id = $1 AND business_date = $2`,
          [merchantId, businessDate],
        );
        return result.rows.length > 0 ? toSummary(result.rows[0]) : null;
      }),

    listDailySummaries: (merchantId, period: BusinessPeriod) =>
      wrap('finance.listDailySummaries', async () => {
        const result = await this.pool.query<SummaryRow>(
          `SELECT ${SUMMARY_COLUMNS} FROM finance_daily_summaries
           WHERE merchant_id = $1 AND business_date BETWEEN $2 AND $3
           ORDER BY business_date ASC`,
          [merchantId, period.start, period.end],
        );
        return result.rows.map(toSummary);
      }),

    insertSettlementIfAbsent: (record) =>
      wrap('finance.insertSettlementIfAbsent', async () => {
        const inserted = await this.pool.query<SettlementRow>(
          `INSERT INTO settlement_records (
             settlement_number, merchant_id, period_start, period_end, order_count, gross_amount,
             commission, refund_amount, net_payable, currency, status, generated_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
           ON CONFLICT (merchant_id, period_start, period_end) DO NOTHING
           RETURNING ${SETTLEMENT_COLUMNS}`,
          [
            record.settlement_number, record.merchant_id, record.period_start, record.period_end,
            record.order_count, record.gross_amount, record.commission, record.refund_amount,
            record.net_payable, record.currency, record.status, record.generated_at,
          ],
        );
        if (inserted.rows.length > 0) {
          return { record: toSettlement(inserted.rows[0]), created: true };
        }
        const existing = await this.pool.query<SettlementRow>(
          `SELECT ${SETTLEMENT_COLUMNS} FROM settlement_records
           WHERE merchant_id = $1 AND period_start = $2 AND period_end = $3`,
          [record.merchant_id, record.period_start, record.period_end],
        );
        return { record: toSettlement(existing.rows[0]), created: false };
      }),

    findSettlement: (merchantId, period) =>
      wrap('finance.findSettlement', async () => {
        const result = await this.pool.query<SettlementRow>(
          `SELECT ${SETTLEMENT_COLUMNS} FROM settlement_records
           WHERE merchant_id = $1 AND period_start = $2 AND period_end = $3`,
          [merchantId, period.start, period.end],
        );
        return result.rows.length > 0 ? toSettlement(result.rows[0]) : null;
      }),

    upsertReconciliationLog: (log) =>
      wrap('finance.upsertReconciliationLog', async () => {
        const result = await this.pool.query<ReconciliationRow>(
          `INSERT INTO reconciliation_logs (
             merchant_id, business_date, expected_total, actual_total, discrepancy,
             mismatched_orders, status, notes, generated_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
           ON CONFLICT (merchant_id, business_date) DO UPDATE SET
             expected_total = EXCLUDED.expected_total,
             actual_total = EXCLUDED.actual_total,
             discrepancy = EXCLUDED.discrepancy,
             mismatched_orders = EXCLUDED.mismatched_orders,
             status = EXCLUDED.status,
             notes = EXCLUDED.notes,
             generated_at = EXCLUDED.generated_at
           RETURNING ${RECONCILIATION_COLUMNS}`,
          [
            log.merchant_id, log.business_date, log.expected_total, log.actual_total, log.discrepancy,
            JSON.stringify(log.mismatched_orders), log.status, log.notes, log.generated_at,
          ],
        );
        return toReconciliation(result.rows[0]);
      }),

    findReconciliationLog: (merchantId, businessDate) =>
      wrap('finance.findReconciliationLog', async () => {
        const result = await this.pool.query<ReconciliationRow>(
          `SELECT ${RECONCILIATION_COLUMNS} FROM reconciliation_logs WHERE merchant_id = $1 AND business_date = $2`,
          [merchantId, businessDate],
        );
        return result.rows.length > 0 ? toReconciliation(result.rows[0]) : null;
      }),

    resolveReconciliationOrders: (dispute) =>
      wrap('finance.resolveReconciliationOrders', async () => {
        // Gộp trong một câu UPDATE để hai dispute đồng thời không ghi đè nhau
        const result = await this.pool.query<ReconciliationRow>(
          `UPDATE reconciliation_logs SET
             resolved_orders = (
               SELECT COALESCE(jsonb_agg(DISTINCT value ORDER BY value), '[]'::jsonb)
               FROM jsonb_array_elements_text(resolved_orders || $3::jsonb) AS value
             ),
             dispute_reason = $4,
             disputed_at = $5
           WHERE merchant_id = $1 AND business_date = $2
           RETURNING ${RECONCILIATION_COLUMNS}`,
          [dispute.merchant_id, dispute.business_date, JSON.stringify(dispute.order_numbers), dispute.reason, dispute.disputed_at],
        );
        return result.rows.length > 0 ? toReconciliation(result.rows[0]) : null;
      }),
  };

  readonly merchants: MerchantRepository = {
    listActive: () =>
      wrap('merchants.listActive', async () => {
        const result = await this.pool.query<MerchantRow>(
          'SELECT id, name, status FROM merchants WHERE status = $1 ORDER BY id ASC',
          [MERCHANT_STATUS.ACTIVE],
        );
        return result.rows.map(toMerchant);
      }),
  };

  readonly reportExports: ReportExportRepository = {
    listExpired: (now) =>
      wrap('reportExports.listExpired', async () => {
        const result = await this.pool.query<ReportExportRow>(
          `SELECT id, merchant_id, file_name, file_path, expires_at, created_at
           FROM report_exports WHERE expires_at < $1 ORDER BY expires_at ASC`,
          [now],
        );
        return result.rows.map((row): ReportExport => ({ ...row }));
      }),

    delete: (id) =>
      wrap('reportExports.delete', async () => {
        await this.pool.query('DELETE FROM report_exports WHERE id = $1', [id]);
      }),
  };

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async applyOrderWrite(client: PoolClient, write: OrderWrite): Promise<boolean> {
    const { order } = write;
    const updated = await client.query(
      `UPDATE orders SET
         status = $3, payment_method = $4, payment_status = $5, version = $6,
         pre_refund_status = $7, refund_reason = $8, refund_explanation = $9, refund_evidence = $10,
         refund_requested_at = $11, refund_processed_at = $12, refund_processed_by = $13, refund_reject_reason = $14,
         cancellation_reason = $15, cancelled_by = $16,
         paid_at = $17, verified_at = $18, completed_at = $19, cancelled_at = $20, refunded_at = $21, updated_at = $22
       WHERE id = $1 AND version = $2`,
      [
        order.id, write.expectedVersion,
        order.status, order.payment_method, order.payment_status, order.version,
        order.pre_refund_status, order.refund_reason, order.refund_explanation,
        order.refund_evidence === null ? null : JSON.stringify(order.refund_evidence),
        order.refund_requested_at, order.refund_processed_at, order.refund_processed_by, order.refund_reject_reason,
        order.cancellation_reason, order.cancelled_by,
        order.paid_at, order.verified_at, order.completed_at, order.cancelled_at, order.refunded_at, order.updated_at,
      ],
    );
    if (updated.rowCount !== 1) {
      return false;
    }

    if (write.history) {
      const h = write.history;
      await client.query(
        `INSERT INTO order_status_history (id, order_id, from_status, to_status, actor_id, actor_role, reason, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [uuidv4(), h.order_id, h.from_status, h.to_status, h.actor_id, h.actor_role, h.reason, h.created_at],
      );
    }

    if (write.verificationRecord) {
      const v = write.verificationRecord;
      await client.query(
        `INSERT INTO verification_records (id, order_id, merchant_id, store_id, staff_id, staff_name, verification_method, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [uuidv4(), v.order_id, v.merchant_id, v.store_id, v.staff_id, v.staff_name, v.verification_method, v.created_at],
      );
    }

    if (write.openRefund) {
      const r = write.openRefund;
      await client.query(
        `INSERT INTO refunds (
           id, refund_number, order_id, merchant_id, amount, reason, explanation, evidence,
           pre_refund_status, status, processed_by, reject_reason, requested_at, processed_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
        [
          uuidv4(), r.refund_number, r.order_id, r.merchant_id, r.amount, r.reason, r.explanation,
          r.evidence === null ? null : JSON.stringify(r.evidence),
          r.pre_refund_status, r.status, r.processed_by, r.reject_reason, r.requested_at, r.processed_at,
        ],
      );
    }

    if (write.closeRefund) {
      const c = write.closeRefund;
      await client.query(
        `UPDATE refunds SET status = $2, processed_by = $3, reject_reason = $4, processed_at = $5
         WHERE order_id = $1 AND status = 'requested'`,
        [c.order_id, c.status, c.processed_by, c.reject_reason, c.processed_at],
      );
    }

    return true;
  }
}
