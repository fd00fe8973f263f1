import { ACTOR_ROLE, ORDER_STATUS, REFUNDABLE_STATUSES, REFUND_STATUS } from '../../constants';
import type { OrderStatus } from '../../constants';
import type { DataStore } from '../../connections/db/datastore';
import type { Order, RefundRecord } from '../../connections/db/models';
import { ConcurrencyConflictError, InvalidStateError, parseInput } from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import type { Actor, OrderService, TransitionContext } from '../orders/orders.service';
import {
  approveRefundSchema,
  refundStatsQuerySchema,
  rejectRefundSchema,
  requestRefundSchema,
} from './refunds.validation';

const log = getLogger('refunds');

const MS_PER_DAY = 86_400_000;

export interface RefundStats {
  merchant_id: string;
  days: number;
  pending_count: number;
  refunded_count: number;
  refunded_amount: number;
  rejected_count: number;
  reasons: Record<string, number>;
}

export interface RefundServiceDeps {
  store: DataStore;
  orders: OrderService;
  now?: () => Date;
}

/**
 * Refund workflow: request -> approve | reject. Mọi bước đều đi qua guarded
 * transition của OrderService.
 */
export class RefundService {
  private readonly store: DataStore;
  private readonly orders: OrderService;
  private readonly now: () => Date;

  constructor(deps: RefundServiceDeps) {
    this.store = deps.store;
    this.orders = deps.orders;
    this.now = deps.now ?? (() => new Date());
  }

  async requestRefund(
    orderId: string,
    reason: string,
    explanation?: string | null,
    evidence?: string[] | null,
  ): Promise<Order> {
    const input = parseInput(requestRefundSchema, { order_id: orderId, reason, explanation, evidence });
    const order = await this.orders.getOrder(input.order_id);
    this.assertStatus(order, REFUNDABLE_STATUSES, 'request a refund for');

    return this.guarded(
      order,
      ORDER_STATUS.REFUNDING,
      { id: order.user_id, role: ACTOR_ROLE.CUSTOMER },
      {
        reason: input.reason,
        refund: { explanation: input.explanation ?? null, evidence: input.evidence ?? null },
      },
      REFUNDABLE_STATUSES,
    );
  }

  async approveRefund(orderId: string, processedBy: string): Promise<Order> {
    const input = parseInput(approveRefundSchema, { order_id: orderId, processed_by: processedBy });
    const order = await this.orders.getOrder(input.order_id);
    this.assertStatus(order, [ORDER_STATUS.REFUNDING], 'approve a refund for');

    return this.guarded(
      order,
      ORDER_STATUS.REFUNDED,
      { id: input.processed_by, role: ACTOR_ROLE.ADMIN },
      {},
      [ORDER_STATUS.REFUNDING],
    );
  }

  async rejectRefund(orderId: string, rejectReason: string, processedBy: string): Promise<Order> {
    const input = parseInput(rejectRefundSchema, {
      order_id: orderId,
      reject_reason: rejectReason,
      processed_by: processedBy,
    });
    const order = await this.orders.getOrder(input.order_id);
    this.assertStatus(order, [ORDER_STATUS.REFUNDING], 'reject a refund for');

    const restoreTo = this.restoreTarget(order);
    return this.guarded(
      { ...order, pre_refund_status: restoreTo },
      restoreTo,
      { id: input.processed_by, role: ACTOR_ROLE.ADMIN },
      { reason: input.reject_reason },
      [ORDER_STATUS.REFUNDING],
    );
  }

  async listPendingRefunds(merchantId: string): Promise<Order[]> {
    return this.store.orders.listByMerchant(merchantId, { statuses: [ORDER_STATUS.REFUNDING] });
  }

  async getRefundLedger(orderId: string): Promise<RefundRecord[]> {
    await this.orders.getOrder(orderId);
    return this.store.refunds.listByOrder(orderId);
  }

  async getRefundStats(merchantId: string, days: number): Promise<RefundStats> {
    const query = parseInput(refundStatsQuerySchema, { merchant_id: merchantId, days });
    const since = new Date(this.now().getTime() - query.days * MS_PER_DAY);

    const [pending, ledger] = await Promise.all([
      this.listPendingRefunds(query.merchant_id),
      this.store.refunds.listByMerchant(query.merchant_id, since),
    ]);

    const stats: RefundStats = {
      merchant_id: query.merchant_id,
      days: query.days,
      pending_count: pending.length,
      refunded_count: 0,
      refunded_amount: 0,
      rejected_count: 0,
      reasons: {},
    };

    // Lý do là free text: đếm trong Map, không dùng object literal
    const reasons = new Map<string, number>();
    for (const row of ledger) {
      reasons.set(row.reason, (reasons.get(row.reason) ?? 0) + 1);
      if (row.status === REFUND_STATUS.APPROVED) {
        stats.refunded_count += 1;
        stats.refunded_amount += row.amount;
      } else if (row.status === REFUND_STATUS.REJECTED) {
        stats.rejected_count += 1;
      }
    }

    return { ...stats, reasons: Object.fromEntries(reasons) };
  }

  private assertStatus(order: Order, allowed: readonly OrderStatus[], action: string): void {
    if (!allowed.includes(order.status)) {
      throw new InvalidStateError(`Cannot ${action} order ${order.order_number} in status '${order.status}'`);
    }
  }

  /**
   * Đơn cũ không lưu pre_refund_status: suy ra từ verified_at.
   */
  private restoreTarget(order: Order): OrderStatus {
    if (order.pre_refund_status) {
      return order.pre_refund_status;
    }
    const inferred = order.verified_at ? ORDER_STATUS.VERIFIED : ORDER_STATUS.PENDING;
    log.warn('Refunding order has no stored pre-refund status, inferring from verified_at', {
      order_id: order.id,
      inferred,
    });
    return inferred;
  }

  private async guarded(
    order: Order,
    target: OrderStatus,
    actor: Actor,
    context: TransitionContext,
    expected: readonly OrderStatus[],
  ): Promise<Order> {
    try {
      return await this.orders.transitionWith(order, target, actor, context);
    } catch (err: unknown) {
      if (!(err instanceof ConcurrencyConflictError)) {
        throw err;
      }
      const fresh = await this.store.orders.findById(order.id);
      if (!fresh || !expected.includes(fresh.status)) {
        throw new InvalidStateError(
          `Order ${order.order_number} changed concurrently to status '${fresh?.status ?? 'unknown'}'`,
        );
      }
      throw err;
    }
  }
}
