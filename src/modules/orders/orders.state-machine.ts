import {
  ORDER_STATUS,
  ORDER_STATUSES,
  REFUNDABLE_STATUSES,
  TERMINAL_STATUSES,
} from '../../constants';
import type { OrderStatus, RedeemableStatus } from '../../constants';
import type { Order } from '../../connections/db/models';

export type TransitionTable = Readonly<Record<OrderStatus, readonly OrderStatus[]>>;

export interface TransitionValidation {
  valid: boolean;
  error?: string;
}

/**
 * Order lifecycle:
 *
 *   pending -> confirmed -> preparing -> ready -> verified -> completed
 *   pending | confirmed | preparing | ready -> cancelled
 *   pending | verified -> refunding -> refunded
 *   refunding -> (trạng thái trước khi refund) khi bị từ chối
 *
 * Mỗi trạng thái trong `redeemable` có thêm cạnh tới verified; ready luôn có.
 */
export function createTransitionTable(redeemable: readonly RedeemableStatus[]): TransitionTable {
  const table: Record<OrderStatus, OrderStatus[]> = {
    [ORDER_STATUS.PENDING]: [ORDER_STATUS.CONFIRMED, ORDER_STATUS.CANCELLED, ORDER_STATUS.REFUNDING],
    [ORDER_STATUS.CONFIRMED]: [ORDER_STATUS.PREPARING, ORDER_STATUS.CANCELLED],
    [ORDER_STATUS.PREPARING]: [ORDER_STATUS.READY, ORDER_STATUS.CANCELLED],
    [ORDER_STATUS.READY]: [ORDER_STATUS.VERIFIED, ORDER_STATUS.CANCELLED],
    [ORDER_STATUS.VERIFIED]: [ORDER_STATUS.COMPLETED, ORDER_STATUS.REFUNDING],
    [ORDER_STATUS.COMPLETED]: [],
    [ORDER_STATUS.CANCELLED]: [],
    [ORDER_STATUS.REFUNDING]: [ORDER_STATUS.REFUNDED, ...REFUNDABLE_STATUSES],
    [ORDER_STATUS.REFUNDED]: [],
  };

  for (const status of redeemable) {
    if (!table[status].includes(ORDER_STATUS.VERIFIED)) {
      table[status].push(ORDER_STATUS.VERIFIED);
    }
  }

  return table;
}

export class OrderStateMachine {
  readonly table: TransitionTable;
  private readonly redeemable: ReadonlySet<OrderStatus>;

  constructor(redeemableStatuses: readonly RedeemableStatus[]) {
    this.table = createTransitionTable(redeemableStatuses);
    this.redeemable = new Set<OrderStatus>([...redeemableStatuses, ORDER_STATUS.READY]);
  }

  canTransition(from: OrderStatus, to: OrderStatus): boolean {
    return this.table[from].includes(to);
  }

  /** Whether an order in this status can be redeemed at point of sale. */
  isRedeemable(status: OrderStatus): boolean {
    return this.redeemable.has(status);
  }

  /** Every edge pair, for exhaustive checks. */
  edges(): Array<[OrderStatus, OrderStatus]> {
    return ORDER_STATUSES.flatMap((from) => this.table[from].map((to): [OrderStatus, OrderStatus] => [from, to]));
  }

  /**
   * Reason bắt buộc khi hủy, khi yêu cầu refund và khi từ chối refund.
   */
  requiresReason(from: OrderStatus, to: OrderStatus): boolean {
    return (
      to === ORDER_STATUS.CANCELLED ||
      to === ORDER_STATUS.REFUNDING ||
      (from === ORDER_STATUS.REFUNDING && to !== ORDER_STATUS.REFUNDED)
    );
  }

  validate(order: Pick<Order, 'status' | 'pre_refund_status'>, target: OrderStatus): TransitionValidation {
    const current = order.status;

    if (current === target) {
      return { valid: false, error: `Order is already in '${current}' status` };
    }

    if (TERMINAL_STATUSES.includes(current)) {
      return { valid: false, error: `Cannot transition from terminal status '${current}'` };
    }

    const allowed = this.table[current];
    if (!allowed.includes(target)) {
      return {
        valid: false,
        error: `Transition from '${current}' to '${target}' is not allowed. Allowed targets: ${allowed.join(', ')}`,
      };
    }

    // Từ chối refund chỉ được quay về đúng trạng thái đã lưu
    if (current === ORDER_STATUS.REFUNDING && target !== ORDER_STATUS.REFUNDED && target !== order.pre_refund_status) {
      return {
        valid: false,
        error: `Refund rejection must restore '${order.pre_refund_status ?? 'unknown'}', not '${target}'`,
      };
    }

    return { valid: true };
  }
}
