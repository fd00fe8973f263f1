import { randomInt } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import {
  ORDER_STATUS,
  PAYMENT_STATUS,
  REFUND_STATUS,
  VERIFICATION_CODE_ALPHABET,
  VERIFICATION_CODE_LENGTH,
} from '../../constants';
import type { ActorRole, OrderStatus, PaymentMethod, PaymentStatus, VerificationMethod } from '../../constants';
import type { DataStore, OrderWrite } from '../../connections/db/datastore';
import type { CreateOrderInput, Order, OrderStatusHistory } from '../../connections/db/models';
import {
  ConcurrencyConflictError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  parseInput,
} from '../../utils/errors';
import type { IdGenerator } from '../../utils/id-generator';
import { auditLog, getLogger } from '../../utils/logging';
import { OrderStateMachine } from './orders.state-machine';
import { createOrderSchema, recordPaymentSchema, transitionSchema } from './orders.validation';

const log = getLogger('orders');

const MAX_CREATE_ATTEMPTS = 3;

export interface Actor {
  id: string;
  role: ActorRole;
}

export interface RedemptionContext {
  staffId: string;
  staffName: string;
  method: VerificationMethod;
}

export interface TransitionContext {
  reason?: string;
  refund?: {
    explanation?: string | null;
    evidence?: string[] | null;
  };
  redemption?: RedemptionContext;
}

export interface OrderServiceDeps {
  store: DataStore;
  ids: IdGenerator;
  stateMachine: OrderStateMachine;
  currency: string;
  now?: () => Date;
  generateCode?: () => string;
}

export const generateVerificationCode = (): string => {
  let code = '';
  for (let i = 0; i < VERIFICATION_CODE_LENGTH; i++) {
    code += VERIFICATION_CODE_ALPHABET[randomInt(VERIFICATION_CODE_ALPHABET.length)];
  }
  return code;
};

/**
 * Order aggregate: mọi thay đổi trạng thái đi qua `transitionWith`,
 * ghi nguyên tử (version check) cùng history, verification record và refund ledger.
 */
export class OrderService {
  private readonly store: DataStore;
  private readonly ids: IdGenerator;
  private readonly currency: string;
  private readonly now: () => Date;
  private readonly generateCode: () => string;
  readonly stateMachine: OrderStateMachine;

  constructor(deps: OrderServiceDeps) {
    this.store = deps.store;
    this.ids = deps.ids;
    this.stateMachine = deps.stateMachine;
    this.currency = deps.currency;
    this.now = deps.now ?? (() => new Date());
    this.generateCode = deps.generateCode ?? generateVerificationCode;
  }

  async createOrder(input: CreateOrderInput): Promise<Order> {
    const payload = parseInput(createOrderSchema, input, 'Dữ liệu đơn hàng không hợp lệ');

    const items = payload.items.map((item) => ({
      ...item,
      subtotal: item.unit_price * item.quantity,
    }));
    const totalAmount = items.reduce((sum, item) => sum + item.subtotal, 0);
    const finalAmount = totalAmount - payload.discount_amount;

    let lastError: unknown;
    for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
      const now = this.now();
      const order: Order = {
        id: uuidv4(),
        order_number: this.ids.orderNumber(),
        merchant_id: payload.merchant_id,
        store_id: payload.store_id ?? null,
        user_id: payload.user_id,
        status: ORDER_STATUS.PENDING,
        total_amount: totalAmount,
        discount_amount: payload.discount_amount,
        final_amount: finalAmount,
        currency: payload.currency ?? this.currency,
        payment_method: payload.payment_method,
        payment_status: payload.payment_status,
        verification_code: this.generateCode(),
        items,
        version: 1,
        pre_refund_status: null,
        refund_reason: null,
        refund_explanation: null,
        refund_evidence: null,
        refund_requested_at: null,
        refund_processed_at: null,
        refund_processed_by: null,
        refund_reject_reason: null,
        cancellation_reason: null,
        cancelled_by: null,
        created_at: now,
        paid_at: payload.payment_status === PAYMENT_STATUS.PAID ? now : null,
        verified_at: null,
        completed_at: null,
        cancelled_at: null,
        refunded_at: null,
        updated_at: now,
      };

      try {
        await this.store.orders.insert(order);
        auditLog('order.created', {
          order_id: order.id,
          order_number: order.order_number,
          merchant_id: order.merchant_id,
          final_amount: order.final_amount,
        });
        return order;
      } catch (err: unknown) {
        if (!(err instanceof ConflictError)) {
          throw err;
        }
        lastError = err;
        log.warn(`Order insert conflict, retrying (${attempt}/${MAX_CREATE_ATTEMPTS})`, {
          order_number: order.order_number,
        });
      }
    }

    throw lastError;
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.store.orders.findById(orderId);
    if (!order) {
      throw new NotFoundError(`Order ${orderId} not found`);
    }
    return order;
  }

  async getStatusHistory(orderId: string): Promise<OrderStatusHistory[]> {
    await this.getOrder(orderId);
    return this.store.orders.listStatusHistory(orderId);
  }

  /**
   * Generic guarded transition. Redemption (-> verified) cần staff context
   * nên phải đi qua VerificationService.
   */
  async transition(orderId: string, targetStatus: OrderStatus, actor: Actor, reason?: string): Promise<Order> {
    const input = parseInput(transitionSchema, {
      order_id: orderId,
      target_status: targetStatus,
      actor,
      reason,
    });
    const order = await this.getOrder(input.order_id);
    return this.transitionWith(order, input.target_status, input.actor, { reason: input.reason });
  }

  /**
   * Đọc lại order trước khi ghi: `expected` chỉ cung cấp id và version,
   * các cột khác luôn lấy từ bản đang lưu.
   */
  async transitionWith(expected: Order, target: OrderStatus, actor: Actor, context: TransitionContext = {}): Promise<Order> {
    const order = await this.getOrder(expected.id);
    if (order.version !== expected.version) {
      throw new ConcurrencyConflictError(`Order ${order.order_number} was modified concurrently`);
    }
    const from = order.status;
    const validation = this.stateMachine.validate(order, target);
    if (!validation.valid) {
      throw new InvalidTransitionError(validation.error ?? `Transition from '${from}' to '${target}' is not allowed`);
    }

    const reason = context.reason?.trim() || null;
    if (this.stateMachine.requiresReason(from, target) && !reason) {
      throw new ValidationError(`A reason is required to move an order from '${from}' to '${target}'`, [
        { path: 'reason', message: 'Lý do không được để trống' },
      ]);
    }

    const isRestore = from === ORDER_STATUS.REFUNDING && target !== ORDER_STATUS.REFUNDED;
    if (target === ORDER_STATUS.VERIFIED && !isRestore && !context.redemption) {
      throw new ValidationError('Redeeming an order requires staff and verification method', [
        { path: 'redemption', message: 'Thiếu thông tin nhân viên xác thực' },
      ]);
    }

    const now = this.now();
    const next: Order = {
      ...order,
      status: target,
      version: order.version + 1,
      updated_at: now,
    };
    const write: OrderWrite = {
      order: next,
      expectedVersion: order.version,
      history: {
        order_id: order.id,
        from_status: from,
        to_status: target,
        actor_id: actor.id,
        actor_role: actor.role,
        reason,
        created_at: now,
      },
    };

    if (isRestore) {
      next.pre_refund_status = null;
      next.refund_processed_at = now;
      next.refund_processed_by = actor.id;
      next.refund_reject_reason = reason;
      write.closeRefund = {
        order_id: order.id,
        status: REFUND_STATUS.REJECTED,
        processed_by: actor.id,
        reject_reason: reason,
        processed_at: now,
      };
    } else {
      switch (target) {
        case ORDER_STATUS.VERIFIED:
          next.verified_at = now;
          if (context.redemption) {
            write.verificationRecord = {
              order_id: order.id,
              merchant_id: order.merchant_id,
              store_id: order.store_id,
              staff_id: context.redemption.staffId,
              staff_name: context.redemption.staffName,
              verification_method: context.redemption.method,
              created_at: now,
            };
          }
          break;
        case ORDER_STATUS.COMPLETED:
          next.completed_at = now;
          break;
        case ORDER_STATUS.CANCELLED:
          next.cancelled_at = now;
          next.cancellation_reason = reason;
          next.cancelled_by = actor.id;
          break;
        case ORDER_STATUS.REFUNDING:
          next.pre_refund_status = from;
          next.refund_reason = reason;
          next.refund_explanation = context.refund?.explanation ?? null;
          next.refund_evidence = context.refund?.evidence ?? null;
          next.refund_requested_at = now;
          next.refund_processed_at = null;
          next.refund_processed_by = null;
          next.refund_reject_reason = null;
          write.openRefund = {
            refund_number: this.ids.refundNumber(),
            order_id: order.id,
            merchant_id: order.merchant_id,
            amount: order.final_amount,
            reason: reason ?? '',
            explanation: next.refund_explanation,
            evidence: next.refund_evidence,
            pre_refund_status: from,
            status: REFUND_STATUS.REQUESTED,
            processed_by: null,
            reject_reason: null,
            requested_at: now,
            processed_at: null,
          };
          break;
        case ORDER_STATUS.REFUNDED:
          next.refunded_at = now;
          next.refund_processed_at = now;
          next.refund_processed_by = actor.id;
          if (order.payment_status === PAYMENT_STATUS.PAID) {
            next.payment_status = PAYMENT_STATUS.REFUNDED;
          }
          write.closeRefund = {
            order_id: order.id,
            status: REFUND_STATUS.APPROVED,
            processed_by: actor.id,
            reject_reason: null,
            processed_at: now,
          };
          break;
        default:
          break;
      }
    }

    const saved = await this.store.orders.save(write);
    if (!saved) {
      throw new ConcurrencyConflictError(`Order ${order.order_number} was modified concurrently`);
    }

    auditLog('order.transition', {
      order_id: order.id,
      order_number: order.order_number,
      from,
      to: target,
      actor_id: actor.id,
      actor_role: actor.role,
      reason,
      ...(context.redemption && {
        staff_id: context.redemption.staffId,
        verification_method: context.redemption.method,
      }),
    });

    return next;
  }

  /**
   * Cập nhật thanh toán; không đổi trạng thái đơn hàng hay số tiền.
   */
  async recordPayment(orderId: string, paymentStatus: PaymentStatus, paymentMethod?: PaymentMethod): Promise<Order> {
    const input = parseInput(recordPaymentSchema, {
      order_id: orderId,
      payment_status: paymentStatus,
      payment_method: paymentMethod,
    });
    const order = await this.getOrder(input.order_id);
    const now = this.now();

    const next: Order = {
      ...order,
      payment_status: input.payment_status,
      payment_method: input.payment_method ?? order.payment_method,
      paid_at: input.payment_status === PAYMENT_STATUS.PAID ? order.paid_at ?? now : order.paid_at,
      version: order.version + 1,
      updated_at: now,
    };

    const saved = await this.store.orders.save({ order: next, expectedVersion: order.version });
    if (!saved) {
      throw new ConcurrencyConflictError(`Order ${order.order_number} was modified concurrently`);
    }

    auditLog('order.payment', {
      order_id: order.id,
      order_number: order.order_number,
      payment_status: next.payment_status,
      payment_method: next.payment_method,
    });
    return next;
  }
}
