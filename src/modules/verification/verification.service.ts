import { z } from 'zod';
import { ACTOR_ROLE, ORDER_STATUS, VERIFICATION_METHOD } from '../../constants';
import type { VerificationMethod } from '../../constants';
import type { DataStore } from '../../connections/db/datastore';
import type { Order, VerificationRecord } from '../../connections/db/models';
import {
  ConcurrencyConflictError,
  InvalidStateError,
  NotFoundError,
  errorCode,
  errorMessage,
  parseInput,
} from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import type { OrderService } from '../orders/orders.service';
import { decodeQrPayload } from './verification.qr';

const log = getLogger('verification');

const MS_PER_DAY = 86_400_000;

const staffSchema = z.object({
  staff_id: z.string().trim().min(1, 'Staff ID không được để trống'),
  staff_name: z.string().trim().min(1, 'Tên nhân viên không được để trống'),
});

const codeSchema = z.string().trim().min(1, 'Mã xác thực không được để trống').transform((code) => code.toUpperCase());

const orderIdsSchema = z.array(z.string());

const orderIdSchema = z.string().trim().min(1, 'Order ID không được để trống');

const statsQuerySchema = z.object({
  merchant_id: z.string().trim().min(1),
  days: z.number().int().positive().max(366),
});

export interface BatchVerifySuccess {
  order_id: string;
  order: Order;
}

export interface BatchVerifyFailure {
  order_id: string;
  error_code: string;
  reason: string;
}

export interface BatchVerifyResult {
  succeeded: BatchVerifySuccess[];
  failed: BatchVerifyFailure[];
}

export interface StaffVerificationStats {
  staff_id: string;
  staff_name: string;
  verification_count: number;
  redeemed_amount: number;
}

export interface VerificationServiceDeps {
  store: DataStore;
  orders: OrderService;
  now?: () => Date;
}

/**
 * Redemption at point of sale: code, QR and batch.
 */
export class VerificationService {
  private readonly store: DataStore;
  private readonly orders: OrderService;
  private readonly now: () => Date;

  constructor(deps: VerificationServiceDeps) {
    this.store = deps.store;
    this.orders = deps.orders;
    this.now = deps.now ?? (() => new Date());
  }

  async verifyByCode(
    code: string,
    staffId: string,
    staffName: string,
    method: VerificationMethod = VERIFICATION_METHOD.CODE,
  ): Promise<Order> {
    const normalized = parseInput(codeSchema, code, 'Mã xác thực không hợp lệ');
    const staff = parseInput(staffSchema, { staff_id: staffId, staff_name: staffName });

    const order = await this.store.orders.findByVerificationCode(normalized);
    if (!order) {
      throw new NotFoundError(`No order matches verification code ${normalized}`);
    }
    return this.redeem(order, staff.staff_id, staff.staff_name, method);
  }

  async verifyByQR(payload: string, staffId: string, staffName: string): Promise<Order> {
    const code = decodeQrPayload(payload);
    return this.verifyByCode(code, staffId, staffName, VERIFICATION_METHOD.QR);
  }

  /**
   * Mỗi order là một đơn vị nguyên tử riêng; lỗi của order này không ảnh hưởng order khác.
   */
  async batchVerify(orderIds: string[], staffId: string, staffName: string): Promise<BatchVerifyResult> {
    const ids = parseInput(orderIdsSchema, orderIds);
    const staff = parseInput(staffSchema, { staff_id: staffId, staff_name: staffName });
    const result: BatchVerifyResult = { succeeded: [], failed: [] };

    for (const orderId of ids) {
      try {
        const id = parseInput(orderIdSchema, orderId, 'Order ID không hợp lệ');
        const order = await this.orders.getOrder(id);
        const verified = await this.redeem(order, staff.staff_id, staff.staff_name, VERIFICATION_METHOD.BATCH);
        result.succeeded.push({ order_id: orderId, order: verified });
      } catch (err: unknown) {
        result.failed.push({ order_id: orderId, error_code: errorCode(err), reason: errorMessage(err) });
      }
    }

    log.info('Batch verification finished', {
      staff_id: staff.staff_id,
      requested: ids.length,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
    });
    return result;
  }

  async listVerificationRecords(merchantId: string, from: Date, to: Date): Promise<VerificationRecord[]> {
    const redemptions = await this.store.verificationRecords.listRedemptions(merchantId, { start: from, end: to });
    return redemptions.map(({ record }) => record);
  }

  async getStaffVerificationStats(merchantId: string, days: number): Promise<StaffVerificationStats[]> {
    const query = parseInput(statsQuerySchema, { merchant_id: merchantId, days });
    const end = this.now();
    const start = new Date(end.getTime() - query.days * MS_PER_DAY);
    const redemptions = await this.store.verificationRecords.listRedemptions(query.merchant_id, { start, end });

    const byStaff = new Map<string, StaffVerificationStats>();
    for (const { record, order } of redemptions) {
      const stats = byStaff.get(record.staff_id) ?? {
        staff_id: record.staff_id,
        staff_name: record.staff_name,
        verification_count: 0,
        redeemed_amount: 0,
      };
      stats.verification_count += 1;
      stats.redeemed_amount += order.final_amount;
      byStaff.set(record.staff_id, stats);
    }

    return [...byStaff.values()].sort((a, b) => b.verification_count - a.verification_count);
  }

  private async redeem(order: Order, staffId: string, staffName: string, method: VerificationMethod): Promise<Order> {
    const stateMachine = this.orders.stateMachine;
    if (!stateMachine.isRedeemable(order.status)) {
      throw new InvalidStateError(`Order ${order.order_number} cannot be redeemed in status '${order.status}'`);
    }

    try {
      return await this.orders.transitionWith(
        order,
        ORDER_STATUS.VERIFIED,
        { id: staffId, role: ACTOR_ROLE.STAFF },
        { redemption: { staffId, staffName, method } },
      );
    } catch (err: unknown) {
      if (!(err instanceof ConcurrencyConflictError)) {
        throw err;
      }
      // Thua race: đọc lại để biết order đã bị redeem/đổi trạng thái chưa
      const fresh = await this.store.orders.findById(order.id);
      if (!fresh || !stateMachine.isRedeemable(fresh.status)) {
        throw new InvalidStateError(
          `Order ${order.order_number} cannot be redeemed in status '${fresh?.status ?? 'unknown'}'`,
        );
      }
      throw err;
    }
  }
}
