import { RECONCILIATION_STATUS } from '../../constants';
import type { DataStore } from '../../connections/db/datastore';
import type { ReconciliationLog } from '../../connections/db/models';
import { InvalidStateError, NotFoundError, ValidationError, parseInput } from '../../utils/errors';
import { auditLog, getLogger } from '../../utils/logging';
import { disputeReconciliationSchema, reconciliationQuerySchema } from './finance.validation';

const log = getLogger('reconciliation');

export interface ReconciliationServiceDeps {
  store: DataStore;
  now?: () => Date;
}

/**
 * Merchant-facing side of daily reconciliation: đọc log và khiếu nại các đơn bị lệch.
 */
export class ReconciliationService {
  private readonly store: DataStore;
  private readonly now: () => Date;

  constructor(deps: ReconciliationServiceDeps) {
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
  }

  async getReconciliationLog(merchantId: string, businessDate: string): Promise<ReconciliationLog> {
    const query = parseInput(reconciliationQuerySchema, { merchant_id: merchantId, business_date: businessDate });
    const found = await this.store.finance.findReconciliationLog(query.merchant_id, query.business_date);
    if (!found) {
      throw new NotFoundError(`No reconciliation for merchant ${query.merchant_id} on ${query.business_date}`);
    }
    return found;
  }

  /**
   * Only a mismatched log can be disputed, and only for orders it lists as mismatched.
   * Orders outside that list are ignored; if none remain the dispute is rejected.
   */
  async disputeReconciliation(
    merchantId: string,
    businessDate: string,
    orderNumbers: string[],
    reason: string,
  ): Promise<ReconciliationLog> {
    const input = parseInput(disputeReconciliationSchema, {
      merchant_id: merchantId,
      business_date: businessDate,
      order_numbers: orderNumbers,
      reason,
    });
    const current = await this.getReconciliationLog(input.merchant_id, input.business_date);

    if (current.status !== RECONCILIATION_STATUS.MISMATCHED) {
      throw new InvalidStateError(
        `Reconciliation for ${current.merchant_id} on ${current.business_date} is '${current.status}'; only mismatched logs can be disputed`,
      );
    }

    const requested = [...new Set(input.order_numbers)];
    const disputed = requested.filter((orderNumber) => current.mismatched_orders.includes(orderNumber));
    if (disputed.length === 0) {
      throw new ValidationError('None of the disputed orders are listed as mismatched', [
        { path: 'order_numbers', message: 'Đơn hàng không nằm trong danh sách lệch' },
      ]);
    }
    if (disputed.length < requested.length) {
      log.warn('Dispute ignores orders outside the mismatch list', {
        merchant_id: current.merchant_id,
        business_date: current.business_date,
        ignored: requested.filter((orderNumber) => !disputed.includes(orderNumber)),
      });
    }

    const updated = await this.store.finance.resolveReconciliationOrders({
      merchant_id: current.merchant_id,
      business_date: current.business_date,
      order_numbers: disputed,
      reason: input.reason,
      disputed_at: this.now(),
    });
    if (!updated) {
      throw new NotFoundError(`No reconciliation for merchant ${current.merchant_id} on ${current.business_date}`);
    }

    auditLog('reconciliation.disputed', {
      merchant_id: updated.merchant_id,
      business_date: updated.business_date,
      order_numbers: disputed,
      resolved_orders: updated.resolved_orders,
    });
    return updated;
  }
}
