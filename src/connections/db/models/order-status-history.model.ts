// OrderStatusHistory Model - một dòng cho mỗi transition thành công

import type { ActorRole, OrderStatus } from '../../../constants';

export interface OrderStatusHistory {
  id: string;
  order_id: string;
  from_status: OrderStatus;
  to_status: OrderStatus;
  actor_id: string;
  actor_role: ActorRole;
  reason: string | null;
  created_at: Date;
}

export type CreateOrderStatusHistoryInput = Omit<OrderStatusHistory, 'id'>;
