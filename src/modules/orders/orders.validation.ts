import { z } from 'zod';
import {
  ACTOR_ROLES,
  ORDER_STATUSES,
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
} from '../../constants';

const idSchema = z.string().trim().min(1, 'ID không được để trống');

const orderItemSchema = z.object({
  product_id: idSchema,
  product_name: z.string().trim().min(1, 'Tên sản phẩm không được để trống'),
  unit_price: z.number().int('Đơn giá phải là số nguyên').nonnegative('Đơn giá không được âm'),
  quantity: z.number().int().positive('Số lượng phải lớn hơn 0'),
});

export const createOrderSchema = z
  .object({
    merchant_id: idSchema,
    store_id: idSchema.nullable().optional(),
    user_id: idSchema,
    items: z.array(orderItemSchema).min(1, 'Đơn hàng phải có ít nhất một sản phẩm'),
    discount_amount: z.number().int('Giảm giá phải là số nguyên').nonnegative('Giảm giá không được âm').default(0),
    currency: z.string().regex(/^[A-Z]{3}$/, 'Mã tiền tệ không hợp lệ').optional(),
    payment_method: z.enum(PAYMENT_METHODS, {
      errorMap: () => ({ message: `Phương thức thanh toán phải là: ${PAYMENT_METHODS.join(', ')}` }),
    }),
    payment_status: z.enum(PAYMENT_STATUSES).default('pending'),
  })
  .refine(
    (input) => input.discount_amount <= input.items.reduce((sum, item) => sum + item.unit_price * item.quantity, 0),
    { message: 'Giảm giá không được lớn hơn tổng tiền', path: ['discount_amount'] },
  );

export const actorSchema = z.object({
  id: idSchema,
  role: z.enum(ACTOR_ROLES, {
    errorMap: () => ({ message: `Actor role phải là: ${ACTOR_ROLES.join(', ')}` }),
  }),
});

export const transitionSchema = z.object({
  order_id: idSchema,
  target_status: z.enum(ORDER_STATUSES, {
    errorMap: () => ({ message: 'Trạng thái đơn hàng không hợp lệ' }),
  }),
  actor: actorSchema,
  reason: z.string().trim().optional(),
});

export const recordPaymentSchema = z.object({
  order_id: idSchema,
  payment_status: z.enum(PAYMENT_STATUSES, {
    errorMap: () => ({ message: 'Trạng thái thanh toán không hợp lệ' }),
  }),
  payment_method: z.enum(PAYMENT_METHODS).optional(),
});
