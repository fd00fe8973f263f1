import { z } from 'zod';
import { isBusinessDate } from '../../utils/date';

export const reconciliationQuerySchema = z.object({
  merchant_id: z.string().trim().min(1, 'Merchant ID không được để trống'),
  business_date: z.string().refine(isBusinessDate, 'Ngày không hợp lệ (YYYY-MM-DD)'),
});

export const disputeReconciliationSchema = reconciliationQuerySchema.extend({
  order_numbers: z
    .array(z.string().trim().min(1, 'Mã đơn hàng không được để trống'))
    .min(1, 'Cần ít nhất một đơn hàng'),
  reason: z.string().trim().min(1, 'Lý do không được để trống').max(2000, 'Lý do tối đa 2000 ký tự'),
});
