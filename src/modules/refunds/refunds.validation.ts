import { z } from 'zod';

const idSchema = z.string().trim().min(1, 'ID không được để trống');

export const requestRefundSchema = z.object({
  order_id: idSchema,
  reason: z.string().trim().min(1, 'Lý do không được để trống'),
  explanation: z.string().trim().max(2000, 'Giải thích tối đa 2000 ký tự').nullable().optional(),
  evidence: z.array(z.string().trim().min(1)).max(10, 'Tối đa 10 bằng chứng').nullable().optional(),
});

export const approveRefundSchema = z.object({
  order_id: idSchema,
  processed_by: idSchema,
});

export const rejectRefundSchema = z.object({
  order_id: idSchema,
  reject_reason: z.string().trim().min(1, 'Lý do từ chối không được để trống'),
  processed_by: idSchema,
});

export const refundStatsQuerySchema = z.object({
  merchant_id: idSchema,
  days: z.number().int().positive().max(366),
});
