/**
 * Order Status Constants
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  CONFIRMED: 'confirmed',
  PREPARING: 'preparing',
  READY: 'ready',
  VERIFIED: 'verified',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
  REFUNDING: 'refunding',
  REFUNDED: 'refunded',
} as const;

export type OrderStatus = typeof ORDER_STATUS[keyof typeof ORDER_STATUS];

export const ORDER_STATUSES = [
  ORDER_STATUS.PENDING,
  ORDER_STATUS.CONFIRMED,
  ORDER_STATUS.PREPARING,
  ORDER_STATUS.READY,
  ORDER_STATUS.VERIFIED,
  ORDER_STATUS.COMPLETED,
  ORDER_STATUS.CANCELLED,
  ORDER_STATUS.REFUNDING,
  ORDER_STATUS.REFUNDED,
] as const;

// Không có transition nào đi ra từ các trạng thái này
export const TERMINAL_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.COMPLETED,
  ORDER_STATUS.CANCELLED,
  ORDER_STATUS.REFUNDED,
];

/**
 * Statuses an operator may configure as redeemable at point of sale.
 * READY is always redeemable.
 */
export const REDEEMABLE_CANDIDATES = [
  ORDER_STATUS.PENDING,
  ORDER_STATUS.CONFIRMED,
  ORDER_STATUS.PREPARING,
  ORDER_STATUS.READY,
] as const;

export type RedeemableStatus = typeof REDEEMABLE_CANDIDATES[number];

export const REFUNDABLE_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.PENDING,
  ORDER_STATUS.VERIFIED,
];

/**
 * Payment Status Constants
 */
export const PAYMENT_STATUS = {
  PENDING: 'pending',
  PAID: 'paid',
  FAILED: 'failed',
  REFUNDED: 'refunded',
} as const;

export type PaymentStatus = typeof PAYMENT_STATUS[keyof typeof PAYMENT_STATUS];

export const PAYMENT_STATUSES = [
  PAYMENT_STATUS.PENDING,
  PAYMENT_STATUS.PAID,
  PAYMENT_STATUS.FAILED,
  PAYMENT_STATUS.REFUNDED,
] as const;

/**
 * Payment Method Constants
 */
export const PAYMENT_METHOD = {
  MOMO: 'momo',
  ZALO_PAY: 'zalo_pay',
  CASH: 'cash',
  BANK_CARD: 'bank_card',
  CREDIT_CARD: 'credit_card',
} as const;

export type PaymentMethod = typeof PAYMENT_METHOD[keyof typeof PAYMENT_METHOD];

export const PAYMENT_METHODS = [
  PAYMENT_METHOD.MOMO,
  PAYMENT_METHOD.ZALO_PAY,
  PAYMENT_METHOD.CASH,
  PAYMENT_METHOD.BANK_CARD,
  PAYMENT_METHOD.CREDIT_CARD,
] as const;

/**
 * Verification (redemption) methods
 */
export const VERIFICATION_METHOD = {
  CODE: 'code',
  QR: 'qr',
  BATCH: 'batch',
} as const;

export type VerificationMethod = typeof VERIFICATION_METHOD[keyof typeof VERIFICATION_METHOD];

export const VERIFICATION_METHODS = [
  VERIFICATION_METHOD.CODE,
  VERIFICATION_METHOD.QR,
  VERIFICATION_METHOD.BATCH,
] as const;

/**
 * Refund ledger status
 */
export const REFUND_STATUS = {
  REQUESTED: 'requested',
  APPROVED: 'approved',
  REJECTED: 'rejected',
} as const;

export type RefundStatus = typeof REFUND_STATUS[keyof typeof REFUND_STATUS];

export const REFUND_STATUSES = [
  REFUND_STATUS.REQUESTED,
  REFUND_STATUS.APPROVED,
  REFUND_STATUS.REJECTED,
] as const;

/**
 * Actor roles recorded in order_status_history
 */
export const ACTOR_ROLE = {
  CUSTOMER: 'customer',
  STAFF: 'staff',
  MERCHANT: 'merchant',
  ADMIN: 'admin',
  SYSTEM: 'system',
} as const;

export type ActorRole = typeof ACTOR_ROLE[keyof typeof ACTOR_ROLE];

export const ACTOR_ROLES = [
  ACTOR_ROLE.CUSTOMER,
  ACTOR_ROLE.STAFF,
  ACTOR_ROLE.MERCHANT,
  ACTOR_ROLE.ADMIN,
  ACTOR_ROLE.SYSTEM,
] as const;

/**
 * Business identifier prefixes
 */
export const ID_PREFIX = {
  ORDER: 'ORD',
  PAYMENT: 'PAY',
  REFUND: 'REF',
  SETTLEMENT: 'SET',
} as const;

// Bỏ các ký tự dễ nhầm (0/O, 1/I/L) khỏi mã nhập tay
export const VERIFICATION_CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';
export const VERIFICATION_CODE_LENGTH = 8;
