/**
 * Merchant Status Constants
 */
export const MERCHANT_STATUS = {
  ACTIVE: 'active',
  SUSPENDED: 'suspended',
  CLOSED: 'closed',
} as const;

export type MerchantStatus = typeof MERCHANT_STATUS[keyof typeof MERCHANT_STATUS];

export const MERCHANT_STATUSES = [
  MERCHANT_STATUS.ACTIVE,
  MERCHANT_STATUS.SUSPENDED,
  MERCHANT_STATUS.CLOSED,
] as const;

/**
 * Settlement Status Constants
 * Payout itself happens outside the core; a written record waits in `pending`.
 */
export const SETTLEMENT_STATUS = {
  PENDING: 'pending',
} as const;

export type SettlementStatus = typeof SETTLEMENT_STATUS[keyof typeof SETTLEMENT_STATUS];

export const SETTLEMENT_STATUSES = [SETTLEMENT_STATUS.PENDING] as const;

/**
 * Reconciliation Status Constants
 */
export const RECONCILIATION_STATUS = {
  MATCHED: 'matched',
  MISMATCHED: 'mismatched',
} as const;

export type ReconciliationStatus = typeof RECONCILIATION_STATUS[keyof typeof RECONCILIATION_STATUS];

export const RECONCILIATION_STATUSES = [
  RECONCILIATION_STATUS.MATCHED,
  RECONCILIATION_STATUS.MISMATCHED,
] as const;

/**
 * Finance batch job names (also used as job-lock keys)
 */
export const FINANCE_JOB = {
  DAILY_SUMMARY: 'daily-summary',
  WEEKLY_SETTLEMENT: 'weekly-settlement',
  DAILY_RECONCILIATION: 'daily-reconciliation',
  REPORT_CLEANUP: 'report-cleanup',
} as const;

export type FinanceJobName = typeof FINANCE_JOB[keyof typeof FINANCE_JOB];

export const FINANCE_JOBS = [
  FINANCE_JOB.DAILY_SUMMARY,
  FINANCE_JOB.WEEKLY_SETTLEMENT,
  FINANCE_JOB.DAILY_RECONCILIATION,
  FINANCE_JOB.REPORT_CLEANUP,
] as const;

export const JOB_LOCK_PREFIX = 'finance-job:';
