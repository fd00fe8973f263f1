import dotenv from 'dotenv';
import { z } from 'zod';
import { validate as isValidCron } from 'node-cron';
import { REDEEMABLE_CANDIDATES, ORDER_STATUS } from '../../constants';
import type { RedeemableStatus } from '../../constants';
import { fromZodError } from '../../utils/errors';
import type { LogSettings } from '../../utils/logging';

dotenv.config();

/**
 * Parse a comma or space separated list from an environment variable
 */
const parseList = (value: string): string[] =>
  value
    .split(/[,\s]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'], {
    errorMap: () => ({ message: 'Giá trị phải là true/false' }),
  })
  .transform((value) => value === 'true' || value === '1');

const cronExpression = z.string().refine((value) => isValidCron(value), {
  message: 'Cron expression không hợp lệ',
});

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  DATA_STORE: z.enum(['postgres', 'memory'], {
    errorMap: () => ({ message: 'DATA_STORE phải là: postgres hoặc memory' }),
  }).default('postgres'),

  DATABASE_URL: z.string().optional().transform((value) => value || undefined),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default('marketplace'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_CONNECT_RETRIES: z.coerce.number().int().positive().default(10),

  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional().transform((value) => value || undefined),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  JOB_LOCK: z.enum(['redis', 'memory'], {
    errorMap: () => ({ message: 'JOB_LOCK phải là: redis hoặc memory' }),
  }).default('redis'),

  LOG_LEVEL: z.string().default('info'),
  LOG_DIR: z.string().default('./logs'),
  LOG_ROTATION: z.string().default('10MB'),
  LOG_RETENTION: z.string().default('30d'),
  LOG_COMPRESS: booleanFlag.default('true'),

  REDEEMABLE_STATUSES: z.string().default(REDEEMABLE_CANDIDATES.join(',')),
  ID_SEQUENCE_DIGITS: z.coerce.number().int().min(1).max(9).default(6),

  COMMISSION_RATE: z.coerce.number().min(0).lt(1, 'COMMISSION_RATE phải nằm trong [0, 1)').default(0.02),
  BUSINESS_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(420),
  CURRENCY: z.string().regex(/^[A-Z]{3}$/, 'CURRENCY phải là mã ISO 4217').default('VND'),

  JOBS_ENABLED: booleanFlag.default('true'),
  JOBS_TIMEZONE: z.string().default('Asia/Ho_Chi_Minh'),
  CRON_DAILY_SUMMARY: cronExpression.default('0 1 * * *'),
  CRON_WEEKLY_SETTLEMENT: cronExpression.default('0 2 * * 1'),
  CRON_DAILY_RECONCILIATION: cronExpression.default('0 3 * * *'),
  CRON_REPORT_CLEANUP: cronExpression.default('0 4 * * *'),
  JOB_MERCHANT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  JOB_CONCURRENCY: z.coerce.number().int().positive().default(10),
  JOB_LOCK_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
});

const redeemableStatusSchema = z
  .array(z.enum(REDEEMABLE_CANDIDATES, {
    errorMap: () => ({ message: `REDEEMABLE_STATUSES chỉ nhận: ${REDEEMABLE_CANDIDATES.join(', ')}` }),
  }))
  .min(1, 'REDEEMABLE_STATUSES không được để trống');

export interface DbConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  connectRetries: number;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
}

export type LogConfig = LogSettings;

export interface OrdersConfig {
  redeemableStatuses: readonly RedeemableStatus[];
}

export interface IdsConfig {
  sequenceDigits: number;
}

export interface FinanceConfig {
  commissionRate: number;
  businessUtcOffsetMinutes: number;
  currency: string;
}

export interface JobsConfig {
  enabled: boolean;
  timezone: string;
  schedules: {
    dailySummary: string;
    weeklySettlement: string;
    dailyReconciliation: string;
    reportCleanup: string;
  };
  merchantTimeoutMs: number;
  concurrency: number;
  lockTtlMs: number;
}

export interface AppConfig {
  nodeEnv: string;
  dataStore: 'postgres' | 'memory';
  jobLock: 'redis' | 'memory';
  db: DbConfig;
  redis: RedisConfig;
  log: LogConfig;
  orders: OrdersConfig;
  ids: IdsConfig;
  finance: FinanceConfig;
  jobs: JobsConfig;
}

/**
 * Build the single typed configuration from environment variables.
 * Throws ValidationError on any invalid value.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Cấu hình không hợp lệ');
  }
  const e = parsed.data;

  const redeemable = redeemableStatusSchema.safeParse(parseList(e.REDEEMABLE_STATUSES));
  if (!redeemable.success) {
    throw fromZodError(redeemable.error, 'Cấu hình không hợp lệ');
  }
  // READY luôn được redeem
  const redeemableStatuses = redeemable.data.includes(ORDER_STATUS.READY)
    ? redeemable.data
    : [...redeemable.data, ORDER_STATUS.READY];

  return {
    nodeEnv: e.NODE_ENV,
    dataStore: e.DATA_STORE,
    jobLock: e.JOB_LOCK,
    db: {
      connectionString: e.DATABASE_URL,
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      max: e.DB_POOL_MAX,
      connectRetries: e.DB_CONNECT_RETRIES,
    },
    redis: {
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD,
      db: e.REDIS_DB,
    },
    log: {
      level: e.LOG_LEVEL,
      dir: e.LOG_DIR,
      rotation: e.LOG_ROTATION,
      retention: e.LOG_RETENTION,
      compress: e.LOG_COMPRESS,
      silent: e.NODE_ENV === 'test',
    },
    orders: {
      redeemableStatuses: Array.from(new Set(redeemableStatuses)),
    },
    ids: {
      sequenceDigits: e.ID_SEQUENCE_DIGITS,
    },
    finance: {
      commissionRate: e.COMMISSION_RATE,
      businessUtcOffsetMinutes: e.BUSINESS_UTC_OFFSET_MINUTES,
      currency: e.CURRENCY,
    },
    jobs: {
      enabled: e.JOBS_ENABLED,
      timezone: e.JOBS_TIMEZONE,
      schedules: {
        dailySummary: e.CRON_DAILY_SUMMARY,
        weeklySettlement: e.CRON_WEEKLY_SETTLEMENT,
        dailyReconciliation: e.CRON_DAILY_RECONCILIATION,
        reportCleanup: e.CRON_REPORT_CLEANUP,
      },
      merchantTimeoutMs: e.JOB_MERCHANT_TIMEOUT_MS,
      concurrency: e.JOB_CONCURRENCY,
      lockTtlMs: e.JOB_LOCK_TTL_MS,
    },
  };
};
