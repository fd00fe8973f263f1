import type { AppConfig } from './connections/config';
import type { DataStore } from './connections/db/datastore';
import { MemoryDataStore } from './connections/db/memory.datastore';
import { PgDataStore } from './connections/db/pg.datastore';
import { createPool } from './connections/db/connection';
import type { RedisClient } from './connections/redis';
import { IdGenerator } from './utils/id-generator';
import { OrderStateMachine } from './modules/orders/orders.state-machine';
import { OrderService } from './modules/orders/orders.service';
import { VerificationService } from './modules/verification/verification.service';
import { RefundService } from './modules/refunds/refunds.service';
import { FinanceJobs } from './modules/finance/finance.jobs';
import type { FileRemover } from './modules/finance/finance.jobs';
import { ReconciliationService } from './modules/finance/finance.reconciliation';
import { FinanceScheduler } from './modules/finance/finance.scheduler';
import { MemoryJobLock, RedisJobLock } from './modules/finance/finance.lock';
import type { JobLock } from './modules/finance/finance.lock';

export interface Application {
  config: AppConfig;
  store: DataStore;
  ids: IdGenerator;
  orders: OrderService;
  verification: VerificationService;
  refunds: RefundService;
  financeJobs: FinanceJobs;
  reconciliation: ReconciliationService;
  scheduler: FinanceScheduler;
}

export interface ApplicationDeps {
  store: DataStore;
  jobLock: JobLock;
  now?: () => Date;
  files?: FileRemover;
}

/**
 * Chọn DataStore theo cấu hình; không fallback ngầm sang memory khi Postgres lỗi.
 */
export const createDataStore = (config: AppConfig): DataStore =>
  config.dataStore === 'memory' ? new MemoryDataStore() : new PgDataStore(createPool(config.db));

export const createJobLock = (config: AppConfig, redis: RedisClient | null): JobLock => {
  if (config.jobLock === 'memory') {
    return new MemoryJobLock();
  }
  if (!redis) {
    throw new Error('JOB_LOCK=redis requires a Redis client');
  }
  return new RedisJobLock(redis);
};

/**
 * Composition root: wires the services around an explicitly passed datastore and job lock.
 */
export const buildApplication = (config: AppConfig, deps: ApplicationDeps): Application => {
  const now = deps.now ?? (() => new Date());
  const ids = new IdGenerator({
    sequenceDigits: config.ids.sequenceDigits,
    now: () => now().getTime(),
  });

  const orders = new OrderService({
    store: deps.store,
    ids,
    stateMachine: new OrderStateMachine(config.orders.redeemableStatuses),
    currency: config.finance.currency,
    now,
  });
  const verification = new VerificationService({ store: deps.store, orders, now });
  const refunds = new RefundService({ store: deps.store, orders, now });
  const financeJobs = new FinanceJobs({
    store: deps.store,
    ids,
    finance: config.finance,
    jobs: config.jobs,
    now,
    files: deps.files,
  });
  const reconciliation = new ReconciliationService({ store: deps.store, now });
  const scheduler = new FinanceScheduler({ jobs: financeJobs, lock: deps.jobLock, config: config.jobs });

  return {
    config,
    store: deps.store,
    ids,
    orders,
    verification,
    refunds,
    financeJobs,
    reconciliation,
    scheduler,
  };
};
