import { schedule } from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { FINANCE_JOB, FINANCE_JOBS, JOB_LOCK_PREFIX } from '../../constants';
import type { FinanceJobName } from '../../constants';
import type { JobsConfig } from '../../connections/config';
import { errorMessage } from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import type { FinanceJobs } from './finance.jobs';
import type { JobLock } from './finance.lock';
import type { JobRunSummary } from './finance.runner';

const log = getLogger('finance-scheduler');

export interface FinanceSchedulerDeps {
  jobs: FinanceJobs;
  lock: JobLock;
  config: Pick<JobsConfig, 'timezone' | 'schedules' | 'lockTtlMs'>;
}

/**
 * Cron wiring for the finance jobs:
 *   01:00 daily summary, Mon 02:00 weekly settlement,
 *   03:00 reconciliation, 04:00 report cleanup (configurable).
 */
export class FinanceScheduler {
  private readonly jobs: FinanceJobs;
  private readonly lock: JobLock;
  private readonly config: FinanceSchedulerDeps['config'];
  private tasks: ScheduledTask[] = [];

  constructor(deps: FinanceSchedulerDeps) {
    this.jobs = deps.jobs;
    this.lock = deps.lock;
    this.config = deps.config;
  }

  get running(): boolean {
    return this.tasks.length > 0;
  }

  start(): void {
    if (this.running) {
      return;
    }

    for (const job of FINANCE_JOBS) {
      const expression = this.expressionFor(job);
      const task = schedule(
        expression,
        () => {
          this.trigger(job).catch((err: unknown) => {
            log.error(`Scheduled ${job} run failed`, { error: errorMessage(err) });
          });
        },
        { timezone: this.config.timezone },
      );
      this.tasks.push(task);
      log.info(`Scheduled ${job}`, { cron: expression, timezone: this.config.timezone });
    }
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    log.info('Finance scheduler stopped');
  }

  /**
   * Run a job now. Resolves to null when a previous run still holds the lock.
   */
  async trigger(job: FinanceJobName): Promise<JobRunSummary | null> {
    const key = `${JOB_LOCK_PREFIX}${job}`;
    const token = await this.lock.acquire(key, this.config.lockTtlMs);
    if (!token) {
      log.warn(`Skipping ${job}: previous run still in flight`);
      return null;
    }

    try {
      return await this.run(job);
    } finally {
      const released = await this.lock.release(key, token);
      if (!released) {
        log.warn(`Lock for ${job} expired before the run finished`);
      }
    }
  }

  private run(job: FinanceJobName): Promise<JobRunSummary> {
    switch (job) {
      case FINANCE_JOB.DAILY_SUMMARY:
        return this.jobs.runDailySummary();
      case FINANCE_JOB.WEEKLY_SETTLEMENT:
        return this.jobs.runWeeklySettlement();
      case FINANCE_JOB.DAILY_RECONCILIATION:
        return this.jobs.runDailyReconciliation();
      case FINANCE_JOB.REPORT_CLEANUP:
        return this.jobs.runReportCleanup();
    }
  }

  private expressionFor(job: FinanceJobName): string {
    const { schedules } = this.config;
    switch (job) {
      case FINANCE_JOB.DAILY_SUMMARY:
        return schedules.dailySummary;
      case FINANCE_JOB.WEEKLY_SETTLEMENT:
        return schedules.weeklySettlement;
      case FINANCE_JOB.DAILY_RECONCILIATION:
        return schedules.dailyReconciliation;
      case FINANCE_JOB.REPORT_CLEANUP:
        return schedules.reportCleanup;
    }
  }
}
