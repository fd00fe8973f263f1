import { promises as fsPromises } from 'fs';
import { FINANCE_JOB } from '../../constants';
import type { FinanceJobName } from '../../constants';
import type { FinanceConfig, JobsConfig } from '../../connections/config';
import type { DataStore } from '../../connections/db/datastore';
import type { ReportExport } from '../../connections/db/models';
import {
  businessDayRange,
  isBusinessDate,
  previousBusinessDate,
  previousWeekRange,
} from '../../utils/date';
import type { BusinessDate, BusinessPeriod } from '../../utils/date';
import { ExternalIOError, ValidationError, errorMessage } from '../../utils/errors';
import type { IdGenerator } from '../../utils/id-generator';
import { auditLog, getLogger } from '../../utils/logging';
import { reconcileDay, settlePeriod, summarizeDay } from './finance.calculations';
import { runUnits, summarizeRun } from './finance.runner';
import type { JobRunSummary, UnitOutcome, UnitResult } from './finance.runner';

const log = getLogger('finance-jobs');

const REMOTE_FILE_PATTERN = /^https?:\/\//i;

export interface FileRemover {
  unlink(path: string): Promise<void>;
}

export interface FinanceJobsDeps {
  store: DataStore;
  ids: IdGenerator;
  finance: FinanceConfig;
  jobs: Pick<JobsConfig, 'merchantTimeoutMs' | 'concurrency'>;
  now?: () => Date;
  files?: FileRemover;
}

const isErrnoException = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && 'code' in err;

/**
 * Settlement / reconciliation / cleanup batch jobs.
 *
 * Mỗi job: lấy danh sách merchant đang hoạt động (lỗi ở bước này dừng cả run),
 * xử lý từng merchant độc lập với timeout riêng, ghi kết quả theo kiểu upsert
 * theo (merchant, kỳ), rồi gom thành JobRunSummary.
 */
export class FinanceJobs {
  private readonly store: DataStore;
  private readonly ids: IdGenerator;
  private readonly finance: FinanceConfig;
  private readonly jobs: Pick<JobsConfig, 'merchantTimeoutMs' | 'concurrency'>;
  private readonly now: () => Date;
  private readonly files: FileRemover;

  constructor(deps: FinanceJobsDeps) {
    this.store = deps.store;
    this.ids = deps.ids;
    this.finance = deps.finance;
    this.jobs = deps.jobs;
    this.now = deps.now ?? (() => new Date());
    this.files = deps.files ?? { unlink: (path) => fsPromises.unlink(path) };
  }

  /** Defaults to yesterday's business date. */
  async runDailySummary(businessDate?: BusinessDate): Promise<JobRunSummary> {
    const offset = this.finance.businessUtcOffsetMinutes;
    const day = this.resolveDate(businessDate);
    const range = businessDayRange(day, offset);

    return this.runPerMerchant(FINANCE_JOB.DAILY_SUMMARY, day, async (merchantId) => {
      const [redemptions, refundedOrders] = await Promise.all([
        this.store.verificationRecords.listRedemptions(merchantId, range),
        this.store.finance.listRefundedOrders(merchantId, range),
      ]);

      const summary = summarizeDay({
        merchantId,
        businessDate: day,
        redemptions,
        refundedOrders,
        commissionRate: this.finance.commissionRate,
        currency: this.finance.currency,
        generatedAt: this.now(),
      });
      if (!summary) {
        return { status: 'skipped', detail: 'no activity' };
      }

      await this.store.finance.upsertDailySummary(summary);
      return {
        status: 'success',
        detail: `orders=${summary.order_count} income=${summary.total_income} net=${summary.net_income}`,
      };
    });
  }

  /** Defaults to Monday..Sunday of the previous week. */
  async runWeeklySettlement(period?: BusinessPeriod): Promise<JobRunSummary> {
    const resolved = this.resolvePeriod(period);

    return this.runPerMerchant(FINANCE_JOB.WEEKLY_SETTLEMENT, `${resolved.start}..${resolved.end}`, async (merchantId) => {
      const summaries = await this.store.finance.listDailySummaries(merchantId, resolved);
      const record = settlePeriod({
        merchantId,
        period: resolved,
        summaries,
        settlementNumber: () => this.ids.settlementNumber(),
        currency: this.finance.currency,
        generatedAt: this.now(),
      });
      if (!record) {
        return { status: 'skipped', detail: 'nothing to settle' };
      }

      const { record: stored, created } = await this.store.finance.insertSettlementIfAbsent(record);
      if (!created) {
        return { status: 'skipped', detail: `already settled as ${stored.settlement_number}` };
      }

      auditLog('finance.settlement.created', {
        settlement_number: stored.settlement_number,
        merchant_id: merchantId,
        period_start: stored.period_start,
        period_end: stored.period_end,
        net_payable: stored.net_payable,
      });
      return { status: 'success', detail: `${stored.settlement_number} net=${stored.net_payable}` };
    });
  }

  /** Defaults to yesterday's business date. */
  async runDailyReconciliation(businessDate?: BusinessDate): Promise<JobRunSummary> {
    const day = this.resolveDate(businessDate);
    const range = businessDayRange(day, this.finance.businessUtcOffsetMinutes);

    return this.runPerMerchant(FINANCE_JOB.DAILY_RECONCILIATION, day, async (merchantId) => {
      const [summary, redemptions] = await Promise.all([
        this.store.finance.findDailySummary(merchantId, day),
        this.store.verificationRecords.listRedemptions(merchantId, range),
      ]);

      const reconciliation = reconcileDay({
        merchantId,
        businessDate: day,
        summary,
        redemptions,
        generatedAt: this.now(),
      });
      if (!reconciliation) {
        return { status: 'skipped', detail: 'no activity' };
      }

      await this.store.finance.upsertReconciliationLog(reconciliation);
      if (reconciliation.status === 'mismatched') {
        log.warn('Reconciliation mismatch', {
          merchant_id: merchantId,
          business_date: day,
          discrepancy: reconciliation.discrepancy,
          mismatched_orders: reconciliation.mismatched_orders,
        });
      }
      return { status: 'success', detail: reconciliation.status };
    });
  }

  /**
   * Xóa file export đã hết hạn. URL từ xa không bị động tới; file local không tồn tại
   * coi như đã xóa. Row chỉ bị xóa khi file đã được xử lý xong.
   */
  async runReportCleanup(asOf?: Date): Promise<JobRunSummary> {
    const now = asOf ?? this.now();
    const startedAt = this.now();

    const expired = await this.store.reportExports.listExpired(now);
    const outcomes = await runUnits(expired, (row) => row.id, (row) => this.cleanupExport(row), this.fanOut());

    return this.finish(FINANCE_JOB.REPORT_CLEANUP, now.toISOString(), outcomes, startedAt);
  }

  private async cleanupExport(row: ReportExport): Promise<UnitResult> {
    if (row.file_path.trim() === '') {
      throw new ValidationError(`Export ${row.id} has no file path`);
    }

    let detail: string;
    if (REMOTE_FILE_PATTERN.test(row.file_path)) {
      detail = 'remote file left in place';
    } else {
      try {
        await this.files.unlink(row.file_path);
        detail = 'file deleted';
      } catch (err: unknown) {
        if (!isErrnoException(err) || err.code !== 'ENOENT') {
          throw new ExternalIOError(`Cannot delete ${row.file_path}: ${errorMessage(err)}`, err);
        }
        log.warn('Expired export file already missing', { export_id: row.id, file_path: row.file_path });
        detail = 'file already missing';
      }
    }

    await this.store.reportExports.delete(row.id);
    return { status: 'success', detail };
  }

  private async runPerMerchant(
    job: FinanceJobName,
    period: string,
    task: (merchantId: string) => Promise<UnitResult>,
  ): Promise<JobRunSummary> {
    const startedAt = this.now();
    const merchants = await this.store.merchants.listActive();
    log.info(`Running ${job} for ${period}`, { merchants: merchants.length });

    const outcomes = await runUnits(merchants, (merchant) => merchant.id, (merchant) => task(merchant.id), this.fanOut());
    return this.finish(job, period, outcomes, startedAt);
  }

  private finish(job: FinanceJobName, period: string, outcomes: UnitOutcome[], startedAt: Date): JobRunSummary {
    const summary = summarizeRun(job, period, outcomes, startedAt, this.now());

    for (const outcome of outcomes) {
      if (outcome.status === 'error') {
        log.error(`${job} failed for ${outcome.unit}`, { period, error: outcome.detail, code: outcome.error_code });
      }
    }

    auditLog('finance.job.finished', {
      job,
      period,
      success_count: summary.success_count,
      error_count: summary.error_count,
      skipped_count: summary.skipped_count,
    });
    return summary;
  }

  private fanOut() {
    return { concurrency: this.jobs.concurrency, timeoutMs: this.jobs.merchantTimeoutMs };
  }

  private resolveDate(businessDate?: BusinessDate): BusinessDate {
    const day = businessDate ?? previousBusinessDate(this.now(), this.finance.businessUtcOffsetMinutes);
    if (!isBusinessDate(day)) {
      throw new ValidationError(`Invalid business date: ${day}`, [{ path: 'business_date', message: 'Ngày không hợp lệ' }]);
    }
    return day;
  }

  private resolvePeriod(period?: BusinessPeriod): BusinessPeriod {
    const resolved = period ?? previousWeekRange(this.now(), this.finance.businessUtcOffsetMinutes);
    if (!isBusinessDate(resolved.start) || !isBusinessDate(resolved.end) || resolved.start > resolved.end) {
      throw new ValidationError(`Invalid settlement period: ${resolved.start}..${resolved.end}`, [
        { path: 'period', message: 'Kỳ đối soát không hợp lệ' },
      ]);
    }
    return resolved;
  }
}
