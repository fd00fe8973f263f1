import type { FinanceJobName } from '../../constants';
import { TimeoutError, errorCode, errorMessage } from '../../utils/errors';

export type UnitStatus = 'success' | 'skipped' | 'error';

export interface UnitResult {
  status: Exclude<UnitStatus, 'error'>;
  detail?: string;
}

export interface UnitOutcome {
  unit: string;
  status: UnitStatus;
  detail?: string;
  error_code?: string;
}

export interface JobRunSummary {
  job: FinanceJobName;
  period: string;
  success_count: number; // gồm cả skipped
  error_count: number;
  skipped_count: number;
  outcomes: UnitOutcome[];
  started_at: Date;
  finished_at: Date;
}

export interface FanOutOptions {
  concurrency: number;
  timeoutMs: number;
}

/**
 * Reject with TimeoutError if `task` has not settled after `ms`.
 * Task không bị hủy; kết quả muộn bị bỏ qua.
 */
export const withTimeout = <T>(task: () => Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([task(), timeout]).finally(() => clearTimeout(timer));
};

/**
 * Run `task` for every unit with at most `concurrency` in flight, each under its
 * own timeout. One outcome per unit, in input order; failures never abort the run.
 */
export const runUnits = async <U>(
  units: readonly U[],
  key: (unit: U) => string,
  task: (unit: U) => Promise<UnitResult>,
  options: FanOutOptions,
): Promise<UnitOutcome[]> => {
  const outcomes: UnitOutcome[] = new Array(units.length);
  let cursor = 0;

  const worker = async () => {
    while (cursor < units.length) {
      const index = cursor++;
      const unit = units[index];
      const name = key(unit);
      try {
        const result = await withTimeout(() => task(unit), options.timeoutMs, name);
        outcomes[index] = { unit: name, ...result };
      } catch (err: unknown) {
        outcomes[index] = { unit: name, status: 'error', detail: errorMessage(err), error_code: errorCode(err) };
      }
    }
  };

  const width = Math.max(1, Math.min(options.concurrency, units.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
  return outcomes;
};

export const summarizeRun = (
  job: FinanceJobName,
  period: string,
  outcomes: UnitOutcome[],
  startedAt: Date,
  finishedAt: Date,
): JobRunSummary => {
  const errors = outcomes.filter((outcome) => outcome.status === 'error').length;
  return {
    job,
    period,
    success_count: outcomes.length - errors,
    error_count: errors,
    skipped_count: outcomes.filter((outcome) => outcome.status === 'skipped').length,
    outcomes,
    started_at: startedAt,
    finished_at: finishedAt,
  };
};
