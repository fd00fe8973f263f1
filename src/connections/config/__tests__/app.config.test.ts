import { describe, expect, it } from 'vitest';
import { loadConfig } from '../app.config';
import { ValidationError } from '../../../utils/errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.dataStore).toBe('postgres');
    expect(config.jobLock).toBe('redis');
    expect(config.orders.redeemableStatuses).toEqual(['pending', 'confirmed', 'preparing', 'ready']);
    expect(config.ids.sequenceDigits).toBe(6);
    expect(config.finance).toEqual({ commissionRate: 0.02, businessUtcOffsetMinutes: 420, currency: 'VND' });
    expect(config.jobs.enabled).toBe(true);
    expect(config.jobs.timezone).toBe('Asia/Ho_Chi_Minh');
    expect(config.jobs.schedules).toEqual({
      dailySummary: '0 1 * * *',
      weeklySettlement: '0 2 * * 1',
      dailyReconciliation: '0 3 * * *',
      reportCleanup: '0 4 * * *',
    });
    expect(config.redis.password).toBeUndefined();
    expect(config.db.connectionString).toBeUndefined();
  });

  it('parses numeric and list values', () => {
    const config = loadConfig({
      DATA_STORE: 'memory',
      COMMISSION_RATE: '0.05',
      JOB_CONCURRENCY: '3',
      REDEEMABLE_STATUSES: 'confirmed, preparing',
      JOBS_ENABLED: 'false',
    });

    expect(config.dataStore).toBe('memory');
    expect(config.finance.commissionRate).toBe(0.05);
    expect(config.jobs.concurrency).toBe(3);
    expect(config.jobs.enabled).toBe(false);
    // ready luôn nằm trong danh sách
    expect(config.orders.redeemableStatuses).toEqual(['confirmed', 'preparing', 'ready']);
  });

  it('collects every logging setting in one place', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      LOG_LEVEL: 'debug',
      LOG_DIR: '/var/log/marketplace',
      LOG_ROTATION: '1day',
      LOG_RETENTION: '7d',
      LOG_COMPRESS: 'false',
    });

    expect(config.log).toEqual({
      level: 'debug',
      dir: '/var/log/marketplace',
      rotation: '1day',
      retention: '7d',
      compress: false,
      silent: true,
    });
    expect(loadConfig({ NODE_ENV: 'production' }).log.silent).toBe(false);
  });

  it.each([
    ['LOG_COMPRESS', 'maybe'],
    ['DATA_STORE', 'mongo'],
    ['COMMISSION_RATE', '1'],
    ['COMMISSION_RATE', '-0.1'],
    ['REDEEMABLE_STATUSES', 'verified'],
    ['CRON_DAILY_SUMMARY', 'every night'],
    ['JOB_LOCK', 'zookeeper'],
  ])('rejects %s=%s', (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(ValidationError);
  });
});
