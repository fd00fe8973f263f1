import { MigrationInfo } from './types';

// Import all migrations
import * as migration001 from './20261019_000001_create_merchants_table';
import * as migration002 from './20261019_000002_create_orders_table';
import * as migration003 from './20261019_000003_create_order_items_table';
import * as migration004 from './20261019_000004_create_order_status_history_table';
import * as migration005 from './20261019_000005_create_verification_records_table';
import * as migration006 from './20261019_000006_create_refunds_table';
import * as migration007 from './20261019_000007_create_finance_daily_summaries_table';
import * as migration008 from './20261019_000008_create_settlement_records_table';
import * as migration009 from './20261019_000009_create_reconciliation_logs_table';
import * as migration010 from './20261019_000010_create_report_exports_table';

export const migrations: MigrationInfo[] = [
  { name: '20261019_000001_create_merchants_table', migration: migration001.migration },
  { name: '20261019_000002_create_orders_table', migration: migration002.migration },
  { name: '20261019_000003_create_order_items_table', migration: migration003.migration },
  { name: '20261019_000004_create_order_status_history_table', migration: migration004.migration },
  { name: '20261019_000005_create_verification_records_table', migration: migration005.migration },
  { name: '20261019_000006_create_refunds_table', migration: migration006.migration },
  { name: '20261019_000007_create_finance_daily_summaries_table', migration: migration007.migration },
  { name: '20261019_000008_create_settlement_records_table', migration: migration008.migration },
  { name: '20261019_000009_create_reconciliation_logs_table', migration: migration009.migration },
  { name: '20261019_000010_create_report_exports_table', migration: migration010.migration },
];

export type { Migration, MigrationInfo } from './types';
