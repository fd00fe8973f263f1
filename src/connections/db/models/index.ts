export * from './order.model';
export * from './order-item.model';
export * from './order-status-history.model';
export * from './verification-record.model';
export * from './refund.model';
export * from './finance-daily-summary.model';
export * from './settlement-record.model';
export * from './reconciliation-log.model';
export * from './merchant.model';
export * from './report-export.model';
