export * from './order.constants';
export * from './finance.constants';
