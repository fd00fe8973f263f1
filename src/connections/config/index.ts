export { loadConfig } from './app.config';
export type {
  AppConfig,
  DbConfig,
  RedisConfig,
  LogConfig,
  OrdersConfig,
  IdsConfig,
  FinanceConfig,
  JobsConfig,
} from './app.config';
