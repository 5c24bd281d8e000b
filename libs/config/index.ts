export { default as metricsConfig, MetricsConfig } from './metrics.config';
export {
  default as inventoryConfig,
  InventoryConfig,
  DEFAULT_LOW_STOCK_THRESHOLD,
} from './inventory.config';
export {
  EnvironmentVariables,
  validateEnvironment,
} from './environment.validation';
