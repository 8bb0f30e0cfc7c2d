export { loadConfig } from './config/load.js';
export { configSchema } from './config/schema.js';
export type { AppConfig, ExchangeConfig, RetryConfig } from './config/types.js';

export {
  AppError,
  ExchangeApiError,
  TRANSIENT_GATEWAY_SIGNATURES,
  ValidationError,
  classifyOrderError,
  isRetryableOrderError,
  isTransientGatewayError,
  type ErrorClass
} from './core/errors.js';
export { JsonLogger, type Logger, type LogLevel } from './core/logger.js';
export { InMemoryMetrics, type Metrics } from './core/metrics.js';
export { withRetry, type RetryPolicy } from './core/retry.js';
export * from './core/types.js';

export { createOrderRequest, validateOrderRequest } from './execution/orderRequest.js';

export type { OrderGateway } from './exchanges/adapter.js';
export {
  BinanceFuturesGateway,
  ORDER_RETRY_DEFAULTS,
  createGatewayFromConfig,
  toGatewayError,
  toOrderParams,
  type BinanceGatewayOptions,
  type GatewayCredentials
} from './exchanges/binance/adapter.js';
export type { BinanceCredentials } from './exchanges/binance/auth.js';
export { BinanceFuturesClient, type FuturesRestClient } from './exchanges/binance/client.js';

export { createGatewayTools, type GatewayFactory, type GatewayTool } from './agents/tools.js';

export { EnvSecretsProvider } from './secrets/envFallback.js';
export { loadExchangeCredentials, type SecretsProvider } from './secrets/provider.js';
