import type { AppConfig } from '../../config/types.js';
import {
  ExchangeApiError,
  ValidationError,
  classifyOrderError,
  errorMessage,
  isRetryableOrderError
} from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { InMemoryMetrics } from '../../core/metrics.js';
import { withRetry } from '../../core/retry.js';
import type {
  AssetBalance,
  GatewayError,
  GatewayResult,
  OrderAck,
  OrderRequest,
  PositionLookup
} from '../../core/types.js';
import { validateOrderRequest } from '../../execution/orderRequest.js';
import type { OrderGateway } from '../adapter.js';
import type { BinanceCredentials } from './auth.js';
import { BinanceFuturesClient, type FuturesRestClient } from './client.js';
import { binanceFuturesEndpoints } from './endpoints.js';
import type { BinanceAccountResponse, BinanceOrderParams, BinancePositionRisk } from './types.js';

export const ORDER_RETRY_DEFAULTS = { maxAttempts: 3, baseDelayMs: 2000 };

export interface GatewayCredentials extends BinanceCredentials {
  testnet?: boolean;
}

export interface OrderRetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BinanceGatewayOptions {
  client?: FuturesRestClient;
  logger?: Logger;
  metrics?: InMemoryMetrics;
  timeoutMs?: number;
  recvWindowMs?: number;
  retry?: Partial<OrderRetrySettings>;
}

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

/** Map a validated request to the order endpoint's wire params. */
export const toOrderParams = (order: OrderRequest): BinanceOrderParams => {
  const params: BinanceOrderParams = {
    symbol: order.symbol,
    side: order.side,
    type: order.orderType,
    quantity: order.quantity
  };
  if (order.orderType === 'LIMIT') {
    params.price = order.price;
    params.timeInForce = 'GTC';
  }
  return params;
};

export const toGatewayError = (err: unknown): GatewayError =>
  err instanceof ExchangeApiError
    ? { code: err.exchangeCode, message: err.message }
    : { code: -1, message: errorMessage(err) };

/**
 * Order gateway for USDⓈ-M futures. The network flag is fixed at construction.
 * Order placement is retried on gateway faults; queries are sent once.
 */
export class BinanceFuturesGateway implements OrderGateway {
  readonly testnet: boolean;
  private readonly client: FuturesRestClient;
  private readonly logger: Logger;
  private readonly metrics: InMemoryMetrics;
  private readonly retry: OrderRetrySettings;

  constructor(credentials: GatewayCredentials, options: BinanceGatewayOptions = {}) {
    this.testnet = credentials.testnet ?? true;
    this.client =
      options.client ??
      new BinanceFuturesClient(
        { apiKey: credentials.apiKey, apiSecret: credentials.apiSecret },
        { testnet: this.testnet, timeoutMs: options.timeoutMs, recvWindowMs: options.recvWindowMs }
      );
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? new InMemoryMetrics();
    this.retry = {
      maxAttempts: options.retry?.maxAttempts ?? ORDER_RETRY_DEFAULTS.maxAttempts,
      baseDelayMs: options.retry?.baseDelayMs ?? ORDER_RETRY_DEFAULTS.baseDelayMs,
      sleep: options.retry?.sleep
    };
  }

  async placeOrder(order: OrderRequest): Promise<GatewayResult<OrderAck>> {
    const check = validateOrderRequest(order);
    if (!check.valid) {
      throw new ValidationError(check.reason);
    }

    const params = toOrderParams(order);
    this.logger.info('placing order', {
      symbol: order.symbol,
      side: order.side,
      type: order.orderType,
      quantity: order.quantity,
      price: order.price,
      testnet: this.testnet
    });

    try {
      const data = await withRetry(
        () => {
          this.metrics.increment('order.attempt');
          return this.client.signedRequest<OrderAck>('POST', binanceFuturesEndpoints.order(), params);
        },
        {
          maxAttempts: this.retry.maxAttempts,
          baseDelayMs: this.retry.baseDelayMs,
          isRetryable: isRetryableOrderError,
          sleep: this.retry.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            this.metrics.increment('order.retry');
            this.logger.warn('order attempt failed, retrying', {
              symbol: order.symbol,
              attempt,
              maxAttempts: this.retry.maxAttempts,
              delayMs,
              kind: classifyOrderError(error),
              error: errorMessage(error)
            });
          }
        }
      );
      this.metrics.increment('order.success');
      this.logger.info('order accepted', { symbol: order.symbol, orderId: data.orderId, status: data.status });
      return { success: true, data };
    } catch (err) {
      const error = toGatewayError(err);
      this.metrics.increment('order.failure');
      this.logger.error('order failed', {
        symbol: order.symbol,
        kind: classifyOrderError(err),
        code: error.code,
        error: error.message
      });
      return { success: false, error };
    }
  }

  async getAccountBalance(): Promise<GatewayResult<AssetBalance[]>> {
    try {
      this.metrics.increment('query.request');
      const account = await this.client.signedRequest<BinanceAccountResponse>('GET', binanceFuturesEndpoints.account());
      const balances = (account.assets ?? [])
        .filter((a) => Number(a.walletBalance) > 0)
        .map((a) => ({ asset: a.asset, walletBalance: a.walletBalance, availableBalance: a.availableBalance }));
      return { success: true, data: balances };
    } catch (err) {
      return this.queryFailure('account balance', err);
    }
  }

  async getPositionInfo(symbol: string): Promise<GatewayResult<PositionLookup>> {
    try {
      this.metrics.increment('query.request');
      const positions = await this.client.signedRequest<BinancePositionRisk[]>(
        'GET',
        binanceFuturesEndpoints.positionRisk(),
        { symbol }
      );
      const first = positions[0];
      if (!first) return { success: true, data: { status: 'not_found', symbol } };
      if (Number(first.positionAmt) === 0) return { success: true, data: { status: 'flat', symbol } };
      return {
        success: true,
        data: {
          status: 'open',
          position: {
            symbol: first.symbol,
            positionAmt: first.positionAmt,
            entryPrice: first.entryPrice,
            markPrice: first.markPrice,
            unRealizedProfit: first.unRealizedProfit,
            leverage: first.leverage
          }
        }
      };
    } catch (err) {
      return this.queryFailure('position info', err);
    }
  }

  stats(): Record<string, number> {
    return this.metrics.snapshot();
  }

  private queryFailure(query: string, err: unknown): { success: false; error: GatewayError } {
    const error = toGatewayError(err);
    this.metrics.increment('query.failure');
    this.logger.warn(`${query} query failed`, { code: error.code, error: error.message });
    return { success: false, error };
  }
}

export const createGatewayFromConfig = (
  config: AppConfig,
  credentials: BinanceCredentials,
  logger?: Logger
): BinanceFuturesGateway =>
  new BinanceFuturesGateway(
    { ...credentials, testnet: config.exchange.testnet },
    {
      logger,
      timeoutMs: config.exchange.timeoutMs,
      recvWindowMs: config.exchange.recvWindowMs,
      retry: config.retry
    }
  );
