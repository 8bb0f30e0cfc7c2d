import { beforeEach, describe, expect, it } from 'vitest';
import { ExchangeApiError, ValidationError } from '../../src/core/errors.js';
import { InMemoryMetrics } from '../../src/core/metrics.js';
import { BinanceFuturesGateway, toOrderParams } from '../../src/exchanges/binance/adapter.js';
import { createOrderRequest } from '../../src/execution/orderRequest.js';
import {
  FakeFuturesClient,
  createMockLogger,
  createSleepRecorder,
  makeOrderAck
} from '../helpers.js';

const CREDENTIALS = { apiKey: 'test-key', apiSecret: 'test-secret' };

const marketBuy = createOrderRequest({ symbol: 'BTCUSDT', side: 'BUY', orderType: 'MARKET', quantity: 0.001 });
const limitSell = createOrderRequest({ symbol: 'ETHUSDT', side: 'SELL', orderType: 'LIMIT', quantity: 0.5, price: 3000 });

const unavailable = () => new ExchangeApiError(0, 'HTTP 503 Service Unavailable', 503);

describe('toOrderParams', () => {
  it('leaves timeInForce and price out of MARKET orders', () => {
    const params = toOrderParams(marketBuy);
    expect(params).toEqual({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: 0.001 });
    expect('timeInForce' in params).toBe(false);
    expect('price' in params).toBe(false);
  });

  it('adds price and GTC time-in-force to LIMIT orders', () => {
    expect(toOrderParams(limitSell)).toEqual({
      symbol: 'ETHUSDT',
      side: 'SELL',
      type: 'LIMIT',
      quantity: 0.5,
      price: 3000,
      timeInForce: 'GTC'
    });
  });
});

describe('BinanceFuturesGateway', () => {
  let client: FakeFuturesClient;
  let metrics: InMemoryMetrics;
  let logger: ReturnType<typeof createMockLogger>;
  let recorder: ReturnType<typeof createSleepRecorder>;
  let gateway: BinanceFuturesGateway;

  beforeEach(() => {
    client = new FakeFuturesClient();
    metrics = new InMemoryMetrics();
    logger = createMockLogger();
    recorder = createSleepRecorder();
    gateway = new BinanceFuturesGateway(CREDENTIALS, {
      client,
      metrics,
      logger,
      retry: { sleep: recorder.sleep }
    });
  });

  it('defaults to the test network', () => {
    expect(gateway.testnet).toBe(true);
    expect(new BinanceFuturesGateway({ ...CREDENTIALS, testnet: false }, { client }).testnet).toBe(false);
  });

  // ── placeOrder ────────────────────────────────────────────────

  describe('placeOrder', () => {
    it('returns the exchange acknowledgement unchanged', async () => {
      const ack = {
        orderId: 123456,
        status: 'FILLED',
        origQty: '0.001',
        executedQty: '0.001',
        avgPrice: '50000.00'
      };
      client.respondWith(ack);

      const result = await gateway.placeOrder(marketBuy);

      expect(result).toEqual({ success: true, data: ack });
      expect(client.calls).toEqual([
        {
          method: 'POST',
          path: '/fapi/v1/order',
          params: { symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: 0.001 }
        }
      ]);
      expect(recorder.delays).toEqual([]);
    });

    it('sends price and timeInForce for LIMIT orders', async () => {
      client.respondWith(makeOrderAck({ symbol: 'ETHUSDT', type: 'LIMIT', status: 'NEW', price: '3000.00' }));

      const result = await gateway.placeOrder(limitSell);

      expect(result.success).toBe(true);
      expect(client.calls[0]?.params).toMatchObject({ price: 3000, timeInForce: 'GTC' });
    });

    it('throws ValidationError before touching the exchange', async () => {
      const bad = createOrderRequest({ symbol: 'BTCUSDT', side: 'BUY', orderType: 'LIMIT', quantity: 1 });

      await expect(gateway.placeOrder(bad)).rejects.toThrow(ValidationError);
      await expect(gateway.placeOrder(bad)).rejects.toThrow(
        'Price is required for LIMIT orders and must be greater than 0'
      );
      expect(client.calls).toHaveLength(0);
    });

    it('retries gateway faults with linear backoff and then succeeds', async () => {
      client.failWith(unavailable()).failWith(unavailable()).respondWith(makeOrderAck());

      const result = await gateway.placeOrder(marketBuy);

      expect(result).toEqual({ success: true, data: makeOrderAck() });
      expect(client.calls).toHaveLength(3);
      expect(recorder.delays).toEqual([2000, 4000]);
      expect(metrics.get('order.attempt')).toBe(3);
      expect(metrics.get('order.retry')).toBe(2);
      expect(logger.records.filter((r) => r.level === 'warn')).toHaveLength(2);
    });

    it('reports a business rejection after a single attempt', async () => {
      client.failWith(new ExchangeApiError(-2019, 'Margin is insufficient.', 400));

      const result = await gateway.placeOrder(marketBuy);

      expect(result).toEqual({ success: false, error: { code: -2019, message: 'Margin is insufficient.' } });
      expect(client.calls).toHaveLength(1);
      expect(recorder.delays).toEqual([]);
    });

    it('gives up after the configured attempts with the last exchange error', async () => {
      client
        .failWith(new ExchangeApiError(0, 'HTTP 502 Bad Gateway', 502))
        .failWith(new ExchangeApiError(0, 'HTTP 503 Service Unavailable', 503))
        .failWith(new ExchangeApiError(0, 'HTTP 504 Gateway Timeout', 504));

      const result = await gateway.placeOrder(marketBuy);

      expect(result).toEqual({ success: false, error: { code: 0, message: 'HTTP 504 Gateway Timeout' } });
      expect(client.calls).toHaveLength(3);
      expect(recorder.delays).toEqual([2000, 4000]);
      expect(metrics.get('order.failure')).toBe(1);
    });

    it('retries infrastructure errors and reports them with code -1', async () => {
      client.failWith(new Error('read ECONNRESET'));

      const result = await gateway.placeOrder(marketBuy);

      expect(result).toEqual({ success: false, error: { code: -1, message: 'read ECONNRESET' } });
      expect(client.calls).toHaveLength(3);
    });

    it('honours a custom retry policy', async () => {
      const custom = new BinanceFuturesGateway(CREDENTIALS, {
        client,
        retry: { maxAttempts: 5, baseDelayMs: 10, sleep: recorder.sleep }
      });
      client.failWith(new Error('timeout of 10000ms exceeded'));

      await custom.placeOrder(marketBuy);

      expect(client.calls).toHaveLength(5);
      expect(recorder.delays).toEqual([10, 20, 30, 40]);
    });

    it('stops retrying when a permanent error follows a transient one', async () => {
      client.failWith(unavailable()).failWith(new ExchangeApiError(-1121, 'Invalid symbol.', 400));

      const result = await gateway.placeOrder(marketBuy);

      expect(result).toEqual({ success: false, error: { code: -1121, message: 'Invalid symbol.' } });
      expect(client.calls).toHaveLength(2);
      expect(recorder.delays).toEqual([2000]);
    });

    it('never logs credentials', async () => {
      client.respondWith(makeOrderAck());
      await gateway.placeOrder(marketBuy);
      const logged = JSON.stringify(logger.records);
      expect(logged).not.toContain('test-key');
      expect(logged).not.toContain('test-secret');
    });
  });

  // ── getAccountBalance ─────────────────────────────────────────

  describe('getAccountBalance', () => {
    it('lists assets with a positive wallet balance', async () => {
      client.respondWith({
        assets: [
          { asset: 'USDT', walletBalance: '10000.0', availableBalance: '9500.0', unrealizedProfit: '0' },
          { asset: 'BNB', walletBalance: '0.00000000', availableBalance: '0.00000000' },
          { asset: 'BTC', walletBalance: '0.001', availableBalance: '0.001' }
        ]
      });

      const result = await gateway.getAccountBalance();

      expect(result).toEqual({
        success: true,
        data: [
          { asset: 'USDT', walletBalance: '10000.0', availableBalance: '9500.0' },
          { asset: 'BTC', walletBalance: '0.001', availableBalance: '0.001' }
        ]
      });
      expect(client.calls[0]).toEqual({ method: 'GET', path: '/fapi/v2/account', params: {} });
    });

    it('returns an empty list when the account has no assets', async () => {
      client.respondWith({});
      expect(await gateway.getAccountBalance()).toEqual({ success: true, data: [] });
    });

    it('turns errors into a failure without retrying', async () => {
      client.failWith(unavailable());

      const result = await gateway.getAccountBalance();

      expect(result).toEqual({ success: false, error: { code: 0, message: 'HTTP 503 Service Unavailable' } });
      expect(client.calls).toHaveLength(1);
      expect(metrics.get('query.failure')).toBe(1);
    });
  });

  // ── getPositionInfo ───────────────────────────────────────────

  describe('getPositionInfo', () => {
    const position = {
      symbol: 'BTCUSDT',
      positionAmt: '0.001',
      entryPrice: '49000.00',
      markPrice: '50000.00',
      unRealizedProfit: '1.0',
      leverage: '10',
      marginType: 'cross'
    };

    it('returns the open position for the symbol', async () => {
      client.respondWith([position]);

      const result = await gateway.getPositionInfo('BTCUSDT');

      expect(result).toEqual({
        success: true,
        data: {
          status: 'open',
          position: {
            symbol: 'BTCUSDT',
            positionAmt: '0.001',
            entryPrice: '49000.00',
            markPrice: '50000.00',
            unRealizedProfit: '1.0',
            leverage: '10'
          }
        }
      });
      expect(client.calls[0]).toEqual({ method: 'GET', path: '/fapi/v2/positionRisk', params: { symbol: 'BTCUSDT' } });
    });

    it('treats a short position as open', async () => {
      client.respondWith([{ ...position, positionAmt: '-0.002' }]);
      const result = await gateway.getPositionInfo('BTCUSDT');
      expect(result.success && result.data.status).toBe('open');
    });

    it('distinguishes a flat position from a missing one', async () => {
      client.respondWith([{ ...position, positionAmt: '0' }]).respondWith([]);

      const flat = await gateway.getPositionInfo('BTCUSDT');
      const missing = await gateway.getPositionInfo('BTCUSDT');

      expect(flat).toEqual({ success: true, data: { status: 'flat', symbol: 'BTCUSDT' } });
      expect(missing).toEqual({ success: true, data: { status: 'not_found', symbol: 'BTCUSDT' } });
    });

    it('turns errors into a failure', async () => {
      client.failWith(new ExchangeApiError(-1121, 'Invalid symbol.', 400));
      expect(await gateway.getPositionInfo('NOPE')).toEqual({
        success: false,
        error: { code: -1121, message: 'Invalid symbol.' }
      });
    });
  });

  it('exposes per-connection statistics', async () => {
    client.respondWith(makeOrderAck());
    await gateway.placeOrder(marketBuy);
    await gateway.getAccountBalance();
    expect(gateway.stats()).toEqual({
      'order.attempt': 1,
      'order.success': 1,
      'query.request': 1
    });
  });
});
