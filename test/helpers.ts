/**
 * Shared test helpers — mock factories and an in-process exchange stand-in.
 */

import type { Logger } from '../src/core/logger.js';
import type { OrderAck } from '../src/core/types.js';
import type { QueryParams } from '../src/exchanges/binance/auth.js';
import type { FuturesRestClient, HttpMethod } from '../src/exchanges/binance/client.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogRecord {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export const createMockLogger = (): Logger & { records: LogRecord[] } => {
  const records: LogRecord[] = [];
  return {
    records,
    debug: (message, context) => { records.push({ level: 'debug', message, context }); },
    info: (message, context) => { records.push({ level: 'info', message, context }); },
    warn: (message, context) => { records.push({ level: 'warn', message, context }); },
    error: (message, context) => { records.push({ level: 'error', message, context }); },
  };
};

// ── Fake exchange connection ────────────────────────────────────────

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  params: QueryParams;
}

type Step = { ok: unknown } | { fail: unknown };

/**
 * Stands in for the signed REST client. Each call consumes the next scripted
 * step; once the script runs out the last step repeats.
 */
export class FakeFuturesClient implements FuturesRestClient {
  readonly calls: RecordedCall[] = [];
  private readonly steps: Step[] = [];

  respondWith(body: unknown): this {
    this.steps.push({ ok: body });
    return this;
  }

  failWith(error: unknown): this {
    this.steps.push({ fail: error });
    return this;
  }

  async signedRequest<T>(method: HttpMethod, path: string, params: QueryParams = {}): Promise<T> {
    this.calls.push({ method, path, params });
    const step = this.steps.length > 1 ? this.steps.shift() : this.steps[0];
    if (!step) throw new Error(`no scripted response for ${method} ${path}`);
    if ('fail' in step) throw step.fail;
    return step.ok as T;
  }
}

/** Records requested delays without waiting. */
export const createSleepRecorder = (): { delays: number[]; sleep: (ms: number) => Promise<void> } => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
};

// ── Order ack factory ───────────────────────────────────────────────

export function makeOrderAck(overrides: Partial<OrderAck> = {}): OrderAck {
  return {
    orderId: 123456,
    symbol: 'BTCUSDT',
    side: 'BUY',
    type: 'MARKET',
    status: 'FILLED',
    origQty: '0.001',
    executedQty: '0.001',
    avgPrice: '50000.00',
    ...overrides,
  };
}
