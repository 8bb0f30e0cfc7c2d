import axios, { type AxiosInstance } from 'axios';
import { ExchangeApiError } from '../../core/errors.js';
import { createHttpClient, describeBody } from '../../core/http.js';
import { buildBinanceHeaders, buildSignedQuery, type BinanceCredentials, type QueryParams } from './auth.js';
import { futuresBaseUrl } from './endpoints.js';
import { isBinanceErrorBody } from './types.js';

export type HttpMethod = 'GET' | 'POST';

/** The connection handle the gateway talks through. */
export interface FuturesRestClient {
  signedRequest<T>(method: HttpMethod, path: string, params?: QueryParams): Promise<T>;
}

export interface BinanceClientOptions {
  testnet: boolean;
  timeoutMs?: number;
  recvWindowMs?: number;
  http?: AxiosInstance;
  now?: () => number;
}

/**
 * Exchange error bodies become ExchangeApiError. Failures without a response
 * (timeouts, resets) are passed through untouched.
 */
export const toExchangeError = (err: unknown): unknown => {
  if (!axios.isAxiosError(err) || !err.response) return err;
  const { status, statusText, data } = err.response;
  if (isBinanceErrorBody(data)) {
    return new ExchangeApiError(data.code, data.msg, status);
  }
  const body = describeBody(data);
  const message = `HTTP ${status}${statusText ? ` ${statusText}` : ''}${body ? `: ${body}` : ''}`;
  return new ExchangeApiError(0, message, status);
};

export class BinanceFuturesClient implements FuturesRestClient {
  readonly testnet: boolean;
  readonly baseURL: string;
  private readonly http: AxiosInstance;
  private readonly recvWindowMs: number;
  private readonly now: () => number;

  constructor(
    private readonly auth: BinanceCredentials,
    options: BinanceClientOptions
  ) {
    this.testnet = options.testnet;
    this.baseURL = futuresBaseUrl(options.testnet);
    this.http = options.http ?? createHttpClient(this.baseURL, options.timeoutMs ?? 10000);
    this.recvWindowMs = options.recvWindowMs ?? 5000;
    this.now = options.now ?? Date.now;
  }

  async signedRequest<T>(method: HttpMethod, path: string, params: QueryParams = {}): Promise<T> {
    const query = buildSignedQuery(this.auth, params, this.now(), this.recvWindowMs);
    try {
      const res = await this.http.request<T>({
        method,
        baseURL: this.baseURL,
        url: `${path}?${query}`,
        headers: buildBinanceHeaders(this.auth)
      });
      return res.data;
    } catch (err) {
      throw toExchangeError(err);
    }
  }
}
