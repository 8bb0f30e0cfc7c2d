import * as crypto from 'node:crypto';

export interface BinanceCredentials {
  apiKey: string;
  apiSecret: string;
}

export type QueryParams = Record<string, string | number | undefined>;

/** URL-encode params in insertion order, skipping undefined values. */
export const toQueryString = (params: QueryParams): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, String(value));
  }
  return search.toString();
};

export const signQuery = (apiSecret: string, query: string): string =>
  crypto.createHmac('sha256', apiSecret).update(query).digest('hex');

/**
 * Appends `recvWindow` and `timestamp`, then the hex HMAC-SHA256 `signature`
 * over everything before it.
 */
export const buildSignedQuery = (
  auth: BinanceCredentials,
  params: QueryParams,
  timestamp: number,
  recvWindow: number
): string => {
  const query = toQueryString({ ...params, recvWindow, timestamp });
  return `${query}&signature=${signQuery(auth.apiSecret, query)}`;
};

export const buildBinanceHeaders = (auth: BinanceCredentials): Record<string, string> => ({
  'X-MBX-APIKEY': auth.apiKey
});
