import type { BinanceCredentials } from '../exchanges/binance/auth.js';

export interface SecretsProvider {
  getSecret(name: string): Promise<string | undefined>;
}

export const MISSING_CREDENTIALS_MESSAGE =
  'BINANCE_API_KEY and BINANCE_API_SECRET environment variables are required';

/** Resolve exchange credentials for one session. Both values must be present. */
export const loadExchangeCredentials = async (secrets: SecretsProvider): Promise<BinanceCredentials> => {
  const apiKey = await secrets.getSecret('BINANCE_API_KEY');
  const apiSecret = await secrets.getSecret('BINANCE_API_SECRET');
  if (!apiKey || !apiSecret) {
    throw new Error(MISSING_CREDENTIALS_MESSAGE);
  }
  return { apiKey, apiSecret };
};
