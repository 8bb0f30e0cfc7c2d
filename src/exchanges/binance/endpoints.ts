export const BINANCE_FUTURES_BASE_URL = 'https://fapi.binance.com';
export const BINANCE_FUTURES_TESTNET_URL = 'https://testnet.binancefuture.com';

export const futuresBaseUrl = (testnet: boolean): string =>
  testnet ? BINANCE_FUTURES_TESTNET_URL : BINANCE_FUTURES_BASE_URL;

export const binanceFuturesEndpoints = {
  order: (): string => '/fapi/v1/order',
  account: (): string => '/fapi/v2/account',
  positionRisk: (): string => '/fapi/v2/positionRisk'
};
