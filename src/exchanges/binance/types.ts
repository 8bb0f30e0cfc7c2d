export interface BinanceErrorBody {
  code: number;
  msg: string;
}

export type BinanceTimeInForce = 'GTC';

/** Payload of `POST /fapi/v1/order`. `price` and `timeInForce` exist only for LIMIT orders. */
export type BinanceOrderParams = {
  symbol: string;
  side: string;
  type: string;
  quantity: number;
  price?: number;
  timeInForce?: BinanceTimeInForce;
};

export interface BinanceAccountAsset {
  asset: string;
  walletBalance: string;
  availableBalance: string;
  unrealizedProfit?: string;
  marginBalance?: string;
}

export interface BinanceAccountResponse {
  assets?: BinanceAccountAsset[];
  totalWalletBalance?: string;
  availableBalance?: string;
}

export interface BinancePositionRisk {
  symbol: string;
  positionAmt: string;
  entryPrice: string;
  markPrice: string;
  unRealizedProfit: string;
  leverage: string;
  liquidationPrice?: string;
  marginType?: string;
  positionSide?: string;
}

export const isBinanceErrorBody = (body: unknown): body is BinanceErrorBody =>
  typeof body === 'object' &&
  body !== null &&
  'code' in body &&
  typeof body.code === 'number' &&
  'msg' in body &&
  typeof body.msg === 'string';
