export const ORDER_SIDES = ['BUY', 'SELL'] as const;
export const ORDER_TYPES = ['MARKET', 'LIMIT'] as const;

export type Side = (typeof ORDER_SIDES)[number];
export type OrderType = (typeof ORDER_TYPES)[number];

/**
 * A desired trade as handed to the gateway. `side` and `orderType` stay plain strings
 * because callers pass raw user input; validation decides whether they are acceptable.
 */
export interface OrderRequest {
  readonly symbol: string;
  readonly side: string;
  readonly orderType: string;
  readonly quantity: number;
  readonly price?: number;
}

export type ValidationResult = { valid: true; reason: null } | { valid: false; reason: string };

export interface GatewayError {
  code: number;
  message: string;
}

export type GatewayResult<T> = { success: true; data: T } | { success: false; error: GatewayError };

/** Order acknowledgement as returned by the exchange. Numeric amounts arrive as strings. */
export interface OrderAck {
  orderId: number;
  status: string;
  symbol?: string;
  side?: string;
  type?: string;
  origQty?: string;
  executedQty?: string;
  avgPrice?: string;
  price?: string;
  clientOrderId?: string;
  timeInForce?: string;
  updateTime?: number;
  [field: string]: unknown;
}

export interface AssetBalance {
  asset: string;
  walletBalance: string;
  availableBalance: string;
}

export interface PositionSnapshot {
  symbol: string;
  positionAmt: string;
  entryPrice: string;
  markPrice: string;
  unRealizedProfit: string;
  leverage: string;
}

export type PositionLookup =
  | { status: 'open'; position: PositionSnapshot }
  | { status: 'flat'; symbol: string }
  | { status: 'not_found'; symbol: string };
