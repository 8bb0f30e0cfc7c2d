import type { AssetBalance, GatewayResult, OrderAck, OrderRequest, PositionLookup } from '../core/types.js';

export interface OrderGateway {
  readonly testnet: boolean;
  /** Throws ValidationError for a malformed request; every exchange outcome is a result value. */
  placeOrder(order: OrderRequest): Promise<GatewayResult<OrderAck>>;
  getAccountBalance(): Promise<GatewayResult<AssetBalance[]>>;
  getPositionInfo(symbol: string): Promise<GatewayResult<PositionLookup>>;
}
