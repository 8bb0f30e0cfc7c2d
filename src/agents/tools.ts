import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { ackField } from '../core/format.js';
import type { AssetBalance, GatewayError, OrderAck, PositionLookup } from '../core/types.js';
import type { OrderGateway } from '../exchanges/adapter.js';
import { createOrderRequest } from '../execution/orderRequest.js';

/**
 * A gateway operation an agent runtime can bind to: a name, a description,
 * a zod parameter shape and an invoke function that always resolves to text.
 */
export interface GatewayTool {
  name: string;
  description: string;
  shape: z.ZodRawShape;
  invoke(args: unknown): Promise<string>;
}

/** Called once per tool invocation, so each call can carry its own credentials. */
export type GatewayFactory = () => OrderGateway | Promise<OrderGateway>;

const describeError = (error: unknown): string => {
  if (error instanceof z.ZodError) {
    return error.issues.map((i) => `${i.path.join('.') || 'args'}: ${i.message}`).join('; ');
  }
  return errorMessage(error);
};

const defineTool = <T extends z.AnyZodObject>(def: {
  name: string;
  description: string;
  schema: T;
  failurePrefix: string;
  handler: (args: z.infer<T>) => Promise<string>;
}): GatewayTool => {
  return {
    name: def.name,
    description: def.description,
    shape: def.schema.shape,
    async invoke(args: unknown): Promise<string> {
      try {
        return await def.handler(def.schema.parse(args ?? {}));
      } catch (error) {
        return `❌ ${def.failurePrefix}: ${describeError(error)}`;
      }
    }
  };
};

export const formatOrderFailure = (error: GatewayError): string =>
  ['❌ Order failed!', `Error Code: ${error.code}`, `Error Message: ${error.message}`].join('\n');

export const formatOrderAck = (orderType: 'MARKET' | 'LIMIT', data: OrderAck): string =>
  [
    `✅ ${orderType} order placed successfully!`,
    `Order ID: ${ackField(data, 'orderId')}`,
    `Symbol: ${ackField(data, 'symbol')}`,
    `Side: ${ackField(data, 'side')}`,
    `Status: ${ackField(data, 'status')}`,
    ...(orderType === 'LIMIT' ? [`Price: ${ackField(data, 'price')}`] : []),
    `Quantity: ${ackField(data, 'origQty')}`,
    `Executed Qty: ${ackField(data, 'executedQty')}`,
    `Avg Price: ${ackField(data, 'avgPrice')}`
  ].join('\n');

export const formatBalances = (balances: AssetBalance[]): string => {
  if (balances.length === 0) return 'No balance found in account.';
  const blocks = balances.map((b) =>
    [`Asset: ${b.asset}`, `Wallet Balance: ${b.walletBalance}`, `Available Balance: ${b.availableBalance}`].join('\n')
  );
  return `📊 Account Balance:\n\n${blocks.join('\n\n')}`;
};

export const formatPosition = (lookup: PositionLookup): string => {
  switch (lookup.status) {
    case 'not_found':
      return `No position information found for ${lookup.symbol}`;
    case 'flat':
      return `No open position for ${lookup.symbol}`;
    case 'open': {
      const p = lookup.position;
      return [
        `📈 Position Information for ${p.symbol}:`,
        `Position Size: ${p.positionAmt}`,
        `Entry Price: ${p.entryPrice}`,
        `Mark Price: ${p.markPrice}`,
        `Unrealized PnL: ${p.unRealizedProfit}`,
        `Leverage: ${p.leverage}`
      ].join('\n');
    }
  }
};

const symbolParam = z.string().describe('Trading pair symbol (e.g., BTCUSDT)');
const sideParam = z.string().describe("Order side - either 'BUY' or 'SELL'");
const quantityParam = z.number().describe('Order quantity');

export const createGatewayTools = (getGateway: GatewayFactory): GatewayTool[] => {
  const placeOrder = async (
    orderType: 'MARKET' | 'LIMIT',
    args: { symbol: string; side: string; quantity: number; price?: number }
  ): Promise<string> => {
    const gateway = await getGateway();
    const order = createOrderRequest({
      symbol: args.symbol.toUpperCase(),
      side: args.side.toUpperCase(),
      orderType,
      quantity: args.quantity,
      price: args.price
    });
    const result = await gateway.placeOrder(order);
    return result.success ? formatOrderAck(orderType, result.data) : formatOrderFailure(result.error);
  };

  return [
    defineTool({
      name: 'place_market_order',
      description:
        'Place a MARKET order on the futures exchange. Returns the order id, status, executed quantity and average price.',
      schema: z.object({ symbol: symbolParam, side: sideParam, quantity: quantityParam }),
      failurePrefix: 'Error placing order',
      handler: (args) => placeOrder('MARKET', args)
    }),
    defineTool({
      name: 'place_limit_order',
      description:
        'Place a LIMIT (good-till-cancelled) order on the futures exchange. Returns the order id, status, price and quantities.',
      schema: z.object({
        symbol: symbolParam,
        side: sideParam,
        quantity: quantityParam,
        price: z.number().describe('Limit price for the order')
      }),
      failurePrefix: 'Error placing order',
      handler: (args) => placeOrder('LIMIT', args)
    }),
    defineTool({
      name: 'get_account_balance',
      description: 'Get the futures account balance: wallet and available balance for every funded asset.',
      schema: z.object({}),
      failurePrefix: 'Error fetching account balance',
      handler: async () => {
        const gateway = await getGateway();
        const result = await gateway.getAccountBalance();
        return result.success
          ? formatBalances(result.data)
          : `❌ Error fetching account balance: ${result.error.message}`;
      }
    }),
    defineTool({
      name: 'get_position_info',
      description:
        'Get position information for a trading pair: size, entry price, mark price, unrealized PnL and leverage.',
      schema: z.object({ symbol: symbolParam }),
      failurePrefix: 'Error fetching position info',
      handler: async ({ symbol }) => {
        const gateway = await getGateway();
        const result = await gateway.getPositionInfo(symbol.toUpperCase());
        return result.success ? formatPosition(result.data) : `❌ Error fetching position info: ${result.error.message}`;
      }
    })
  ];
};
