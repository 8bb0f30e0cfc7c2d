import { loadConfig } from '../config/load.js';
import type { AppConfig } from '../config/types.js';
import { ValidationError, errorMessage } from '../core/errors.js';
import { ackField } from '../core/format.js';
import { JsonLogger, type Logger } from '../core/logger.js';
import type { GatewayResult, OrderAck, OrderRequest } from '../core/types.js';
import type { OrderGateway } from '../exchanges/adapter.js';
import type { BinanceCredentials } from '../exchanges/binance/auth.js';
import { createGatewayFromConfig } from '../exchanges/binance/adapter.js';
import { createOrderRequest } from '../execution/orderRequest.js';
import { EnvSecretsProvider } from '../secrets/envFallback.js';
import { loadExchangeCredentials } from '../secrets/provider.js';

export const USAGE = [
  'Usage: futures-order <SYMBOL> <SIDE> <ORDER_TYPE> <QUANTITY> [PRICE]',
  '',
  'Arguments:',
  '  SYMBOL       Trading pair (e.g., BTCUSDT)',
  '  SIDE         Order side: BUY or SELL',
  '  ORDER_TYPE   Order type: MARKET or LIMIT',
  '  QUANTITY     Order quantity',
  '  PRICE        Price (required for LIMIT orders)',
  '',
  'Example:',
  '  futures-order BTCUSDT BUY MARKET 0.001',
  '  futures-order BTCUSDT SELL LIMIT 0.001 50000'
].join('\n');

export type Output = (text: string) => void;

export type ParsedOrderArgs =
  | { ok: true; symbol: string; side: string; orderType: string; quantity: number; price?: number }
  | { ok: false; message?: string };

const parseNumberArg = (raw: string): number | undefined => {
  if (raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
};

/** Positional args: SYMBOL SIDE ORDER_TYPE QUANTITY [PRICE]. Extra args are ignored. */
export const parseOrderArgs = (args: string[]): ParsedOrderArgs => {
  const [symbol, side, orderType, rawQuantity, rawPrice] = args;
  if (symbol === undefined || side === undefined || orderType === undefined || rawQuantity === undefined) {
    return { ok: false };
  }

  const quantity = parseNumberArg(rawQuantity);
  if (quantity === undefined) {
    return { ok: false, message: `QUANTITY must be a number, got "${rawQuantity}"` };
  }

  let price: number | undefined;
  if (rawPrice !== undefined) {
    price = parseNumberArg(rawPrice);
    if (price === undefined) {
      return { ok: false, message: `PRICE must be a number, got "${rawPrice}"` };
    }
  }

  return { ok: true, symbol, side, orderType, quantity, price };
};

export const formatOrderSummary = (order: OrderRequest): string =>
  [
    '',
    '=== Order Request Summary ===',
    `Symbol:    ${order.symbol}`,
    `Side:      ${order.side}`,
    `Type:      ${order.orderType}`,
    `Quantity:  ${order.quantity}`,
    ...(order.orderType === 'LIMIT' ? [`Price:     ${order.price ?? 'N/A'}`] : []),
    '============================',
    ''
  ].join('\n');

export const formatOrderResponse = (result: GatewayResult<OrderAck>): string => {
  if (!result.success) {
    return [
      '=== Order Failed ===',
      `Error Code:    ${result.error.code}`,
      `Error Message: ${result.error.message}`,
      '====================',
      '',
      '❌ Failed to place order!',
      ''
    ].join('\n');
  }

  const data = result.data;
  return [
    '=== Order Response ===',
    `Order ID:      ${ackField(data, 'orderId')}`,
    `Status:        ${ackField(data, 'status')}`,
    `Symbol:        ${ackField(data, 'symbol')}`,
    `Side:          ${ackField(data, 'side')}`,
    `Type:          ${ackField(data, 'type')}`,
    `Quantity:      ${ackField(data, 'origQty')}`,
    `Executed Qty:  ${ackField(data, 'executedQty')}`,
    `Avg Price:     ${ackField(data, 'avgPrice')}`,
    '======================',
    '',
    '✅ Order placed successfully!',
    ''
  ].join('\n');
};

export class OrderCli {
  constructor(
    private readonly gateway: OrderGateway,
    private readonly logger: Logger,
    private readonly out: Output = console.log
  ) {}

  /** Returns true when the exchange accepted the order. */
  async run(input: { symbol: string; side: string; orderType: string; quantity: number; price?: number }): Promise<boolean> {
    this.logger.info('running order command', {
      symbol: input.symbol,
      side: input.side,
      type: input.orderType,
      quantity: input.quantity
    });

    try {
      const order = createOrderRequest({
        symbol: input.symbol.toUpperCase(),
        side: input.side.toUpperCase(),
        orderType: input.orderType.toUpperCase(),
        quantity: input.quantity,
        price: input.price
      });

      this.out(formatOrderSummary(order));
      const result = await this.gateway.placeOrder(order);
      this.out(formatOrderResponse(result));
      return result.success;
    } catch (err) {
      if (err instanceof ValidationError) {
        this.logger.error('validation error', { error: err.message });
        this.out(`\n❌ Validation Error: ${err.message}\n`);
      } else {
        this.logger.error('unexpected error', { error: errorMessage(err) });
        this.out(`\n❌ Unexpected Error: ${errorMessage(err)}\n`);
      }
      return false;
    }
  }
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  out?: Output;
  logger?: Logger;
  createGateway?: (config: AppConfig, credentials: BinanceCredentials, logger: Logger) => OrderGateway;
}

/** Entry point behind the `futures-order` binary. Resolves to the process exit code. */
export const runCli = async (argv: string[], deps: CliDependencies = {}): Promise<number> => {
  const env = deps.env ?? process.env;
  const out = deps.out ?? console.log;

  const parsed = parseOrderArgs(argv);
  if (!parsed.ok) {
    if (parsed.message) out(`❌ ${parsed.message}\n`);
    out(USAGE);
    return 1;
  }

  const config = loadConfig(env);
  const logger = deps.logger ?? new JsonLogger(config.logLevel, process.stderr);

  let credentials: BinanceCredentials;
  try {
    credentials = await loadExchangeCredentials(new EnvSecretsProvider(env));
  } catch (err) {
    logger.error('exchange credentials missing', { error: errorMessage(err) });
    out(`❌ ${errorMessage(err)}`);
    return 1;
  }

  const createGateway = deps.createGateway ?? createGatewayFromConfig;
  const gateway = createGateway(config, credentials, logger);
  logger.info('order client initialized', { testnet: gateway.testnet });

  const cli = new OrderCli(gateway, logger, out);
  const accepted = await cli.run(parsed);
  return accepted ? 0 : 1;
};
