import { ORDER_SIDES, ORDER_TYPES, type OrderRequest, type ValidationResult } from '../core/types.js';

const includes = <T extends string>(values: readonly T[], value: string): value is T =>
  (values as readonly string[]).includes(value);

/** Build a frozen request. Case is kept exactly as given. */
export const createOrderRequest = (fields: OrderRequest): OrderRequest =>
  Object.freeze({
    symbol: fields.symbol,
    side: fields.side,
    orderType: fields.orderType,
    quantity: fields.quantity,
    ...(fields.price === undefined ? {} : { price: fields.price })
  });

/**
 * Checks run in a fixed order and the first failure wins; callers show the reason verbatim.
 */
export const validateOrderRequest = (order: OrderRequest): ValidationResult => {
  if (!order.symbol) {
    return { valid: false, reason: 'Symbol is required' };
  }

  if (!includes(ORDER_SIDES, order.side)) {
    return { valid: false, reason: 'Side must be BUY or SELL' };
  }

  if (!includes(ORDER_TYPES, order.orderType)) {
    return { valid: false, reason: 'Order type must be MARKET or LIMIT' };
  }

  // Written as !(x > 0) so NaN is rejected too.
  if (!(order.quantity > 0)) {
    return { valid: false, reason: 'Quantity must be greater than 0' };
  }

  if (order.orderType === 'LIMIT' && (order.price === undefined || !(order.price > 0))) {
    return { valid: false, reason: 'Price is required for LIMIT orders and must be greater than 0' };
  }

  return { valid: true, reason: null };
};
