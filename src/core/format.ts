import type { OrderAck } from './types.js';

/** Field of an exchange acknowledgement as display text, `N/A` when absent. */
export const ackField = (data: OrderAck, key: string): string => {
  const value = data[key];
  return value === undefined || value === null ? 'N/A' : String(value);
};
