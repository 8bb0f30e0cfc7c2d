import { z } from 'zod';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Anything but 1/true/yes/on targets production
  BINANCE_TESTNET: z.string().optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RECV_WINDOW_MS: z.coerce.number().int().positive().max(60000).default(5000),

  ORDER_RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  ORDER_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000)
});

export const configSchema = rawSchema.transform((raw) => ({
  nodeEnv: raw.NODE_ENV,
  logLevel: raw.LOG_LEVEL,

  exchange: {
    testnet: parseBoolean(raw.BINANCE_TESTNET, true),
    timeoutMs: raw.HTTP_TIMEOUT_MS,
    recvWindowMs: raw.RECV_WINDOW_MS
  },

  retry: {
    maxAttempts: raw.ORDER_RETRY_MAX_ATTEMPTS,
    baseDelayMs: raw.ORDER_RETRY_BASE_DELAY_MS
  }
}));
