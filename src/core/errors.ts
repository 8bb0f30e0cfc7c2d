export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed order request. Raised before any network call and never retried. */
export class ValidationError extends AppError {
  constructor(reason: string) {
    super(reason, 'VALIDATION_ERROR');
  }
}

/** An error the exchange reported in its response body (or an HTTP error page). */
export class ExchangeApiError extends AppError {
  constructor(
    public readonly exchangeCode: number,
    message: string,
    public readonly httpStatus?: number
  ) {
    super(message, 'EXCHANGE_API_ERROR', { exchangeCode, httpStatus });
  }
}

/** Substrings that mark an exchange error as a gateway/availability fault. */
export const TRANSIENT_GATEWAY_SIGNATURES = ['502', '503', '504', 'Bad Gateway'] as const;

export type ErrorClass = 'validation' | 'transient' | 'permanent' | 'infrastructure';

export const isTransientGatewayError = (error: ExchangeApiError): boolean =>
  TRANSIENT_GATEWAY_SIGNATURES.some((signature) => error.message.includes(signature));

export const classifyOrderError = (error: unknown): ErrorClass => {
  if (error instanceof ValidationError) return 'validation';
  if (error instanceof ExchangeApiError) return isTransientGatewayError(error) ? 'transient' : 'permanent';
  return 'infrastructure';
};

export const isRetryableOrderError = (error: unknown): boolean => {
  const kind = classifyOrderError(error);
  return kind === 'transient' || kind === 'infrastructure';
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
