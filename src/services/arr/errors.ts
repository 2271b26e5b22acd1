import { AppError } from '../../utils/errors.js';

const MAX_BODY_CHARS = 200;

/**
 * Replace every occurrence of `secret` in `text` and cap the length.
 * Used on response bodies and messages before they reach logs or history.
 */
export function redactSecret(text: string, secret: string | undefined, maxLength = MAX_BODY_CHARS): string {
  let out = text;
  if (secret) {
    out = out.split(secret).join('[REDACTED]');
  }
  return out.length > maxLength ? `${out.slice(0, maxLength)}...` : out;
}

export type ArrErrorKind = 'transient' | 'authentication' | 'rate_limited' | 'validation' | 'cancelled';

export abstract class ArrApiError extends AppError {
  abstract readonly kind: ArrErrorKind;

  get retryable(): boolean {
    return this.kind === 'transient' || this.kind === 'rate_limited';
  }
}

/** Network failure, timeout or 5xx. */
export class TransientNetworkError extends ArrApiError {
  readonly kind = 'transient';

  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'ARR_TRANSIENT', statusCode: 502, context, cause });
  }
}

/** 401/403: the credential is wrong or lacks permission. */
export class AuthenticationError extends ArrApiError {
  readonly kind = 'authentication';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'ARR_AUTH', statusCode: 502, context });
  }
}

export class RateLimitExceededError extends ArrApiError {
  readonly kind = 'rate_limited';

  constructor(
    message: string,
    readonly retryAfterMs: number | null,
    context?: Record<string, unknown>,
  ) {
    super(message, { code: 'ARR_RATE_LIMITED', statusCode: 503, context });
  }
}

/** Any other 4xx, an unexpected redirect, or a response body that fails to parse. */
export class ValidationError extends ArrApiError {
  readonly kind = 'validation';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'ARR_VALIDATION', statusCode: 400, context });
  }
}

export class ExecutionCancelledError extends ArrApiError {
  readonly kind = 'cancelled';

  constructor(message = 'Request cancelled') {
    super(message, { code: 'EXECUTION_CANCELLED', statusCode: 499 });
  }
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

/**
 * Map a non-2xx response to the error taxonomy. `body` must already be redacted.
 */
export function classifyResponse(
  status: number,
  body: string,
  retryAfter: string | null,
  context: Record<string, unknown>,
): ArrApiError {
  const detail = body ? `: ${body}` : '';

  if (status === 401 || status === 403) {
    return new AuthenticationError(`Instance rejected credentials (HTTP ${status})`, { ...context, status });
  }
  if (status === 429) {
    return new RateLimitExceededError(`Instance rate limit exceeded (HTTP 429)${detail}`, parseRetryAfter(retryAfter), {
      ...context,
      status,
    });
  }
  if (status >= 500) {
    return new TransientNetworkError(`Instance server error (HTTP ${status})${detail}`, { ...context, status });
  }
  if (status >= 300 && status < 400) {
    return new ValidationError(`Unexpected redirect (HTTP ${status})`, { ...context, status });
  }
  return new ValidationError(`Request rejected (HTTP ${status})${detail}`, { ...context, status });
}
