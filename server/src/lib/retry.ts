const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'timed out',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'bad gateway',
];

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
}

interface ErrorShape {
  status?: unknown;
  statusCode?: unknown;
  code?: unknown;
  headers?: unknown;
  response?: { status?: unknown; headers?: unknown };
}

function asShape(error: unknown): ErrorShape {
  return typeof error === 'object' && error !== null ? (error as ErrorShape) : {};
}

function getStatusCode(error: unknown): number | null {
  const shape = asShape(error);
  for (const candidate of [shape.status, shape.statusCode, shape.response?.status]) {
    if (typeof candidate === 'number') return candidate;
  }
  return null;
}

function readRetryAfter(headers: unknown): string | null {
  if (headers instanceof Headers) return headers.get('retry-after');
  if (typeof headers !== 'object' || headers === null) return null;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === 'retry-after' && typeof value === 'string') return value;
  }
  return null;
}

export function isTransientError(error: Error, rawError: unknown = error): boolean {
  const status = getStatusCode(rawError);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = asShape(rawError).code;
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code.toUpperCase())) return true;

  const msg = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Retry-After from error headers, in milliseconds (capped at 60s); 0 when absent.
 */
function getRetryAfterMs(error: unknown): number {
  const shape = asShape(error);
  const retryAfter = readRetryAfter(shape.headers) ?? readRetryAfter(shape.response?.headers);
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    return Math.min(seconds, 60) * 1000;
  }
  return 0;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
  const baseDelay = options?.baseDelay ?? 1000;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransientError(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new Error('withRetry exhausted without an error');
}
