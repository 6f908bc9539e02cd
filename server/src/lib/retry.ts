const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'temporarily unavailable',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
];

function readField(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

export function isTransient(error: unknown): boolean {
  if (readField(error, 'name') === 'AbortError') return false;

  const status = readField(error, 'status');
  if (typeof status === 'number') return TRANSIENT_STATUSES.has(status);

  // undici wraps socket errors: the code sits on `cause`.
  const code = readField(error, 'code') ?? readField(readField(error, 'cause'), 'code');
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code.toUpperCase())) return true;

  const msg = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: {
    maxAttempts?: number;
    baseDelay?: number;
    onRetry?: (attempt: number, error: Error) => void;
  },
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 500;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransient(err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const delay = baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
