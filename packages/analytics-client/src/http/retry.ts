export const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'UND_ERR_SOCKET']);

export interface RetryOptions<T> {
  tries?: number;
  baseDelayMs?: number;
  /** Retry on a resolved value, e.g. a 503 response. The last value is returned when tries run out. */
  retryOnResult?: (value: T) => boolean;
  /** Releases a value that is about to be retried, e.g. an unread response body. */
  onDiscard?: (value: T) => void | Promise<void>;
  onRetry?: (attempt: number, reason: string) => void;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string') return code;
  // fetch wraps socket errors: TypeError('fetch failed', { cause })
  const cause = 'cause' in error ? error.cause : undefined;
  return cause === error ? undefined : errorCode(cause);
}

export function isRetryableError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && RETRYABLE_CODES.has(code);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  options: RetryOptions<T> = {},
): Promise<T> {
  const tries = Math.max(1, options.tries ?? 3);
  let delay = options.baseDelayMs ?? 350; // ms
  for (let i = 0; i < tries; i++) {
    const last = i === tries - 1;
    let reason: string;
    try {
      const value = await fn();
      if (last || !options.retryOnResult?.(value)) return value;
      await options.onDiscard?.(value);
      reason = 'retryable response';
    } catch (error: unknown) {
      if (!isRetryableError(error) || last) throw error;
      reason = errorCode(error) ?? 'network error';
    }
    options.onRetry?.(i + 1, reason);
    const wait = delay > 0 ? delay + Math.floor(Math.random() * 120) : 0;
    await new Promise((resolve) => setTimeout(resolve, wait));
    delay *= 2;
  }
  // should never reach
  throw new Error(`withRetry(${label}) exhausted`);
}
