import { createLogger } from './logger.js';

const log = createLogger('retry');

export type RetryOptions = {
  readonly maxRetries?: number;
  readonly initialDelayMs?: number;
  readonly backoffMultiplier?: number;
  /** ログに出す処理名 */
  readonly label?: string;
};

const DEFAULT_MAX_RETRIES = 3;
const RATE_LIMIT_MAX_RETRIES = 5;
const DEFAULT_INITIAL_DELAY_MS = 1000;
const DEFAULT_BACKOFF_MULTIPLIER = 2;

export const hasStatus = (error: unknown): error is Error & { status: number } =>
  error instanceof Error && 'status' in error && typeof error.status === 'number';

const isServerError = (error: unknown): boolean =>
  hasStatus(error) && error.status >= 500 && error.status < 600;

const isRateLimitError = (error: unknown): boolean =>
  hasStatus(error) && error.status === 429;

const isSecondaryRateLimit = (error: unknown): boolean =>
  hasStatus(error) && error.status === 403 && error.message.toLowerCase().includes('secondary rate limit');

const isNetworkOrTimeoutError = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  const msg = error.message.toLowerCase();
  const patterns = ['timeout', 'etimedout', 'econnreset', 'econnrefused', 'enotfound', 'network', 'fetch failed'];
  return patterns.some((p) => msg.includes(p));
};

export const isRetryableError = (error: unknown): boolean =>
  isServerError(error) || isRateLimitError(error) || isSecondaryRateLimit(error) || isNetworkOrTimeoutError(error);

const parseSeconds = (value: unknown): number | null => {
  if (typeof value === 'number') return value * 1000;
  if (typeof value === 'string') {
    const seconds = parseFloat(value);
    if (!isNaN(seconds)) return seconds * 1000;
  }
  return null;
};

const extractRetryAfterMs = (error: unknown): number | null => {
  if (!(error instanceof Error)) return null;

  // fetch: HttpError.headers is a Headers instance
  if ('headers' in error && error.headers instanceof Headers) {
    return parseSeconds(error.headers.get('retry-after'));
  }

  // Octokit: RequestError.response?.headers['retry-after']
  if ('response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'headers' in response) {
      const headers = response.headers;
      if (headers && typeof headers === 'object' && 'retry-after' in headers) {
        return parseSeconds(headers['retry-after']);
      }
    }
  }

  return null;
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const withRetry = async <T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> => {
  const initialDelayMs = options?.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
  const backoffMultiplier = options?.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER;
  const baseMaxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;

  let lastError: unknown;

  // Rate limited calls get a higher ceiling than the configured one
  for (let attempt = 0; attempt <= RATE_LIMIT_MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      const rateLimited = isRateLimitError(error) || isSecondaryRateLimit(error);
      const maxRetries = rateLimited ? RATE_LIMIT_MAX_RETRIES : baseMaxRetries;

      if (attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }

      const retryAfterMs = rateLimited ? extractRetryAfterMs(error) : null;
      const delay = retryAfterMs ?? initialDelayMs * backoffMultiplier ** attempt;
      log.warn(`${options?.label ?? 'request'} failed, retrying in ${delay}ms (${attempt + 1}/${maxRetries})`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delay);
    }
  }

  throw lastError;
};
