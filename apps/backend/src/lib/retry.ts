export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  factor?: number;
  /** Return false to give up immediately on errors a retry cannot fix */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `fn` until it resolves, waiting `delayMs * factor^n` between attempts.
 *
 * Makes at most `retries + 1` attempts and rethrows the last error, wrapped in an
 * Error when something other than an Error was thrown.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    retries = 3,
    delayMs = 500,
    factor = 2,
    shouldRetry = () => true,
    onRetry
  } = options;

  let attempt = 0;
  let lastError: unknown;
  let delay = delayMs;

  while (attempt <= retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === retries || !shouldRetry(error)) {
        break;
      }
      onRetry?.(attempt + 1, error, delay);
      await sleep(delay);
      delay *= factor;
      attempt += 1;
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
