import { dbLogger } from '../../logger';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  shouldRetry?: (error: unknown) => boolean;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 20,
  maxDelay: 1000,
};

function calculateDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);
  const jitter = 1 + Math.random() * 0.3;
  return Math.round(cappedDelay * jitter);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Re-run `fn` while `shouldRetry` accepts the error. Only safe for work that
 * leaves nothing behind when it fails, such as a rolled-back transaction.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>
): Promise<T> {
  const { maxRetries, baseDelay, maxDelay, shouldRetry } = { ...DEFAULT_OPTIONS, ...options };

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (shouldRetry && !shouldRetry(error)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelay, maxDelay);
      dbLogger.warn(
        { attempt: attempt + 1, maxRetries, delay, error: messageOf(error) },
        'Retrying database operation'
      );

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  dbLogger.error(
    { attempts: maxRetries + 1, error: messageOf(lastError) },
    'Database operation failed after all retries'
  );
  throw lastError;
}
