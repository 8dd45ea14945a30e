import chalk from 'chalk';

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  label?: string;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

/**
 * Retry an async operation with linear backoff (delayMs x attempt).
 * Rethrows the last error once the retries are spent.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { retries = 2, delayMs = 600, label = 'operation' } = opts;
  let lastErr: Error = new Error(`${label} failed`);

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastErr = error instanceof Error ? error : new Error(String(error));
      if (attempt < retries) {
        const wait = delayMs * (attempt + 1);
        if (process.env.DEBUG) {
          const reason = lastErr.message;
          console.log(
            chalk.dim(`${label} attempt ${attempt + 1} failed, retrying in ${wait}ms: ${reason}`)
          );
        }
        await sleep(wait);
      }
    }
  }

  throw lastErr;
}
