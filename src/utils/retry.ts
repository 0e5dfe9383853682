import { RequestError } from 'octokit';
import { MAX_RETRIES, BASE_RETRY_DELAY_MS } from '../constants.js';
import { logger } from './logger.js';

/**
 * Server-side failures are worth another attempt. Octokit reports network
 * failures as a RequestError with status 500 as well. Client errors (4xx)
 * and GraphQL errors fail immediately.
 */
export function isTransientError(err: unknown): boolean {
  return err instanceof RequestError && err.status >= 500;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  maxRetries: number = MAX_RETRIES,
  baseDelayMs: number = BASE_RETRY_DELAY_MS,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !isTransientError(err)) {
        throw err;
      }
      const delay = baseDelayMs * Math.pow(2, attempt);
      logger.warn(`${label} failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delay}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
