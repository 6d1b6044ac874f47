/**
 * Retry utility with exponential backoff
 */

import { env } from '../../../config/env';
import { classifyError } from '../../../lib/scraping';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  sleeper?: (ms: number) => Promise<void>;
}

/**
 * Retry mechanism with exponential backoff: waits baseDelay, 2*baseDelay, ...
 * between attempts. Errors classified as non-retryable (403, 404) are rethrown at once.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? env.DETAIL_MAX_RETRIES;
  const baseDelay = options.baseDelay ?? env.DETAIL_RETRY_BASE;
  const wait = options.sleeper ?? sleep;
  let lastError: unknown = new Error('Max retries exceeded');

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;
      const classified = classifyError(error);
      console.warn(`Attempt ${attempt + 1}/${maxRetries} failed: ${classified.message}`);

      if (!classified.retryable) {
        throw error;
      }

      if (attempt < maxRetries - 1) {
        const delay = baseDelay * Math.pow(2, attempt);
        console.log(`Waiting ${delay}ms before retrying...`);
        await wait(delay);
      }
    }
  }

  throw lastError;
}
