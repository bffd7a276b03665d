import type { Logger } from './logger.js';
import { errorMessage } from './errors.js';

/** Retry with exponential backoff for engine and API calls. */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryOn?: (error: unknown) => boolean;
}

const DEFAULTS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  retryOn: () => true,
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: Logger,
  label: string,
  options?: RetryOptions,
): Promise<T> {
  const opts = { ...DEFAULTS, ...options };
  let delay = Math.min(opts.initialDelayMs, opts.maxDelayMs);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const message = errorMessage(err);

      if (attempt >= opts.maxAttempts || !opts.retryOn(err)) {
        logger.error({ attempt, label, error: message }, 'Giving up after failure');
        throw err;
      }

      logger.warn(
        { attempt, maxAttempts: opts.maxAttempts, label, error: message, nextRetryMs: delay },
        'Retrying after failure',
      );

      await sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}

/** Rate limits, 5xx responses and dropped connections are worth another attempt. */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();

  if (msg.includes('429') || msg.includes('rate limit') || msg.includes('too many requests')) return true;
  if (/\b50[0234]\b/.test(msg)) return true;
  if (msg.includes('econnreset') || msg.includes('etimedout') || msg.includes('fetch failed') || msg.includes('socket hang up')) return true;

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
