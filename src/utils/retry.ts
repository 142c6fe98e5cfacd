/**
 * Exponential backoff retry for provider calls.
 */

import { ProviderFailureError } from '../errors.js';
import { isRetryableError } from '../llm/errors.js';
import { createLogger, type Logger } from './logger.js';

export interface RetryConfig {
  /** Total attempts including the first call (default: 3) */
  maxAttempts: number;
  /** Delay before the first retry, in milliseconds (default: 500) */
  initialDelayMs: number;
  /** Upper bound for any single delay (default: 30000) */
  maxDelayMs: number;
  /** Growth factor between delays (default: 2) */
  backoffMultiplier: number;
  /** Case-insensitive substrings that mark an error message as transient */
  retryableErrors: readonly string[];
  /** Shorten each delay by up to 25% (default: false) */
  jitter?: boolean | undefined;
}

export const DEFAULT_RETRYABLE_ERRORS: readonly string[] = [
  'timeout',
  'timed out',
  'connection',
  'network',
  'rate_limit',
  'rate limit',
  '429',
  'server_error',
];

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  retryableErrors: DEFAULT_RETRYABLE_ERRORS,
  jitter: false,
};

export interface RetryStats {
  totalAttempts: number;
  /** Calls that failed at least once and then succeeded */
  successfulRetries: number;
  /** Calls that spent every attempt */
  failedRetries: number;
  totalBackoffMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryManagerOptions {
  sleep?: SleepFn | undefined;
  logger?: Logger | undefined;
  random?: (() => number) | undefined;
}

export interface RetryCallOptions {
  /** Name used in log lines and the failure message */
  operationName?: string | undefined;
  signal?: AbortSignal | undefined;
  /** Called before each backoff sleep */
  onRetry?: ((error: unknown, attempt: number, delayMs: number) => void) | undefined;
}

/**
 * Delay before retry number `attempt` (1-based):
 * `min(initialDelay * multiplier^(attempt - 1), maxDelay)`.
 */
export function calculateDelay(
  attempt: number,
  config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitter'>,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  let delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, exponent);
  delay = Math.min(delay, config.maxDelayMs);

  if (config.jitter) {
    delay -= random() * delay * 0.25;
  }

  return Math.round(delay);
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Operation aborted');
}

/**
 * Sleep for a given duration. Rejects with the signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('Operation aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wraps opaque async operations with classified, bounded retries.
 *
 * @example
 * ```typescript
 * const retries = new RetryManager({ ...DEFAULT_RETRY_CONFIG, maxAttempts: 5 });
 * const response = await retries.call(() => provider.generate(request), {
 *   operationName: 'generate',
 * });
 * ```
 */
export class RetryManager {
  readonly config: RetryConfig;
  private readonly sleepFn: SleepFn;
  private readonly log: Logger;
  private readonly random: () => number;
  private readonly stats: RetryStats = {
    totalAttempts: 0,
    successfulRetries: 0,
    failedRetries: 0,
    totalBackoffMs: 0,
  };

  constructor(config: Partial<RetryConfig> = {}, options: RetryManagerOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.sleepFn = options.sleep ?? sleep;
    this.log = options.logger ?? createLogger({ name: 'retry' });
    this.random = options.random ?? Math.random;
  }

  delayFor(attempt: number): number {
    return calculateDelay(attempt, this.config, this.random);
  }

  isRetryable(error: unknown): boolean {
    return isRetryableError(error, this.config.retryableErrors);
  }

  async call<T>(operation: (attempt: number) => Promise<T>, options: RetryCallOptions = {}): Promise<T> {
    const { operationName = 'operation', signal, onRetry } = options;
    const maxAttempts = Math.max(1, this.config.maxAttempts);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      this.stats.totalAttempts++;

      try {
        const result = await operation(attempt);
        if (attempt > 1) {
          this.stats.successfulRetries++;
          this.log.info(`${operationName} succeeded after ${String(attempt)} attempts`);
        }
        return result;
      } catch (error) {
        lastError = error;

        if (signal?.aborted || !this.isRetryable(error)) {
          throw error;
        }
        if (attempt >= maxAttempts) {
          break;
        }

        const delay = this.delayFor(attempt);
        this.log.warn(`${operationName} failed, retrying`, {
          attempt,
          maxAttempts,
          delayMs: delay,
          error: error instanceof Error ? error.message : String(error),
        });
        onRetry?.(error, attempt, delay);
        this.stats.totalBackoffMs += delay;
        await this.sleepFn(delay, signal);
      }
    }

    this.stats.failedRetries++;
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    throw new ProviderFailureError(
      `${operationName} failed after ${String(maxAttempts)} attempts: ${detail}`,
      maxAttempts,
      lastError
    );
  }

  getStats(): RetryStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats.totalAttempts = 0;
    this.stats.successfulRetries = 0;
    this.stats.failedRetries = 0;
    this.stats.totalBackoffMs = 0;
  }
}
