import { ProviderRequestError } from '@converge/contracts';

export interface BackoffOptions {
  maxAttempts?: number;
  /** Upper bound on the time spent sleeping between attempts. */
  maxTotalWaitMs?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Growth per attempt; 1 gives a fixed delay. */
  factor?: number;
  jitterFactor?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
}

export type BackoffConfig = Required<Omit<BackoffOptions, 'shouldRetry'>>;

export const BACKOFF_DEFAULTS: BackoffConfig = {
  maxAttempts: 3,
  maxTotalWaitMs: 60_000,
  baseDelayMs: 100,
  maxDelayMs: 30_000,
  factor: 2,
  jitterFactor: 0.2,
};

export const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'EAI_AGAIN',
  'RequestTimeout',
  'ServiceUnavailable',
  'InternalServerError',
  'ServerBusy',
  'TooManyRequests',
  'OperationTimedOut',
  'GatewayTimeout',
  'RetryableError',
  'RequestRateTooLarge',
]);

const RETRYABLE_PATTERNS = ['throttl', 'too many requests', 'rate limit', 'server busy', 'temporarily unavailable', 'socket hang up', 'econnreset', 'etimedout'];

function property(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/** Throttling, 5xx and transient network failures. */
export function isRetryableProviderError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  const code = property(error, 'code');
  if (typeof code === 'string' && RETRYABLE_CODES.has(code)) return true;

  const statusCode = property(error, 'statusCode') ?? property(error, 'status');
  if (typeof statusCode === 'number' && (statusCode === 429 || (statusCode >= 500 && statusCode < 600))) return true;

  const message = property(error, 'message');
  if (typeof message !== 'string') return false;
  const lowered = message.toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => lowered.includes(pattern));
}

export function retryAfterMs(error: unknown): number | undefined {
  if (error instanceof ProviderRequestError) return error.retryAfterMs;
  return undefined;
}

export function resolveBackoff(options: BackoffOptions = {}): BackoffConfig {
  return {
    maxAttempts: options.maxAttempts ?? BACKOFF_DEFAULTS.maxAttempts,
    maxTotalWaitMs: options.maxTotalWaitMs ?? BACKOFF_DEFAULTS.maxTotalWaitMs,
    baseDelayMs: options.baseDelayMs ?? BACKOFF_DEFAULTS.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? BACKOFF_DEFAULTS.maxDelayMs,
    factor: options.factor ?? BACKOFF_DEFAULTS.factor,
    jitterFactor: options.jitterFactor ?? BACKOFF_DEFAULTS.jitterFactor,
  };
}

/** Delay before attempt `attempt + 1`, attempts counting from 1. */
export function computeDelay(attempt: number, config: BackoffConfig, random: () => number = Math.random): number {
  const capped = Math.min(config.baseDelayMs * config.factor ** (attempt - 1), config.maxDelayMs);
  const jitter = capped * config.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Settles like `promise`, or resolves `undefined` once `ms` pass first. */
export async function withDeadline<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or the attempt or wait budget runs out.
 * The last error is rethrown.
 */
export async function withBackoff<T>(fn: (attempt: number) => Promise<T>, options: BackoffOptions = {}): Promise<T> {
  const config = resolveBackoff(options);
  const shouldRetry = options.shouldRetry ?? isRetryableProviderError;
  let waited = 0;

  for (let attempt = 1; ; attempt++)
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= config.maxAttempts || !shouldRetry(error, attempt)) throw error;

      const delay = retryAfterMs(error) ?? computeDelay(attempt, config);
      if (waited + delay > config.maxTotalWaitMs) throw error;

      waited += delay;
      await sleep(delay);
    }
}

/**
 * Re-evaluates `predicate` with backoff until it holds.
 * Resolves `false` once the attempt or wait budget is spent.
 */
export async function waitFor(predicate: () => Promise<boolean>, options: BackoffOptions = {}): Promise<boolean> {
  const config = resolveBackoff(options);
  let waited = 0;

  for (let attempt = 1; ; attempt++) {
    if (await predicate()) return true;
    if (attempt >= config.maxAttempts) return false;

    const delay = computeDelay(attempt, config);
    if (waited + delay > config.maxTotalWaitMs) return false;

    waited += delay;
    await sleep(delay);
  }
}
