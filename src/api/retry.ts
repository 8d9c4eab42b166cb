/**
 * Read retries for the rack API
 *
 * Only GETs come through here. A read is repeated while the rack is briefly
 * unreachable (429, 502-504, a dropped connection, a request that hit the
 * client timeout); a 4xx refusal or a malformed body fails on the first try.
 */

import { ApiRequestError } from './errors.js';

export interface RetryPolicy {
  /** Attempts after the first one (default: 2) */
  retries?: number;
  /** First backoff delay, doubled on every retry (default: 500) */
  baseDelayMs?: number;
  /** Upper bound for one delay, Retry-After included (default: 10000) */
  maxDelayMs?: number;
}

export interface RetryHooks {
  /** Called before sleeping ahead of retry number `attempt` */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Replaces the real delay (tests) */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: Required<RetryPolicy> = {
  retries: 2,
  baseDelayMs: 500,
  maxDelayMs: 10000,
};

const TRANSIENT_STATUSES = new Set([429, 502, 503, 504]);

const TRANSIENT_NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN'];

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whether a failed read is worth repeating
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof ApiRequestError) {
    return TRANSIENT_STATUSES.has(error.status);
  }
  if (!(error instanceof Error)) {
    return false;
  }

  // fetch rejects with "fetch failed" when the connection breaks, and with
  // AbortError when the client timeout fires
  if (error.name === 'AbortError' || (error.name === 'TypeError' && error.message === 'fetch failed')) {
    return true;
  }
  const cause = error.cause instanceof Error ? error.cause.message : '';
  return TRANSIENT_NETWORK_CODES.some((code) => error.message.includes(code) || cause.includes(code));
}

/**
 * Milliseconds the rack asked to wait, from a Retry-After header in seconds
 * or as an HTTP date
 */
export function retryAfterMs(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;

  if (/^\d+$/.test(header.trim())) {
    const seconds = Number(header.trim());
    return seconds > 0 ? seconds * 1000 : undefined;
  }

  const at = Date.parse(header);
  return Number.isFinite(at) && at > now ? at - now : undefined;
}

/**
 * Delay before retry number `attempt` (1-based)
 */
export function backoffDelay(attempt: number, policy: Required<RetryPolicy>, requestedMs?: number): number {
  const delay = requestedMs ?? policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `read`, repeating it on transient failures
 *
 * @throws the last error once it is not transient or the retries are spent
 */
export async function retryRead<T>(
  read: () => Promise<T>,
  policy: RetryPolicy = {},
  hooks: RetryHooks = {}
): Promise<T> {
  const resolved: Required<RetryPolicy> = { ...DEFAULT_RETRY_POLICY, ...policy };
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await read();
    } catch (error) {
      if (attempt > resolved.retries || !isTransient(error) || !(error instanceof Error)) {
        throw error;
      }

      const requested = error instanceof ApiRequestError ? error.retryAfterMs : undefined;
      const delayMs = backoffDelay(attempt, resolved, requested);
      hooks.onRetry?.(attempt, error, delayMs);
      await wait(delayMs);
    }
  }
}
