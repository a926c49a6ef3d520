import { setTimeout as delay } from 'node:timers/promises';

export type FetchSafeOptions = RequestInit & {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  correlationId?: string;
};

const DEFAULT_TIMEOUT = 15000;
const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY = 300;

/**
 * fetch with a per-attempt timeout and exponential backoff on network
 * errors. HTTP error statuses are returned, not retried. An abort from the
 * caller's `signal` stops retrying immediately.
 */
export async function fetchSafe(url: string, opts: FetchSafeOptions = {}): Promise<Response> {
  const {
    timeoutMs = DEFAULT_TIMEOUT,
    retries = DEFAULT_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY,
    correlationId,
    headers,
    signal,
    ...rest
  } = opts;

  const hdrs = new Headers(headers || {});
  if (correlationId) hdrs.set('x-correlation-id', correlationId);

  for (let attempt = 0; ; attempt++) {
    const attemptSignal = signal
      ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)])
      : AbortSignal.timeout(timeoutMs);
    try {
      return await fetch(url, { ...rest, headers: hdrs, signal: attemptSignal });
    } catch (err) {
      if (attempt >= retries || signal?.aborted) throw err;
      await delay(retryDelayMs * Math.pow(2, attempt), undefined, signal ? { signal } : undefined);
    }
  }
}
