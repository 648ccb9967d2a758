import { setTimeout as delay } from "node:timers/promises";

export type RetryConfig = {
  retries: number;
  backoffMs: number;
  maxBackoffMs?: number;
};

export type RetryHooks = {
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

export function backoffDelay(config: RetryConfig, attempt: number) {
  const wait = config.backoffMs * Math.pow(2, attempt);
  return config.maxBackoffMs === undefined ? wait : Math.min(wait, config.maxBackoffMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? ((ms: number) => delay(ms));
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= config.retries) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === config.retries) break;
      if (hooks.shouldRetry && !hooks.shouldRetry(error)) break;
      const wait = backoffDelay(config, attempt);
      hooks.onRetry?.(error, attempt + 1, wait);
      await sleep(wait);
      attempt += 1;
    }
  }

  throw lastError;
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms} ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `fn` with a signal that aborts after `ms`. The returned promise
 * settles only when `fn` does, so callers must honor the signal; an abort
 * surfaces as a TimeoutError.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new TimeoutError(label, ms)), ms);
  try {
    return await fn(controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutError(label, ms);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
