/**
 * Backoff, abortable waits and signal plumbing shared by the request loop
 * and the background tasks.
 *
 * @module
 */

import type { BackoffFn } from "./types.js";

export interface ExponentialBackoffConfig {
  /** Delay before the first retry in ms. Default: 100 */
  baseDelayMs?: number;
  /** Upper bound for any delay in ms. Default: 10_000 */
  maxDelayMs?: number;
  /** Random jitter factor (0–1). Default: 0.2 */
  jitterFactor?: number;
}

/**
 * Exponential backoff with random jitter.
 *
 * Formula: `min(baseDelay * 2^attempt, maxDelay) * (1 + random * jitter)`
 */
export function exponentialBackoff(config: ExponentialBackoffConfig = {}): BackoffFn {
  const baseDelayMs = config.baseDelayMs ?? 100;
  const maxDelayMs = config.maxDelayMs ?? 10_000;
  const jitterFactor = config.jitterFactor ?? 0.2;

  return (attempt) => {
    const base = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
    return Math.round(base * (1 + Math.random() * jitterFactor));
  };
}

/**
 * Wait `ms`, resolving early if `signal` aborts. Never rejects.
 *
 * `unref` keeps a pending wait from holding the process open.
 */
export function sleep(ms: number, signal?: AbortSignal, unref = false): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    if (unref) {
      timer.unref();
    }
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface ScopedSignal {
  signal: AbortSignal;
  /** Release the timer and listeners. Call once the guarded work is over. */
  release(): void;
}

/**
 * Signal that aborts when `parent` aborts or `timeoutMs` elapses, whichever
 * comes first. The parent's reason is forwarded unchanged.
 */
export function withTimeout(timeoutMs: number, parent?: AbortSignal): ScopedSignal {
  const controller = new AbortController();

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(new DOMException(`Timed out after ${timeoutMs}ms`, "TimeoutError"));
  }, timeoutMs);

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Run `attempt` until it succeeds or `timeoutMs` elapses, pausing
 * `pauseMs` between tries (never past the deadline). Resolves with the
 * first success, or undefined when the budget ran out. Rejects with the
 * signal's reason once `signal` aborts.
 */
export async function retryUntilDeadline<T>(
  timeoutMs: number,
  pauseMs: number,
  attempt: (remainingMs: number) => Promise<T | undefined>,
  signal?: AbortSignal,
): Promise<T | undefined> {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    signal?.throwIfAborted();
    const remaining = deadline - Date.now();
    if (remaining <= 0) return undefined;

    const result = await attempt(remaining);
    if (result !== undefined) return result;

    signal?.throwIfAborted();
    const left = deadline - Date.now();
    if (left <= 0) return undefined;
    await sleep(Math.min(pauseMs, left), signal);
  }
}
