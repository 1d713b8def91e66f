/**
 * Docloom Generation — Retry Policy
 *
 * A small policy object (attempt budget, backoff, retryable predicate) and
 * a runner that reports its outcome as a value. Sleeping goes through an
 * injectable function so tests can record delays instead of waiting.
 */

import { setTimeout as delay } from "node:timers/promises";

/** Rejects once `signal` aborts */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const realSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

export interface RetryPolicy {
    /** Total attempts, including the first */
    readonly maxAttempts: number;
    /** Wait after the failed 0-indexed `attempt`, in milliseconds */
    backoffMs(attempt: number): number;
    isRetryable(error: unknown): boolean;
}

/** `min(2^attempt, cap)` seconds: 1s, 2s, 4s, … */
export function exponentialBackoff(maxMs = 30_000, baseMs = 1_000): (attempt: number) => number {
    return (attempt) => Math.min(2 ** attempt * baseMs, maxMs);
}

export function createRetryPolicy(options: {
    maxAttempts?: number;
    maxBackoffMs?: number;
    isRetryable: (error: unknown) => boolean;
}): RetryPolicy {
    const backoff = exponentialBackoff(options.maxBackoffMs);
    return {
        maxAttempts: options.maxAttempts ?? 3,
        backoffMs: backoff,
        isRetryable: options.isRetryable,
    };
}

export interface RetryHooks {
    sleep?: Sleep;
    /** Called before each wait */
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
    /** Stop retrying once aborted; the last error is reported */
    signal?: AbortSignal;
}

export type RetryOutcome<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: unknown; attempts: number; exhausted: boolean };

export async function runWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
    const sleep = hooks.sleep ?? realSleep;
    let lastError: unknown = new Error("Retry policy allows no attempts");

    for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
        try {
            const value = await operation(attempt);
            return { ok: true, value, attempts: attempt + 1 };
        } catch (error) {
            lastError = error;
            const isLast = attempt === policy.maxAttempts - 1;
            if (isLast || !policy.isRetryable(error) || hooks.signal?.aborted) {
                return {
                    ok: false,
                    error,
                    attempts: attempt + 1,
                    exhausted: isLast && policy.isRetryable(error),
                };
            }

            const delayMs = policy.backoffMs(attempt);
            hooks.onRetry?.({ attempt, delayMs, error });
            try {
                await sleep(delayMs, hooks.signal);
            } catch (sleepError) {
                if (!hooks.signal?.aborted) {
                    throw sleepError;
                }
                return { ok: false, error, attempts: attempt + 1, exhausted: false };
            }
        }
    }

    return { ok: false, error: lastError, attempts: 0, exhausted: false };
}
