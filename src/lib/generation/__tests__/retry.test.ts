import { describe, expect, it, vi } from "vitest";
import { TransientBackendError, ValidationError } from "../../errors";
import { createRetryPolicy, exponentialBackoff, runWithRetry } from "../retry";

const policy = createRetryPolicy({ isRetryable: (error) => error instanceof TransientBackendError });

function failingTimes<T>(failures: number, value: T, error: () => Error = () => new TransientBackendError("HTTP 503")) {
    let calls = 0;
    return vi.fn(async () => {
        calls += 1;
        if (calls <= failures) {
            throw error();
        }
        return value;
    });
}

describe("exponentialBackoff", () => {
    it("doubles from one second and caps at thirty", () => {
        const backoff = exponentialBackoff();
        expect([0, 1, 2, 4, 5, 10].map(backoff)).toEqual([1_000, 2_000, 4_000, 16_000, 30_000, 30_000]);
    });
});

describe("runWithRetry", () => {
    it("succeeds after transient failures, waiting between attempts", async () => {
        const sleep = vi.fn(async (_ms: number) => {});
        const operation = failingTimes(2, "ok");

        const outcome = await runWithRetry(operation, policy, { sleep });

        expect(outcome).toEqual({ ok: true, value: "ok", attempts: 3 });
        expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000, 2_000]);
    });

    it("gives up after the attempt budget without a final wait", async () => {
        const sleep = vi.fn(async (_ms: number) => {});
        const operation = failingTimes(10, "never");

        const outcome = await runWithRetry(operation, policy, { sleep });

        expect(outcome.ok).toBe(false);
        expect(outcome).toMatchObject({ attempts: 3, exhausted: true });
        expect(operation).toHaveBeenCalledTimes(3);
        expect(sleep).toHaveBeenCalledTimes(2);
    });

    it("stops at the first non-retryable error", async () => {
        const sleep = vi.fn(async (_ms: number) => {});
        const invalid = new ValidationError("Prompt cannot be empty");
        const operation = failingTimes(1, "never", () => invalid);

        const outcome = await runWithRetry(operation, policy, { sleep });

        expect(outcome).toEqual({ ok: false, error: invalid, attempts: 1, exhausted: false });
        expect(sleep).not.toHaveBeenCalled();
    });

    it("stops once the signal is aborted", async () => {
        const controller = new AbortController();
        controller.abort();
        const operation = failingTimes(5, "never");

        const outcome = await runWithRetry(operation, policy, { sleep: async () => {}, signal: controller.signal });

        expect(outcome).toMatchObject({ ok: false, attempts: 1, exhausted: false });
    });

    it("cuts a backoff wait short when the signal aborts", async () => {
        const controller = new AbortController();
        const error = new TransientBackendError("HTTP 503");
        const slowPolicy = { ...policy, backoffMs: () => 60_000 };
        const operation = vi.fn(async () => {
            setTimeout(() => controller.abort(), 10);
            throw error;
        });

        const outcome = await runWithRetry(operation, slowPolicy, { signal: controller.signal });

        expect(outcome).toEqual({ ok: false, error, attempts: 1, exhausted: false });
        expect(operation).toHaveBeenCalledTimes(1);
    });

    it("passes the signal to the sleep function", async () => {
        const controller = new AbortController();
        const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

        await runWithRetry(failingTimes(1, "ok"), policy, { sleep, signal: controller.signal });

        expect(sleep).toHaveBeenCalledWith(1_000, controller.signal);
    });

    it("announces each retry", async () => {
        const onRetry = vi.fn();
        const error = new TransientBackendError("HTTP 502");
        const operation = failingTimes(1, 42, () => error);

        await runWithRetry(operation, policy, { sleep: async () => {}, onRetry });

        expect(onRetry).toHaveBeenCalledTimes(1);
        expect(onRetry).toHaveBeenCalledWith({ attempt: 0, delayMs: 1_000, error });
    });
});
