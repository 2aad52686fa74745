import { describe, it, expect, vi } from "vitest";
import {
  backoffDelayMs,
  exponentialPolicy,
  fixedPolicy,
  pollUntil,
  retry,
  RetryExhaustedError,
  type PollOutcome,
} from "../src/lib/runtime/retry.js";

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe("backoff", () => {
  it("keeps fixed delays constant", () => {
    expect(backoffDelayMs({ kind: "fixed", delayMs: 30_000 }, 1)).toBe(30_000);
    expect(backoffDelayMs({ kind: "fixed", delayMs: 30_000 }, 5)).toBe(30_000);
  });

  it("grows exponential delays up to the cap", () => {
    const { backoff } = exponentialPolicy(5, 1_000, 5_000);
    expect([1, 2, 3, 4].map((attempt) => backoffDelayMs(backoff, attempt))).toEqual([1_000, 2_000, 4_000, 5_000]);
  });
});

describe("retry", () => {
  it("returns the first success and sleeps only between attempts", async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`boom ${attempt}`);
      return "done";
    });
    const onRetry = vi.fn();
    await expect(retry(fn, fixedPolicy(3, 30_000), { sleep, onRetry })).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([30_000, 30_000]);
    expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2]);
  });

  it("does not sleep after the last failed attempt", async () => {
    const { delays, sleep } = recordingSleep();
    const err = await retry(async () => Promise.reject(new Error("nope")), fixedPolicy(3, 10), { sleep }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ attempts: 3, message: "gave up after 3 attempt(s): nope" });
    expect(delays).toEqual([10, 10]);
  });

  it("stops early when shouldRetry rejects the error", async () => {
    const fn = vi.fn(async () => Promise.reject(new Error("fatal")));
    await expect(retry(fn, fixedPolicy(5, 0), { sleep: async () => {}, shouldRetry: () => false })).rejects.toThrow(
      "fatal",
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rejects a policy without attempts", async () => {
    await expect(retry(async () => 1, fixedPolicy(0, 0))).rejects.toThrow(/maxAttempts must be a positive integer/);
  });
});

describe("pollUntil", () => {
  it("reports the attempt that finished", async () => {
    const { delays, sleep } = recordingSleep();
    const check = async (attempt: number): Promise<PollOutcome<string>> =>
      attempt === 2 ? { done: true, value: "ready" } : { done: false };
    await expect(pollUntil(check, fixedPolicy(30, 10_000), { sleep })).resolves.toEqual({
      ok: true,
      value: "ready",
      attempts: 2,
    });
    expect(delays).toEqual([10_000]);
  });

  it("gives up after the policy budget", async () => {
    const { delays, sleep } = recordingSleep();
    const onPending = vi.fn();
    const res = await pollUntil<number>(async () => ({ done: false }), fixedPolicy(3, 5), { sleep, onPending });
    expect(res).toEqual({ ok: false, attempts: 3 });
    expect(delays).toEqual([5, 5]);
    expect(onPending).toHaveBeenCalledTimes(3);
  });
});
