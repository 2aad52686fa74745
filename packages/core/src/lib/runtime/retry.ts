export type Backoff =
  | { kind: "fixed"; delayMs: number }
  | { kind: "exponential"; initialMs: number; factor: number; maxMs: number };

export type RetryPolicy = {
  maxAttempts: number;
  backoff: Backoff;
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await new Promise((resolve) => setTimeout(resolve, ms));
};

export function fixedPolicy(maxAttempts: number, delayMs: number): RetryPolicy {
  return { maxAttempts, backoff: { kind: "fixed", delayMs } };
}

export function exponentialPolicy(maxAttempts: number, initialMs: number, maxMs: number, factor = 2): RetryPolicy {
  return { maxAttempts, backoff: { kind: "exponential", initialMs, factor, maxMs } };
}

export const NO_RETRY: RetryPolicy = fixedPolicy(1, 0);

/** Delay before attempt `attempt + 1`, where `attempt` is the 1-based attempt that just failed. */
export function backoffDelayMs(backoff: Backoff, attempt: number): number {
  if (backoff.kind === "fixed") return Math.max(0, backoff.delayMs);
  const raw = backoff.initialMs * Math.pow(backoff.factor, Math.max(0, attempt - 1));
  return Math.max(0, Math.min(backoff.maxMs, raw));
}

function assertPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`invalid retry policy: maxAttempts must be a positive integer (got ${policy.maxAttempts})`);
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`gave up after ${attempts} attempt(s): ${reason}`, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export type RetryHooks = {
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  shouldRetry?: (error: unknown) => boolean;
};

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  assertPolicy(policy);
  const doSleep = hooks.sleep ?? sleep;
  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (hooks.shouldRetry && !hooks.shouldRetry(err)) throw err;
      if (attempt === policy.maxAttempts) break;
      const delayMs = backoffDelayMs(policy.backoff, attempt);
      hooks.onRetry?.({ attempt, maxAttempts: policy.maxAttempts, delayMs, error: err });
      await doSleep(delayMs);
    }
  }
  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}

export type PollOutcome<T> = { done: true; value: T } | { done: false };

export type PollResult<T> = { ok: true; value: T; attempts: number } | { ok: false; attempts: number };

/**
 * Calls `check` up to `policy.maxAttempts` times, sleeping between calls, until it reports done.
 * Errors thrown by `check` propagate; a check that wants to tolerate errors catches them itself.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollOutcome<T>>,
  policy: RetryPolicy,
  hooks: { sleep?: Sleep; onPending?: (info: { attempt: number; maxAttempts: number }) => void } = {},
): Promise<PollResult<T>> {
  assertPolicy(policy);
  const doSleep = hooks.sleep ?? sleep;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const outcome = await check(attempt);
    if (outcome.done) return { ok: true, value: outcome.value, attempts: attempt };
    hooks.onPending?.({ attempt, maxAttempts: policy.maxAttempts });
    if (attempt < policy.maxAttempts) await doSleep(backoffDelayMs(policy.backoff, attempt));
  }
  return { ok: false, attempts: policy.maxAttempts };
}
