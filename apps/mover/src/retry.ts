import { sleep } from "./http.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 400,
  maxDelayMs: 30_000,
  jitterMs: 250,
};

export type RetryHooks = {
  shouldRetry: (err: unknown) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (input: { attempt: number; waitMs: number; err: unknown }) => void;
  wait?: (ms: number) => Promise<unknown>;
  random?: () => number;
};

export function backoffMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exp = Math.min(6, Math.max(0, attempt - 1));
  const base = policy.baseDelayMs * 2 ** exp;
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return Math.min(base + jitter, policy.maxDelayMs);
}

export function retryPolicyFrom(maxAttempts: number, overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    ...overrides,
    maxAttempts: Math.max(1, Math.floor(maxAttempts)),
  };
}

export async function withRetry<T>(
  policy: RetryPolicy,
  hooks: RetryHooks,
  task: (attempt: number) => Promise<T>,
): Promise<T> {
  const wait = hooks.wait ?? ((ms: number) => sleep(ms));
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= policy.maxAttempts || !hooks.shouldRetry(err)) throw err;
      const hinted = hooks.retryAfterMs?.(err);
      const waitMs =
        hinted !== undefined && hinted > 0
          ? Math.min(hinted, policy.maxDelayMs)
          : backoffMs(policy, attempt, hooks.random);
      hooks.onRetry?.({ attempt, waitMs, err });
      await wait(waitMs);
    }
  }
}
