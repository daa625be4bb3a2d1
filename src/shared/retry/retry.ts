import { sleep } from "../async/abort";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // extra attempts after the first one (5 => up to 6 calls)
  minDelayMs: number;       // base delay, doubled per attempt
  maxDelayMs: number;       // cap, also applied to server-provided delays
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;     // aborts the wait between attempts
};

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

export const computeRetryDelay = (
  attempt: number,
  decision: { delayMs?: number },
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const customDelayMs =
    typeof decision.delayMs === "number" && Number.isFinite(decision.delayMs) && decision.delayMs >= 0
      ? decision.delayMs
      : undefined;
  const backoff = customDelayMs != null
    ? Math.min(maxDelayMs, customDelayMs)
    : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));

  const ratio = Math.min(1, Math.max(0, jitterRatio));
  const random = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * ratio * random);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, signal } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = normalizeDecision(shouldRetry(err));
      if (attempt >= retries || !decision.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeRetryDelay(attempt, decision, opts);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs, signal);
    }
  }
};
