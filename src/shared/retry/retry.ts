import { sleep as defaultSleep, type Sleep } from "../concurrency/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 9 means up to 10 total tries)
  delayMs: number;          // fixed backoff between attempts
  maxDelayMs?: number;      // cap for delays suggested by shouldRetry
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  signal?: AbortSignal;
  sleep?: Sleep;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    delayMs,
    maxDelayMs = Number.POSITIVE_INFINITY,
    shouldRetry,
    onRetry,
    onGiveUp,
    signal,
    sleep = defaultSleep
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = customDelayMs != null ? Math.min(maxDelayMs, customDelayMs) : delayMs;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs, signal);
      attempt += 1;
      if (signal?.aborted) {
        onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }
    }
  }
};
