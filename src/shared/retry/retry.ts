export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = {
  attempt: number; // retries already performed before this failure
  sameKindAttempts: number; // retries already performed after failures of the same kind
};

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown, ctx: RetryContext) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  kindOf?: (err: unknown) => string;
  maxCustomDelayMs?: number; // a requested delay above this ends the loop instead of being shortened
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs">,
  customDelayMs?: number
): number =>
  customDelayMs != null
    ? customDelayMs
    : Math.min(opts.maxDelayMs, opts.minDelayMs * Math.pow(2, attempt));

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    kindOf = () => "error",
    maxCustomDelayMs
  } = opts;

  let attempt = 0;
  const retriesByKind = new Map<string, number>();
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const kind = kindOf(err);
      const sameKindAttempts = retriesByKind.get(kind) ?? 0;
      const decision = shouldRetry(err, { attempt, sameKindAttempts });
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const overBudget = customDelayMs != null && maxCustomDelayMs != null && customDelayMs > maxCustomDelayMs;

      if (attempt >= retries || !normalized.retry || overBudget) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const backoff = computeBackoffMs(attempt, opts, customDelayMs);
      // small jitter to avoid thundering herd (still deterministic-ish)
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
      retriesByKind.set(kind, sameKindAttempts + 1);
      attempt += 1;
    }
  }
};
