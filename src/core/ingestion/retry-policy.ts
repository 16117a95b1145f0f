import type { RetryContext, RetryDecision } from "../../shared/retry/retry";
import { type IngestionErrorKind, isIngestionError, RateLimitError } from "./errors";

export type BackoffStrategy = "none" | "immediate" | "exponential" | "retry-after";

export type RetryRule = {
  retryable: boolean;
  backoff: BackoffStrategy;
  maxRetries?: number;
  refreshCredentials?: boolean;
};

export const retryPolicyTable: Readonly<Record<IngestionErrorKind, RetryRule>> = {
  AuthError: { retryable: true, backoff: "immediate", maxRetries: 1, refreshCredentials: true },
  RateLimitError: { retryable: true, backoff: "retry-after" },
  TransientNetworkError: { retryable: true, backoff: "exponential" },
  SourceApiError: { retryable: false, backoff: "none" },
  WriteError: { retryable: true, backoff: "exponential" },
  WatermarkConflictError: { retryable: false, backoff: "none" },
  NotifyError: { retryable: false, backoff: "none" },
  InvalidWindowError: { retryable: false, backoff: "none" }
};

const notRetryable: RetryRule = { retryable: false, backoff: "none" };

export const retryRuleFor = (err: unknown): RetryRule =>
  isIngestionError(err) ? retryPolicyTable[err.kind] : notRetryable;

/** Retry budgets in the table are per kind; `retry` counts them with this key. */
export const retryKindOf = (err: unknown): string => (isIngestionError(err) ? err.kind : "Unknown");

/**
 * Maps a failure onto the retry loop's decision using the policy table.
 * An undefined delay falls back to exponential backoff inside `retry`;
 * a `Retry-After` delay is a minimum wait and is never shortened.
 */
export const decideRetry = (err: unknown, ctx: RetryContext): RetryDecision => {
  const rule = retryRuleFor(err);
  if (!rule.retryable) return false;
  if (rule.maxRetries != null && ctx.sameKindAttempts >= rule.maxRetries) return false;

  switch (rule.backoff) {
    case "immediate":
      return { retry: true, delayMs: 0 };
    case "retry-after":
      return {
        retry: true,
        delayMs: err instanceof RateLimitError ? err.retryAfterMs : undefined
      };
    case "exponential":
      return { retry: true };
    case "none":
      return false;
  }
};
