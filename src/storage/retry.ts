import { setTimeout as delay } from "timers/promises";
import type { RetryPolicy } from "../config/config.js";
import { TransientStorageError } from "../core/errors.js";

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "ENETDOWN",
  "EHOSTUNREACH"
]);

const TRANSIENT_ERROR_NAMES = new Set(["TimeoutError", "RequestTimeout", "RequestTimeoutException"]);

function errorCode(err: object): string | null {
  const code = "code" in err ? err.code : undefined;
  return typeof code === "string" ? code : null;
}

/** Socket-level failures and timeouts; anything else is not retried. */
export function isTransientNetworkError(err: unknown): boolean {
  if (err instanceof TransientStorageError) return true;
  if (!err || typeof err !== "object") return false;
  const code = errorCode(err);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;
  if (err instanceof Error && TRANSIENT_ERROR_NAMES.has(err.name)) return true;
  const cause = "cause" in err ? err.cause : undefined;
  return cause !== undefined && cause !== err && isTransientNetworkError(cause);
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: "exhausted" | "fatal"; error: unknown; attempts: number };

export interface RetryDeps {
  sleep?: (ms: number) => Promise<void>;
  isTransient?: (err: unknown) => boolean;
  onAttemptFailed?: (err: unknown, attempt: number) => void;
}

/**
 * Runs `op` up to `policy.attempts` times with a fixed delay between
 * attempts. Non-transient failures end the loop at once.
 */
export async function retryWithBudget<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  deps: RetryDeps = {}
): Promise<RetryOutcome<T>> {
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const isTransient = deps.isTransient ?? isTransientNetworkError;

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return { ok: true, value: await op(attempt), attempts: attempt };
    } catch (err) {
      if (!isTransient(err)) return { ok: false, reason: "fatal", error: err, attempts: attempt };
      lastError = err;
      deps.onAttemptFailed?.(err, attempt);
      if (attempt < policy.attempts) await sleep(policy.delayMs);
    }
  }
  return { ok: false, reason: "exhausted", error: lastError, attempts: policy.attempts };
}
