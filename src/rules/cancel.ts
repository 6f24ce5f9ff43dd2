import { RuleCancelledError } from "./errors.js";

/**
 * Outcome returned when requesting a cancellation. The literal lets callers
 * tell the first request apart from idempotent retries without exceptions.
 */
export type CancellationRequestOutcome = "requested" | "already_cancelled";

/**
 * Handle wrapping an {@link AbortController}. Runs receive `handle.signal`;
 * the issuer keeps the handle to cancel them. Cancellation is one-shot.
 */
export interface CancellationHandle {
  /** Abort signal toggled when a cancellation is requested. */
  readonly signal: AbortSignal;
  /** Human readable reason supplied by the caller, if any. */
  readonly reason: string | null;
  /** Timestamp recorded when the cancellation was requested, if any. */
  readonly cancelledAt: number | null;
  isCancelled(): boolean;
  /** Request the cancellation. Later calls keep the first reason. */
  cancel(reason?: string | null): CancellationRequestOutcome;
  /** Throw a {@link RuleCancelledError} when cancelled. */
  throwIfCancelled(): void;
  /** Subscribe to the cancellation. Returns a disposer. */
  onCancel(listener: (payload: { reason: string | null; at: number }) => void): () => void;
}

export interface CreateCancellationOptions {
  /** Clock used to stamp {@link CancellationHandle.cancelledAt}. */
  readonly now?: () => number;
}

/** Create a fresh cancellation handle. */
export function createCancellation(options: CreateCancellationOptions = {}): CancellationHandle {
  const controller = new AbortController();
  const now = options.now ?? (() => Date.now());
  let reason: string | null = null;
  let cancelledAt: number | null = null;

  const handle: CancellationHandle = {
    get signal() {
      return controller.signal;
    },
    get reason() {
      return reason;
    },
    get cancelledAt() {
      return cancelledAt;
    },
    isCancelled(): boolean {
      return controller.signal.aborted;
    },
    cancel(requestedReason?: string | null): CancellationRequestOutcome {
      if (controller.signal.aborted) {
        return "already_cancelled";
      }
      reason = requestedReason ?? null;
      cancelledAt = now();
      controller.abort(new RuleCancelledError(null, reason));
      return "requested";
    },
    throwIfCancelled(): void {
      ensureNotCancelled(controller.signal, null);
    },
    onCancel(listener: (payload: { reason: string | null; at: number }) => void): () => void {
      const wrapped = () => {
        listener({ reason, at: cancelledAt ?? now() });
      };
      controller.signal.addEventListener("abort", wrapped, { once: true });
      return () => {
        controller.signal.removeEventListener("abort", wrapped);
      };
    },
  };
  return handle;
}

/**
 * Extract a printable reason from `AbortSignal.reason`. The default
 * `AbortError` raised by a bare `abort()` carries no caller reason.
 */
export function describeAbortReason(reason: unknown): string | null {
  if (reason instanceof RuleCancelledError) {
    return reason.details.reason;
  }
  if (typeof reason === "string") {
    return reason.trim().length > 0 ? reason : null;
  }
  if (reason instanceof Error) {
    if (reason.name === "AbortError") {
      return null;
    }
    return reason.message.trim().length > 0 ? reason.message : null;
  }
  return null;
}

/**
 * Throw a {@link RuleCancelledError} naming `rule` when `signal` is aborted.
 * Rules call this at entry only; a hook already running is never interrupted.
 */
export function ensureNotCancelled(signal: AbortSignal | undefined, rule: string | null): void {
  if (!signal?.aborted) {
    return;
  }
  const cause: unknown = signal.reason;
  const options = cause !== undefined ? { cause } : undefined;
  throw new RuleCancelledError(rule, describeAbortReason(cause), options);
}

/** Convenience guard identifying errors raised by cancellation. */
export function isCancellationError(error: unknown): error is RuleCancelledError {
  return error instanceof RuleCancelledError;
}

function isAbortError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";
}

/**
 * Classify an error thrown by a hook as a cancellation. Besides
 * {@link RuleCancelledError}, an aborted signal's own reason (what
 * `signal.throwIfAborted()` throws) and any `AbortError` raised while the
 * signal is aborted count, and are converted to a {@link RuleCancelledError}
 * naming `rule`. Returns `null` for every other error.
 */
export function asCancellationError(
  error: unknown,
  signal: AbortSignal | undefined,
  rule: string,
): RuleCancelledError | null {
  if (isCancellationError(error)) {
    return error;
  }
  if (!signal?.aborted) {
    return null;
  }
  if (error !== signal.reason && !isAbortError(error)) {
    return null;
  }
  return new RuleCancelledError(rule, describeAbortReason(signal.reason), { cause: error });
}
