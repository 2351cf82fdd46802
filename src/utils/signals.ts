import { TimeoutError } from '../error/timeoutError.js';

/** An abort signal armed with a timer, plus a way to disarm it. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Cancels the pending timer; call once the request has settled. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after
 * the specified timeout.
 *
 * When `timeoutMs` is `false`, `0` or absent, no signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}
