import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** A signal together with the function that releases its timers or listeners. */
export interface ScopedSignal {
  signal: AbortSignal;
  /** Release timers and listeners held for the signal. Safe to call more than once. */
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after
 * `timeoutMs`. Returns `null` when the timeout is disabled (`0` or `false`).
 *
 * The timer keeps running until the signal aborts or `release` is called, so
 * callers release it once the guarded work settles.
 */
export function createTimeoutSignal(timeoutMs?: number | false): ScopedSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  const release = () => clearTimeout(timer);

  controller.signal.addEventListener('abort', release, { once: true });

  return { signal: controller.signal, release };
}

/** Abort reason of `signal` as an `Error`. */
export function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  return new AbortError('error signal triggered with unknown reason', { cause: signal.reason });
}

/**
 * Merges several {@link AbortSignal}s into one that aborts as soon as any source
 * aborts, with that source's reason.
 *
 * - No signals: `null`.
 * - One signal: returned as-is, `release` does nothing.
 * - Several: a new signal. `release` detaches the listeners from the sources,
 *   which matters for long-lived sources such as a client-wide dispose signal.
 */
export function mergeSignals(signals: ReadonlyArray<AbortSignal | null | undefined>): ScopedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], release: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  controller.signal.addEventListener('abort', release, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      controller.abort(abortReason(signal));
      break;
    }

    const abort = () => controller.abort(abortReason(signal));
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
