import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * An abort signal scoped to one request. `dispose` releases the timers and listeners behind it once the
 * request has settled; the signal is `null` when nothing can abort the request.
 */
export interface ScopedSignal {
  signal: AbortSignal | null;
  dispose: VoidFunction;
}

const noop: VoidFunction = () => {};

/**
 * Creates a signal that aborts with a {@link TimeoutError} once the session timeout elapses.
 *
 * When `timeoutMs` is `false` or `0`, no signal is created. Disposing clears the pending timer.
 */
export function createTimeoutSignal(timeoutMs: number | false): ScopedSignal {
  if (!timeoutMs) {
    return { signal: null, dispose: noop };
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  return { signal: controller.signal, dispose: () => clearTimeout(timeout) };
}

/**
 * Merges the caller's session signal and the timeout signal into one.
 *
 * - No signals gives a `null` signal, a single signal is returned as-is.
 * - Otherwise the merged signal aborts with the first source's `reason`, or an {@link AbortError} when the
 *   source carries none.
 * - Disposing, or the first abort, detaches the merged signal from every source.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ScopedSignal {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);
  if (active.length === 0) {
    return { signal: null, dispose: noop };
  }

  if (active.length === 1) {
    return { signal: active[0], dispose: noop };
  }

  const controller = new AbortController();
  const listeners: VoidFunction[] = [];
  const detach = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', detach, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, dispose: detach };
}
