import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Signal scoped to a single request, with a release hook for its timers and listeners. */
export interface ScopedSignal {
  /** Signal to hand to the transport, null when nothing can abort the request. */
  signal: AbortSignal | null;
  /** Clears pending timers and detaches listeners; call once the request settled. */
  release: () => void;
}

const noop = () => {};

/**
 * Creates an {@link AbortSignal} that will automatically abort after
 * the specified timeout, with a {@link TimeoutError} as reason.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): ScopedSignal {
  if (!timeoutMs) {
    return { signal: null, release: noop };
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    release: () => clearTimeout(timeout),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns a `null` signal.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - Preserves the abort `reason` when available, otherwise aborts with an {@link AbortError}.
 *
 * Releasing detaches the listeners from the sources, which matters for long-lived
 * sources such as a client-wide dispose signal.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ScopedSignal {
  const active: AbortSignal[] = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return { signal: null, release: noop };
  }

  if (active.length === 1) {
    return { signal: active[0], release: noop };
  }

  const controller = new AbortController();
  const listeners: VoidFunction[] = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    release();
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
