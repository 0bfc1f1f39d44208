import { TimeoutError } from '../error/timeoutError.js';

/** Signal that aborts on its own after a delay, plus a handle to cancel the timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the timer once the guarded work finished. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort with a
 * {@link TimeoutError} after the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 * @returns The signal and its `clear` handle, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}

/** Signal combined from several sources, plus a handle to detach from them. */
export interface MergedSignal {
  signal: AbortSignal;
  /** Removes the listeners put on the sources; call once the guarded work finished. */
  clear: () => void;
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - No signals gives `null`, a single signal is returned as-is with a no-op `clear`.
 * - Otherwise a new signal aborts as soon as any source aborts, carrying its `reason`.
 *
 * Sources may outlive the merged signal, so call `clear` when done with it.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active: AbortSignal[] = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], clear: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const clear = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  controller.signal.addEventListener('abort', clear, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }

    const abort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, clear };
}
