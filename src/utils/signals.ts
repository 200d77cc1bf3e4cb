import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Timeout of one request: the signal to pass on and a way to stop the timer early. */
export interface TimeoutHandle {
  signal: AbortSignal;
  /** Stops the timer; the signal then never aborts. */
  clear: () => void;
}

/**
 * Timeout that aborts its signal with a {@link TimeoutError} once `timeoutMs` has passed.
 * Returns `null` when the timeout is disabled (`false`, `0` or missing).
 * The timer never keeps the process alive; callers clear it once the request has finished.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutHandle | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timer.unref();

  return { signal: controller.signal, clear: () => clearTimeout(timer) };
}

/**
 * Combines the caller's signal and the timeout signal of one request.
 *
 * - Nullish entries are skipped; with nothing left the result is `null`.
 * - A single signal is returned unchanged.
 * - Otherwise the result aborts with the reason of the first source to abort,
 *   or an {@link AbortError} when that source gave none, and then detaches from the rest.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal | null {
  const sources = signals.filter((signal): signal is AbortSignal => signal != null);
  if (sources.length <= 1) {
    return sources[0] ?? null;
  }

  const controller = new AbortController();
  const reasonOf = (source: AbortSignal): unknown =>
    source.reason ?? new AbortError('error signal triggered with unknown reason');

  const early = sources.find((source) => source.aborted);
  if (early) {
    controller.abort(reasonOf(early));
    return controller.signal;
  }

  const detach: Array<() => void> = [];
  for (const source of sources) {
    const onAbort = () => controller.abort(reasonOf(source));
    source.addEventListener('abort', onAbort, { once: true });
    detach.push(() => source.removeEventListener('abort', onAbort));
  }

  controller.signal.addEventListener(
    'abort',
    () => {
      for (const remove of detach) {
        remove();
      }
    },
    { once: true },
  );

  return controller.signal;
}
