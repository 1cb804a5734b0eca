import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal bound to a timer, plus a handle to stop the timer once the call settles. */
export interface TimeoutSignal {
  /** Signal aborted with a {@link TimeoutError} when the timer fires. */
  signal: AbortSignal;
  /** Stops the timer; the signal never aborts afterwards. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort after
 * the specified number of seconds.
 *
 * The timer keeps the event loop alive until it fires or `clear` is called,
 * so callers must clear it as soon as the request settles.
 *
 * @param seconds - Timeout in seconds.
 */
export function createTimeoutSignal(seconds: number): TimeoutSignal {
  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(seconds)),
    seconds * 1000,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}

/**
 * Settles with `work`, or rejects with the signal's reason once it aborts first.
 *
 * Used for body reads, which a stalled server can keep pending even after the
 * request signal aborted.
 */
export function raceSignal<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
